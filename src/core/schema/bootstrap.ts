import { Client } from 'pg'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'
import { SchemaInitError, errorMessage } from '../../utils/errors'

export interface SqlRows {
  readonly rows: readonly Readonly<Record<string, unknown>>[]
}

/** The slice of a Postgres client the initializer needs. */
export interface SqlClient {
  connect(): Promise<void>
  query(sql: string, params?: readonly string[]): Promise<SqlRows>
  end(): Promise<void>
}

export type SqlClientFactory = (dbUrl: string) => SqlClient

export function maskUrl(url: string): string {
  try {
    const u = new URL(url)
    const user: string = u.username
    const host: string = u.port !== '' ? `${u.hostname}:${u.port}` : u.hostname
    const db: string = u.pathname.replace(/^\//, '')
    return `postgres://${user !== '' ? user : 'user'}@${host}/${db}`
  } catch {
    return 'postgres://***'
  }
}

function needsSsl(dbUrl: string): boolean {
  return dbUrl.includes('sslmode=require') || dbUrl.includes('.proxy.rlwy.net') || dbUrl.includes('railway.app')
}

class PgSqlClient implements SqlClient {
  private readonly client: Client

  public constructor(dbUrl: string) {
    this.client = new Client({ connectionString: dbUrl, ssl: needsSsl(dbUrl) ? { rejectUnauthorized: false } : undefined })
  }

  public async connect(): Promise<void> { await this.client.connect() }

  public async query(sql: string, params?: readonly string[]): Promise<SqlRows> {
    const res = params !== undefined ? await this.client.query(sql, [...params]) : await this.client.query(sql)
    return { rows: res.rows }
  }

  public async end(): Promise<void> { await this.client.end() }
}

export const pgClientFactory: SqlClientFactory = (dbUrl: string): SqlClient => new PgSqlClient(dbUrl)

export interface SchemaTarget {
  readonly table: string
  readonly requiredColumns: readonly string[]
  /** SQL applied when the table is absent */
  readonly bootstrapFile: string
}

export interface SchemaInitResult {
  readonly created: boolean
  readonly table: string
  readonly columns: readonly string[]
}

const TABLE_EXISTS_SQL = `SELECT EXISTS (
  SELECT 1 FROM information_schema.tables
  WHERE table_schema = current_schema() AND table_name = $1
) AS "exists"`

const COLUMNS_SQL = `SELECT column_name FROM information_schema.columns
WHERE table_schema = current_schema() AND table_name = $1
ORDER BY ordinal_position`

/**
 * Applies the bootstrap script when the target table is missing, then checks
 * that the table carries every required column. Running it twice leaves the
 * database unchanged.
 */
export class SchemaInitializer {
  public constructor(private readonly factory: SqlClientFactory = pgClientFactory) {}

  public async initialize(dbUrl: string, target: SchemaTarget): Promise<SchemaInitResult> {
    return this.withClient(dbUrl, async (client) => {
      let created = false
      if (!(await this.tableExists(client, target.table))) {
        logger.info(`Table ${target.table} not found on ${maskUrl(dbUrl)}; applying ${target.bootstrapFile}`)
        await this.apply(client, await this.readSql(target.bootstrapFile))
        created = true
      } else {
        logger.info(`Table ${target.table} already exists; skipping bootstrap`)
      }
      const columns: readonly string[] = await this.checkColumns(client, target)
      return { created, table: target.table, columns }
    })
  }

  public async verify(dbUrl: string, target: Omit<SchemaTarget, 'bootstrapFile'>): Promise<SchemaInitResult> {
    return this.withClient(dbUrl, async (client) => {
      if (!(await this.tableExists(client, target.table))) throw new SchemaInitError(`table ${target.table} does not exist`)
      return { created: false, table: target.table, columns: await this.checkColumns(client, target) }
    })
  }

  private async withClient<T>(dbUrl: string, fn: (client: SqlClient) => Promise<T>): Promise<T> {
    const client: SqlClient = this.factory(dbUrl)
    try {
      await client.connect()
      return await fn(client)
    } catch (err) {
      if (err instanceof SchemaInitError) throw err
      throw new SchemaInitError(errorMessage(err).split(dbUrl).join(maskUrl(dbUrl)))
    } finally {
      await client.end().catch((err: unknown) => { logger.debug(`Closing database connection: ${errorMessage(err)}`) })
    }
  }

  private async readSql(path: string): Promise<string> {
    const sql: string | null = await fsx.readText(path)
    if (sql === null) throw new SchemaInitError(`bootstrap file not found: ${path}`)
    if (sql.trim().length === 0) throw new SchemaInitError(`bootstrap file is empty: ${path}`)
    return sql
  }

  private async tableExists(client: SqlClient, table: string): Promise<boolean> {
    const res: SqlRows = await client.query(TABLE_EXISTS_SQL, [table])
    const v: unknown = res.rows[0]?.exists
    return v === true || v === 't' || v === 'true'
  }

  private async apply(client: SqlClient, sql: string): Promise<void> {
    await client.query('BEGIN')
    try {
      await client.query(sql)
      await client.query('COMMIT')
    } catch (err) {
      await client.query('ROLLBACK').catch((rbErr: unknown) => { logger.debug(`Rollback failed: ${errorMessage(rbErr)}`) })
      throw new SchemaInitError(`bootstrap script failed: ${errorMessage(err)}`)
    }
  }

  private async checkColumns(client: SqlClient, target: Pick<SchemaTarget, 'table' | 'requiredColumns'>): Promise<readonly string[]> {
    const res: SqlRows = await client.query(COLUMNS_SQL, [target.table])
    const columns: string[] = res.rows.map(r => r.column_name).filter((c): c is string => typeof c === 'string')
    const missing: string[] = target.requiredColumns.filter(c => !columns.includes(c))
    if (missing.length > 0) throw new SchemaInitError(`table ${target.table} is missing columns: ${missing.join(', ')}`)
    logger.success(`Table ${target.table} has required columns: ${target.requiredColumns.join(', ')}`)
    return columns
  }
}
