import type { Command } from 'commander'
import { isAbsolute, resolve } from 'node:path'
import { SchemaInitializer, maskUrl, type SchemaInitResult, type SchemaTarget } from '../core/schema/bootstrap'
import { registerDatabaseSecrets } from '../core/deploy/service-deployer'
import { configKey } from '../core/environment/resolve'
import { ConfigError, describeError } from '../utils/errors'
import { logger } from '../utils/logger'
import { loadCommandContext, schemaTargetFrom, type CommandContext, type CommandDeps, type EnvironmentOptions } from './context'

export interface SchemaOptions extends EnvironmentOptions {
  readonly dbUrl?: string
  readonly file?: string
  readonly verifyOnly?: boolean
  readonly json?: boolean
}

function isPostgresUrl(url: string): boolean {
  try { const u = new URL(url); return u.protocol === 'postgres:' || u.protocol === 'postgresql:' } catch { return false }
}

function resolveDbUrl(opts: SchemaOptions, ctx: CommandContext): string {
  const candidates: (string | undefined)[] = [opts.dbUrl, ctx.values[configKey(ctx.environment, 'database', 'url')], ctx.values.DATABASE_URL]
  const url: string | undefined = candidates.map(c => c?.trim()).find((c): c is string => c !== undefined && c.length > 0)
  if (url === undefined) throw new ConfigError(`Missing database URL. Pass --db-url or set ${configKey(ctx.environment, 'database', 'url')} or DATABASE_URL`)
  if (!isPostgresUrl(url)) throw new ConfigError('Expected a postgres:// or postgresql:// connection string')
  return url
}

/** Apply (or only verify) the bootstrap script against a database directly. */
export async function runSchema(opts: SchemaOptions, deps: CommandDeps = {}): Promise<{ readonly exitCode: number; readonly result?: SchemaInitResult }> {
  try {
    if (opts.json === true) logger.setJsonOnly(true)
    const ctx: CommandContext = await loadCommandContext(opts, deps)
    const dbUrl: string = resolveDbUrl(opts, ctx)
    registerDatabaseSecrets(dbUrl)
    const file: string | undefined = opts.file !== undefined ? (isAbsolute(opts.file) ? opts.file : resolve(ctx.cwd, opts.file)) : undefined
    const target: SchemaTarget = schemaTargetFrom(ctx, file)
    const initializer = new SchemaInitializer(deps.sqlFactory)
    logger.section(`${opts.verifyOnly === true ? 'Verifying' : 'Initializing'} schema on ${maskUrl(dbUrl)}`)
    const result: SchemaInitResult = opts.verifyOnly === true ? await initializer.verify(dbUrl, target) : await initializer.initialize(dbUrl, target)
    if (logger.isJsonMode()) logger.json({ ok: true, action: 'schema', environment: ctx.environment.name, ...result, final: true })
    else logger.success(result.created ? `Created ${result.table}` : `${result.table} is up to date`)
    return { exitCode: 0, result }
  } catch (err) {
    const info = describeError(err)
    if (logger.isJsonMode()) logger.json({ ok: false, action: 'schema', error: info, final: true })
    else {
      logger.error(info.message)
      if (info.remedy !== undefined) logger.note(`Try: ${info.remedy}`)
    }
    return { exitCode: 1 }
  }
}

export function registerSchemaCommand(program: Command): void {
  program
    .command('schema')
    .description('Apply or verify the database bootstrap script')
    .option('--env <environment>', 'Target environment: staging | production (defaults to ENVIRONMENT)')
    .option('--db-url <url>', 'Postgres connection string (defaults to DATABASE_URL_<ENV> or DATABASE_URL)')
    .option('--file <path>', 'SQL bootstrap file (defaults to db/init.sql)')
    .option('--verify-only', 'Only check that the table and its columns exist')
    .option('--config <path>', 'Path to deploy.config.json')
    .option('--env-file <path>', 'Env file overlay')
    .option('--json', 'Output JSON summary')
    .action(async (opts: SchemaOptions): Promise<void> => {
      const json: boolean = opts.json === true || program.opts<{ json?: boolean }>().json === true
      const res = await runSchema({ ...opts, json }, {})
      if (res.exitCode !== 0) process.exitCode = res.exitCode
    })
}
