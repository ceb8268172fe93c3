import type { Command } from 'commander'
import type { ServiceRole } from '../types/deployment'
import type { PlatformClient, PlatformStatus } from '../core/platform/platform-client'
import { serviceName } from '../core/plan/service-spec'
import { SERVICE_ROLES } from '../types/deployment'
import { MissingTokenError, describeError, errorMessage } from '../utils/errors'
import { padVisible, colors } from '../utils/colors'
import { logger } from '../utils/logger'
import { loadCommandContext, platformFor, type CommandContext, type CommandDeps, type EnvironmentOptions } from './context'

export interface StatusOptions extends EnvironmentOptions {
  readonly json?: boolean
}

export interface ServiceStatusRow {
  readonly role: ServiceRole
  readonly service: string
  readonly exists: boolean
  readonly status: PlatformStatus | 'missing'
  readonly url?: string
  readonly error?: string
}

async function inspect(platform: PlatformClient, role: ServiceRole, name: string): Promise<ServiceStatusRow> {
  try {
    if (!(await platform.serviceExists(name))) return { role, service: name, exists: false, status: 'missing' }
    const { status } = await platform.pollStatus(name)
    const url: string | undefined = role === 'database' ? undefined : await platform.resolveDomain(name)
    return { role, service: name, exists: true, status, url }
  } catch (err) {
    return { role, service: name, exists: true, status: 'unknown', error: errorMessage(err) }
  }
}

function paint(status: ServiceStatusRow['status']): string {
  if (status === 'deployed') return colors.green(status)
  if (status === 'failed' || status === 'missing') return colors.red(status)
  return colors.yellow(status)
}

/** Report platform status and domain for each service of the environment. */
export async function runStatus(opts: StatusOptions, deps: CommandDeps = {}): Promise<{ readonly exitCode: number; readonly rows: readonly ServiceStatusRow[] }> {
  try {
    if (opts.json === true) logger.setJsonOnly(true)
    const ctx: CommandContext = await loadCommandContext(opts, deps)
    if (ctx.token === undefined) throw new MissingTokenError()
    const platform: PlatformClient = platformFor(ctx, deps)
    await platform.authenticate(ctx.token)
    await platform.linkProject(ctx.environment.projectId)
    const rows: ServiceStatusRow[] = []
    for (const role of SERVICE_ROLES) rows.push(await inspect(platform, role, serviceName(ctx.environment, role)))
    if (logger.isJsonMode()) {
      logger.json({ ok: true, action: 'status', environment: ctx.environment.name, services: rows, final: true })
    } else {
      logger.section(`Services in ${ctx.environment.name}`)
      for (const r of rows) {
        logger.info(`${padVisible(r.service, 28)} ${padVisible(paint(r.status), 12)} ${r.url ?? r.error ?? ''}`)
      }
    }
    return { exitCode: 0, rows }
  } catch (err) {
    const info = describeError(err)
    if (logger.isJsonMode()) logger.json({ ok: false, action: 'status', error: info, final: true })
    else {
      logger.error(info.message)
      if (info.remedy !== undefined) logger.note(`Try: ${info.remedy}`)
    }
    return { exitCode: 1, rows: [] }
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show platform status and domain of each service')
    .option('--env <environment>', 'Target environment: staging | production (defaults to ENVIRONMENT)')
    .option('--token <token>', 'Railway token (defaults to RAILWAY_TOKEN)')
    .option('--config <path>', 'Path to deploy.config.json')
    .option('--env-file <path>', 'Env file overlay')
    .option('--json', 'Output JSON summary')
    .action(async (opts: StatusOptions): Promise<void> => {
      const json: boolean = opts.json === true || program.opts<{ json?: boolean }>().json === true
      const res = await runStatus({ ...opts, json }, {})
      if (res.exitCode !== 0) process.exitCode = res.exitCode
    })
}
