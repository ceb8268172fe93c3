import { isAbsolute, resolve } from 'node:path'
import type { Environment, EnvironmentName } from '../types/deployment'
import type { DeployConfig, PollPolicyConfig } from '../types/config'
import type { PlatformClient } from '../core/platform/platform-client'
import type { HttpClient } from '../core/health/http'
import type { SqlClientFactory } from '../core/schema/bootstrap'
import type { SchemaTarget } from '../core/schema/bootstrap'
import type { Clock, PollPolicy } from '../utils/retry'
import type { ProcessRunner } from '../utils/process'
import type { DeployPolicies } from '../core/deploy/service-deployer'
import { NodeProcessRunner } from '../utils/process'
import { RailwayClient } from '../core/platform/railway'
import { FetchHttpClient } from '../core/health/http'
import { StateStore } from '../core/state/state'
import { loadConfigValues, type ConfigValues } from '../core/config/env-file'
import { loadDeployConfig } from '../core/config/load'
import { parseEnvironmentName, resolveEnvironment } from '../core/environment/resolve'
import { computeRedactors } from '../utils/redaction'
import { systemClock } from '../utils/retry'
import { logger } from '../utils/logger'
import { constants, defaultPolicies } from '../constants'

/** Options shared by every command that targets an environment. */
export interface EnvironmentOptions {
  readonly env?: string
  readonly token?: string
  readonly config?: string
  readonly envFile?: string
}

/**
 * Collaborators a command needs. Each one defaults to the real
 * implementation; tests pass fakes.
 */
export interface CommandDeps {
  readonly cwd?: string
  /** Base configuration values; defaults to process.env */
  readonly values?: ConfigValues
  readonly runner?: ProcessRunner
  readonly platform?: PlatformClient
  readonly http?: HttpClient
  readonly clock?: Clock
  readonly sqlFactory?: SqlClientFactory
  readonly state?: StateStore
  readonly signal?: AbortSignal
}

export interface CommandContext {
  readonly cwd: string
  readonly environment: Environment
  readonly values: ConfigValues
  readonly config: DeployConfig
  readonly baseDir: string
  readonly token?: string
  readonly envFile?: string
}

/**
 * Read ENVIRONMENT, the env file and deploy.config.json once, resolve the
 * Environment and register secrets with the logger. No platform call.
 */
export async function loadCommandContext(opts: EnvironmentOptions, deps: CommandDeps): Promise<CommandContext> {
  const cwd: string = deps.cwd ?? process.cwd()
  const base: ConfigValues = deps.values ?? process.env
  const name: EnvironmentName = parseEnvironmentName((opts.env ?? base.ENVIRONMENT ?? '').trim())
  const loaded = await loadConfigValues({ cwd, environment: name, envFile: opts.envFile, base })
  if (loaded.envFile !== undefined) logger.debug(`Loaded ${loaded.envFile}`)
  const { config, baseDir } = await loadDeployConfig({ cwd, path: opts.config })
  const appName: string = config.appName ?? loaded.values.APP_NAME ?? constants.DEFAULT_APP_NAME
  const environment: Environment = resolveEnvironment(name, loaded.values, appName)
  const rawToken: string | undefined = (opts.token ?? loaded.values.RAILWAY_TOKEN)?.trim()
  const token: string | undefined = rawToken !== undefined && rawToken.length > 0 ? rawToken : undefined
  logger.addRedactors(computeRedactors({ token, values: loaded.values }))
  return { cwd, environment, values: loaded.values, config, baseDir, token, envFile: loaded.envFile }
}

export function platformFor(ctx: Pick<CommandContext, 'cwd'>, deps: CommandDeps): PlatformClient {
  return deps.platform ?? new RailwayClient({ runner: deps.runner ?? new NodeProcessRunner(), cwd: ctx.cwd, timeoutMs: constants.PLATFORM_TIMEOUT_MS })
}

export function httpFor(deps: CommandDeps): HttpClient {
  return deps.http ?? new FetchHttpClient()
}

export function stateFor(ctx: Pick<CommandContext, 'cwd'>, deps: CommandDeps): StateStore {
  return deps.state ?? new StateStore({ cwd: ctx.cwd })
}

export function clockFor(deps: CommandDeps): Clock {
  return deps.clock ?? systemClock
}

function policy(configured: PollPolicyConfig | undefined, fallback: PollPolicy): PollPolicy {
  return { intervalMs: configured?.intervalMs ?? fallback.intervalMs, maxAttempts: configured?.maxAttempts ?? fallback.maxAttempts }
}

export function policiesFrom(config: DeployConfig): DeployPolicies & { readonly smoke: PollPolicy } {
  return {
    deploy: policy(config.polling?.deploy, defaultPolicies.deploy),
    database: policy(config.polling?.database, defaultPolicies.database),
    health: policy(config.polling?.health, defaultPolicies.health),
    smoke: policy(config.polling?.smoke, defaultPolicies.smoke)
  }
}

export function schemaTargetFrom(ctx: Pick<CommandContext, 'config' | 'baseDir'>, file?: string): SchemaTarget {
  const db = ctx.config.database
  const bootstrap: string = file ?? db?.bootstrapFile ?? constants.DEFAULT_BOOTSTRAP_FILE
  return {
    table: db?.table ?? constants.DEFAULT_TABLE,
    requiredColumns: db?.requiredColumns ?? constants.DEFAULT_REQUIRED_COLUMNS,
    bootstrapFile: isAbsolute(bootstrap) ? bootstrap : resolve(ctx.baseDir, bootstrap)
  }
}
