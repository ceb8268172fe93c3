import type { DeployerState, DeploymentFailure, DeploymentResult, Environment, ServiceRole, VariableSet } from '../../types/deployment'
import type { PlatformClient, StatusReport } from '../platform/platform-client'
import type { ServiceSpec } from '../plan/service-spec'
import type { ConfigValues } from '../config/env-file'
import type { SchemaInitializer, SchemaTarget } from '../schema/bootstrap'
import { resolveVariables, type ReferenceSource } from '../plan/variables'
import { configKey } from '../environment/resolve'
import { HealthVerifier, joinUrl, predicates, type HealthOutcome } from '../health/verifier'
import { pollUntil, StopPolling, type Clock, type PollOutcome, type PollPolicy } from '../../utils/retry'
import {
  AbortedError,
  DeploymentFailedError,
  DeployTimeoutError,
  HealthCheckFailedError,
  PlatformCommandFailedError,
  SchemaInitError,
  describeError
} from '../../utils/errors'
import { logger } from '../../utils/logger'

export interface DeployPolicies {
  readonly deploy: PollPolicy
  readonly database: PollPolicy
  readonly health: PollPolicy
}

export interface DeployContext {
  readonly env: Environment
  readonly platform: PlatformClient
  readonly clock: Clock
  readonly verifier: HealthVerifier
  readonly policies: DeployPolicies
  /** Config values used for `{ROLE}_URL_{ENV}` when the platform reports no domain */
  readonly values: ConfigValues
  readonly httpTimeoutMs: number
  readonly schema?: { readonly initializer: SchemaInitializer; readonly target: SchemaTarget }
  /** Consulted for references whose producer did not run (selective runs) */
  readonly fallback?: ReferenceSource
  readonly signal?: AbortSignal
}

class StepFailure extends Error {
  public constructor(public readonly inner: unknown, public readonly step: DeploymentFailure['step']) {
    super('step failed')
  }
}

/**
 * Drives one service through
 * Configuring → VariablesSet → Deploying → AwaitingReady → Verified | Failed | TimedOut.
 * Never throws; failures are reported on the returned result.
 */
export class ServiceDeployer {
  public constructor(private readonly ctx: DeployContext) {}

  public async deploy(spec: ServiceSpec, results: ReadonlyMap<ServiceRole, DeploymentResult>): Promise<DeploymentResult> {
    const startedAt: string = this.isoNow()
    const transitions: DeployerState[] = []
    const outputs: Record<string, string> = {}
    let url: string | undefined
    const enter = (s: DeployerState): void => {
      transitions.push(s)
      logger.debug(`${spec.name}: ${s}`)
      logger.event({ event: 'transition', service: spec.name, role: spec.role, state: s })
    }
    const current = (): DeployerState => transitions[transitions.length - 1] ?? 'Configuring'
    try {
      enter('Configuring')
      const vars: VariableSet = await resolveVariables(spec, results, this.ctx.fallback)
      enter('VariablesSet')
      this.checkAbort(spec)

      await this.ensureService(spec)
      await this.ctx.platform.setVariables(spec.name, vars)
      logger.info(`Set ${vars.length} variable(s) on ${spec.name}: ${vars.map(v => v.name).join(', ')}`)
      this.checkAbort(spec)
      enter('Deploying')
      const handle = await this.ctx.platform.deploy(spec.name, spec.sourceDir)
      logger.info(`Deployment of ${spec.name} triggered${handle.logsUrl !== undefined ? ` (logs: ${handle.logsUrl})` : ''}`)
      enter('AwaitingReady')

      await this.awaitDeployed(spec)
      if (spec.exposesDomain) url = await this.resolveUrl(spec)
      if (spec.role === 'database') {
        const dbUrl: string = await this.awaitDatabaseUrl(spec)
        outputs.DATABASE_URL = dbUrl
        await this.initSchema(dbUrl)
      }
      if (url !== undefined && spec.health !== undefined) await this.checkHealth(spec, url)
      enter('Verified')
      logger.success(`${spec.name} deployed${url !== undefined ? `: ${url}` : ''}`)
      return { role: spec.role, service: spec.name, status: 'deployed', url, outputs, startedAt, finishedAt: this.isoNow(), transitions }
    } catch (caught) {
      const err: unknown = caught instanceof StepFailure ? caught.inner : caught
      const step: DeploymentFailure['step'] = caught instanceof StepFailure ? caught.step : current()
      const timedOut: boolean = err instanceof DeployTimeoutError
      enter(timedOut ? 'TimedOut' : 'Failed')
      const error: DeploymentFailure = { ...describeError(err), step }
      logger.error(`${spec.name} ${timedOut ? 'timed out' : 'failed'} during ${step}: ${error.message}`)
      if (error.command !== undefined) logger.error(`  command: ${error.command} (exit ${error.exitCode ?? 'n/a'})`)
      if (error.remedy !== undefined) logger.note(`Try: ${error.remedy}`)
      return {
        role: spec.role,
        service: spec.name,
        status: timedOut ? 'timed-out' : 'failed',
        url,
        outputs,
        error,
        startedAt,
        finishedAt: this.isoNow(),
        transitions
      }
    }
  }

  private isoNow(): string {
    return new Date(this.ctx.clock.now()).toISOString()
  }

  private checkAbort(spec: ServiceSpec): void {
    if (this.ctx.signal?.aborted === true) throw new AbortedError(`while deploying ${spec.name}`)
  }

  private async ensureService(spec: ServiceSpec): Promise<void> {
    if (await this.ctx.platform.serviceExists(spec.name)) {
      logger.info(`Service ${spec.name} already exists`)
    } else {
      logger.info(`Creating service ${spec.name}`)
      await this.ctx.platform.createService(spec.name)
    }
    if (spec.plugin !== undefined) {
      await this.ctx.platform.addPlugin(spec.name, spec.plugin)
      logger.info(`Plugin ${spec.plugin} attached to ${spec.name}`)
    }
  }

  private async awaitDeployed(spec: ServiceSpec): Promise<void> {
    const outcome: PollOutcome<StatusReport> = await pollUntil<StatusReport>({
      policy: this.ctx.policies.deploy,
      clock: this.ctx.clock,
      signal: this.ctx.signal,
      label: `${spec.name} deployment`,
      check: async () => {
        const report: StatusReport = await this.ctx.platform.pollStatus(spec.name).catch((err: unknown) => {
          throw err instanceof PlatformCommandFailedError ? new StopPolling(err) : err
        })
        if (report.status === 'failed') throw new StopPolling(new DeploymentFailedError(spec.name, report.raw ?? 'failed'))
        return report.status === 'deployed' ? report : undefined
      },
      onAttempt: (a, attemptError) => {
        logger.info(`Waiting for ${spec.name}... (${a.attempt}/${a.maxAttempts})${attemptError !== undefined ? ` last error: ${attemptError}` : ''}`)
      }
    })
    if (!outcome.ok) throw new DeployTimeoutError(spec.name, outcome.elapsedMs, 'deployment', outcome.lastError)
  }

  private async resolveUrl(spec: ServiceSpec): Promise<string> {
    const domain: string | undefined = await this.ctx.platform.resolveDomain(spec.name)
    if (domain !== undefined) return domain
    const key: string = configKey(this.ctx.env, spec.role, 'url')
    const configured: string | undefined = this.ctx.values[key]?.trim()
    if (configured !== undefined && configured.length > 0) {
      logger.warn(`No domain reported for ${spec.name}; using ${key}=${configured}`)
      return configured
    }
    const fallback: string = spec.role === 'frontend' ? this.ctx.env.defaultUrls.frontend : this.ctx.env.defaultUrls.backend
    logger.warn(`No domain reported for ${spec.name}; using default ${fallback}`)
    return fallback
  }

  private async awaitDatabaseUrl(spec: ServiceSpec): Promise<string> {
    const outcome: PollOutcome<string> = await pollUntil<string>({
      policy: this.ctx.policies.database,
      clock: this.ctx.clock,
      signal: this.ctx.signal,
      label: `${spec.name} DATABASE_URL`,
      check: () => this.ctx.platform.getVariable(spec.name, 'DATABASE_URL'),
      // the variable read fails until the plugin has provisioned, so errors here only count as attempts
      onAttempt: (a) => { logger.info(`Waiting for DATABASE_URL on ${spec.name}... (${a.attempt}/${a.maxAttempts})`) }
    })
    if (!outcome.ok) throw new DeployTimeoutError(spec.name, outcome.elapsedMs, 'DATABASE_URL availability', outcome.lastError)
    registerDatabaseSecrets(outcome.value)
    logger.success('DATABASE_URL is available')
    return outcome.value
  }

  private async initSchema(dbUrl: string): Promise<void> {
    if (this.ctx.schema === undefined) return
    try {
      const res = await this.ctx.schema.initializer.initialize(dbUrl, this.ctx.schema.target)
      logger.info(res.created ? `Schema bootstrap applied (${res.table})` : `Schema already present (${res.table})`)
    } catch (err) {
      throw new StepFailure(err instanceof SchemaInitError ? err : new SchemaInitError(describeError(err).message), 'SchemaInit')
    }
  }

  private async checkHealth(spec: ServiceSpec, url: string): Promise<void> {
    if (spec.health === undefined) return
    const target: string = joinUrl(url, spec.health.path)
    const outcome: HealthOutcome = await this.ctx.verifier.verify({
      url: target,
      predicate: predicates[spec.health.predicate],
      policy: this.ctx.policies.health,
      timeoutMs: this.ctx.httpTimeoutMs
    }, this.ctx.signal)
    if (!outcome.healthy) throw new HealthCheckFailedError(spec.name, target, outcome.lastError)
    logger.success(`${spec.name} is healthy (${target})`)
  }
}

/** Hide the connection string and its password from every later log line. */
export function registerDatabaseSecrets(dbUrl: string): void {
  const patterns: string[] = [dbUrl]
  try {
    const password: string = decodeURIComponent(new URL(dbUrl).password)
    if (password.length > 0) patterns.push(password)
  } catch {
    logger.debug('DATABASE_URL is not a URL; redacting it verbatim')
  }
  logger.addRedactors(patterns)
}
