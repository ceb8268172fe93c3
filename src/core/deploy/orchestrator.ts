import type {
  DeploymentResult,
  Environment,
  RunReport,
  RunStatus,
  RunTarget,
  ServiceRole,
  SmokeCheck,
  SmokeReport
} from '../../types/deployment'
import type { SmokeMode } from '../../types/config'
import type { PlatformClient } from '../platform/platform-client'
import type { StateStore, EnvironmentState } from '../state/state'
import type { ConfigValues } from '../config/env-file'
import type { HealthVerifier, HealthPredicate } from '../health/verifier'
import { joinUrl, databaseConnected, statusOk } from '../health/verifier'
import { validatePlan, type ServicePlan, type ServiceSpec } from '../plan/service-spec'
import { persistedSource } from '../plan/persisted'
import { configKey } from '../environment/resolve'
import { ServiceDeployer, type DeployContext, type DeployPolicies } from './service-deployer'
import type { SchemaInitializer, SchemaTarget } from '../schema/bootstrap'
import type { Clock, PollPolicy } from '../../utils/retry'
import { AbortedError, CliNotInstalledError, MissingTokenError, describeError, errorMessage, type ErrorInfo } from '../../utils/errors'
import { logger } from '../../utils/logger'

export interface SmokeOptions {
  readonly mode: SmokeMode
  readonly settleMs: number
  readonly apiPaths: readonly string[]
  readonly policy: PollPolicy
}

export interface OrchestratorDeps {
  readonly platform: PlatformClient
  readonly clock: Clock
  readonly verifier: HealthVerifier
  readonly state: StateStore
  readonly schema?: { readonly initializer: SchemaInitializer; readonly target: SchemaTarget }
}

export interface RunOptions {
  readonly environment: Environment
  readonly plan: ServicePlan
  /** Required for every target except `verify` */
  readonly token?: string
  readonly target: RunTarget
  readonly values: ConfigValues
  readonly policies: DeployPolicies
  readonly smoke: SmokeOptions
  readonly httpTimeoutMs: number
  readonly signal?: AbortSignal
}

/**
 * Sequences the service deployers in plan order, halting on the first
 * failure, then runs the smoke test. Deploys already triggered are never
 * rolled back.
 */
export class Orchestrator {
  public constructor(private readonly deps: OrchestratorDeps) {}

  public async run(opts: RunOptions): Promise<RunReport> {
    const startedAt: string = this.isoNow()
    const results: DeploymentResult[] = []
    const warnings: string[] = []
    let smoke: SmokeReport | undefined
    let error: ErrorInfo | undefined
    let status: RunStatus = 'success'
    try {
      validatePlan(opts.plan)
      const saved: EnvironmentState = await this.deps.state.readEnvironment(opts.environment.name)
      if (opts.target === 'verify') {
        smoke = await this.smokeTest(opts, this.persistedUrls(opts, saved), warnings)
      } else {
        const specs: readonly ServiceSpec[] = opts.target === 'all' ? opts.plan : opts.plan.filter(s => s.role === opts.target)
        await this.prepare(opts)
        const selective: boolean = opts.target !== 'all'
        const ctx: DeployContext = {
          env: opts.environment,
          platform: this.deps.platform,
          clock: this.deps.clock,
          verifier: this.deps.verifier,
          policies: opts.policies,
          values: opts.values,
          httpTimeoutMs: opts.httpTimeoutMs,
          schema: this.deps.schema,
          fallback: selective ? persistedSource({ env: opts.environment, values: opts.values, state: saved, platform: this.deps.platform }) : undefined,
          signal: opts.signal
        }
        status = await this.deployAll(specs, ctx, results)
        if (status === 'success') {
          await this.persist(opts, results)
          if (!selective) smoke = await this.smokeTest(opts, this.urlsFrom(results), warnings)
        }
      }
    } catch (err) {
      status = err instanceof AbortedError ? 'aborted' : 'failed'
      error = describeError(err)
      logger.error(error.message)
      if (error.remedy !== undefined) logger.note(`Try: ${error.remedy}`)
    }
    if (status === 'success' && smoke !== undefined && !smoke.healthy && opts.smoke.mode === 'fail') {
      status = 'failed'
      error = { code: 'HEALTH_CHECK_FAILED', message: 'Smoke test failed' }
    }
    const firstFailure: ErrorInfo | undefined = results.find(r => r.error !== undefined)?.error
    if (status !== 'success' && error === undefined && firstFailure === undefined) error = { code: 'UNKNOWN', message: `Run ${status}` }
    return {
      ok: status === 'success',
      action: 'deploy',
      status,
      environment: opts.environment.name,
      target: opts.target,
      results,
      warnings,
      smoke,
      error: error ?? firstFailure,
      startedAt,
      finishedAt: this.isoNow(),
      final: true
    }
  }

  private isoNow(): string {
    return new Date(this.deps.clock.now()).toISOString()
  }

  /** Preflight, authenticate and link once per run. */
  private async prepare(opts: RunOptions): Promise<void> {
    if (opts.signal?.aborted === true) throw new AbortedError('before authentication')
    if (opts.token === undefined || opts.token.length === 0) throw new MissingTokenError()
    if (!(await this.deps.platform.isInstalled())) throw new CliNotInstalledError()
    await this.deps.platform.authenticate(opts.token)
    logger.success('Authenticated with Railway')
    await this.deps.platform.linkProject(opts.environment.projectId)
    logger.success(`Linked project for ${opts.environment.name}`)
  }

  private async deployAll(specs: readonly ServiceSpec[], ctx: DeployContext, results: DeploymentResult[]): Promise<RunStatus> {
    const byRole = new Map<ServiceRole, DeploymentResult>()
    const deployer = new ServiceDeployer(ctx)
    for (const [i, spec] of specs.entries()) {
      if (ctx.signal?.aborted === true) throw new AbortedError(`before ${spec.name}; services already triggered are left as they are`)
      logger.section(`STEP ${i + 1}/${specs.length}: ${spec.role} (${spec.name})`)
      const result: DeploymentResult = await deployer.deploy(spec, byRole)
      results.push(result)
      byRole.set(spec.role, result)
      if (result.status !== 'deployed') {
        if (result.error?.code === 'ABORTED') return 'aborted'
        const rest: string[] = specs.slice(i + 1).map(s => s.name)
        if (rest.length > 0) logger.warn(`Halting: ${rest.join(', ')} not attempted`)
        return 'failed'
      }
    }
    return 'success'
  }

  private async persist(opts: RunOptions, results: readonly DeploymentResult[]): Promise<void> {
    try {
      await this.deps.state.recordDeployment(opts.environment.name, results.map(r => ({ role: r.role, service: r.service, url: r.url })), new Date(this.deps.clock.now()))
    } catch (err) {
      logger.warn(`Could not record deployed URLs: ${errorMessage(err)}`)
    }
  }

  private urlsFrom(results: readonly DeploymentResult[]): Partial<Record<ServiceRole, string>> {
    const out: Partial<Record<ServiceRole, string>> = {}
    for (const r of results) if (r.url !== undefined) out[r.role] = r.url
    return out
  }

  /** URLs for a verify run: state store, then config keys, then defaults. */
  private persistedUrls(opts: RunOptions, saved: EnvironmentState): Partial<Record<ServiceRole, string>> {
    const env: Environment = opts.environment
    const pick = (role: 'backend' | 'frontend'): string => {
      const fromState: string | undefined = saved.urls?.[role]
      if (fromState !== undefined) return fromState
      const fromConfig: string | undefined = opts.values[configKey(env, role, 'url')]?.trim()
      if (fromConfig !== undefined && fromConfig.length > 0) return fromConfig
      return env.defaultUrls[role]
    }
    return { backend: pick('backend'), frontend: pick('frontend') }
  }

  private async smokeTest(opts: RunOptions, urls: Partial<Record<ServiceRole, string>>, warnings: string[]): Promise<SmokeReport> {
    logger.section('Smoke test')
    if (opts.smoke.settleMs > 0) {
      logger.info(`Waiting ${Math.round(opts.smoke.settleMs / 1000)}s for services to settle...`)
      await this.deps.clock.sleep(opts.smoke.settleMs, opts.signal)
    }
    const targets: { readonly name: string; readonly url: string; readonly predicate: HealthPredicate }[] = []
    const backend: string | undefined = urls.backend
    const frontend: string | undefined = urls.frontend
    const healthPath: string = opts.plan.find(s => s.role === 'backend')?.health?.path ?? '/health'
    if (backend !== undefined) {
      targets.push({ name: 'backend health', url: joinUrl(backend, healthPath), predicate: databaseConnected })
      for (const p of opts.smoke.apiPaths) targets.push({ name: `backend ${p}`, url: joinUrl(backend, p), predicate: statusOk })
    }
    if (frontend !== undefined) targets.push({ name: 'frontend', url: joinUrl(frontend, '/'), predicate: statusOk })
    const checks: SmokeCheck[] = []
    for (const t of targets) {
      if (opts.signal?.aborted === true) throw new AbortedError('during the smoke test')
      const outcome = await this.deps.verifier.verify({ url: t.url, predicate: t.predicate, policy: opts.smoke.policy, timeoutMs: opts.httpTimeoutMs }, opts.signal)
      if (outcome.healthy) {
        logger.success(`${t.name}: healthy (${t.url})`)
        checks.push({ name: t.name, url: t.url, healthy: true, attempts: outcome.attempts, status: outcome.status })
      } else {
        const msg = `${t.name} unhealthy at ${t.url}: ${outcome.lastError}`
        if (opts.smoke.mode === 'fail') logger.error(msg)
        else logger.warn(msg)
        warnings.push(msg)
        checks.push({ name: t.name, url: t.url, healthy: false, attempts: outcome.attempts, lastError: outcome.lastError })
      }
    }
    return { healthy: checks.every(c => c.healthy), checks }
  }
}

