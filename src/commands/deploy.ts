import type { Command } from 'commander'
import type { RunReport, RunTarget } from '../types/deployment'
import type { SmokeMode } from '../types/config'
import { buildPlan, validatePlan, type ServicePlan } from '../core/plan/service-spec'
import { Orchestrator } from '../core/deploy/orchestrator'
import { HealthVerifier } from '../core/health/verifier'
import { SchemaInitializer } from '../core/schema/bootstrap'
import { ConfigError, describeError, type ErrorInfo } from '../utils/errors'
import { compileSchema, checkAgainst } from '../utils/schema'
import { deploySummarySchema } from '../schemas/deploy-summary.schema'
import { printRunSummary, writeCiOutputs } from '../utils/summarize'
import { logger } from '../utils/logger'
import { constants } from '../constants'
import {
  clockFor,
  httpFor,
  loadCommandContext,
  platformFor,
  policiesFrom,
  schemaTargetFrom,
  stateFor,
  type CommandContext,
  type CommandDeps,
  type EnvironmentOptions
} from './context'

export interface DeployOptions extends EnvironmentOptions {
  readonly smoke?: string
  readonly dryRun?: boolean
  readonly json?: boolean
}

export interface DeployOutcome {
  readonly exitCode: number
  readonly report?: RunReport
}

const TARGET_ALIASES: Readonly<Record<string, RunTarget>> = {
  all: 'all',
  database: 'database',
  db: 'database',
  backend: 'backend',
  api: 'backend',
  frontend: 'frontend',
  web: 'frontend',
  verify: 'verify',
  test: 'verify'
}

export const TARGETS_HELP: string = [
  '',
  'Targets:',
  '  (none)              Deploy database, backend and frontend in order, then smoke test',
  '  database | db       Deploy only the database service',
  '  backend | api       Deploy only the backend (DATABASE_URL from the platform or config)',
  '  frontend | web      Deploy only the frontend (BACKEND_URL from state or config)',
  '  verify | test       Run the smoke test against the recorded URLs',
  '',
  'Environment:',
  '  ENVIRONMENT                     staging | production (or --env)',
  '  RAILWAY_TOKEN                   Railway token (or --token)',
  '  RAILWAY_PROJECT_ID_STAGING      Project for staging',
  '  RAILWAY_PROJECT_ID_PROD         Project for production',
  ''
].join('\n')

export function parseTarget(raw: string | undefined): RunTarget | undefined {
  if (raw === undefined || raw === '') return 'all'
  return Object.prototype.hasOwnProperty.call(TARGET_ALIASES, raw) ? TARGET_ALIASES[raw] : undefined
}

function parseSmokeMode(raw: string | undefined): SmokeMode | undefined {
  if (raw === undefined) return undefined
  if (raw === 'warn' || raw === 'fail') return raw
  throw new ConfigError(`--smoke must be 'warn' or 'fail' (got '${raw}')`)
}

function describePlan(plan: ServicePlan): object[] {
  return plan.map(s => ({
    service: s.name,
    role: s.role,
    sourceDir: s.sourceDir,
    plugin: s.plugin,
    dependsOn: s.dependsOn,
    variables: s.variables.map(v => v.source.kind === 'ref' ? `${v.name}=<${v.source.ref.role}.${v.source.ref.output}>` : `${v.name}=******`)
  }))
}

function printPlan(ctx: CommandContext, target: RunTarget, plan: ServicePlan): void {
  logger.section(`Plan for ${ctx.environment.name} (project ${ctx.environment.projectId})`)
  for (const s of plan) {
    if (target !== 'all' && target !== s.role) continue
    logger.info(`${s.name} <- ${s.sourceDir}${s.plugin !== undefined ? ` [plugin ${s.plugin}]` : ''}`)
    for (const v of s.variables) {
      logger.info(`  ${v.name}=${v.source.kind === 'ref' ? `<${v.source.ref.role}.${v.source.ref.output}>` : '******'}`)
    }
  }
}

function emitFailure(opts: DeployOptions, target: RunTarget | undefined, error: ErrorInfo): void {
  if (opts.json === true || logger.isJsonMode()) {
    logger.json({ ok: false, action: 'deploy', target, error, final: true })
    return
  }
  logger.error(error.message)
  if (error.remedy !== undefined) logger.note(`Try: ${error.remedy}`)
}

const validateSummary = compileSchema<unknown>(deploySummarySchema)

/**
 * Resolve configuration, then run the orchestrator for `rawTarget`.
 * Returns the exit code instead of exiting so callers (and tests) decide.
 */
export async function runDeploy(rawTarget: string | undefined, opts: DeployOptions, deps: CommandDeps = {}): Promise<DeployOutcome> {
  const target: RunTarget | undefined = parseTarget(rawTarget)
  if (target === undefined) {
    logger.error(`Unknown target '${rawTarget ?? ''}'`)
    logger.info(`Usage: deploy-all [database|db|backend|api|frontend|web|verify|test] [options]\n${TARGETS_HELP}`)
    return { exitCode: 1 }
  }
  try {
    if (opts.json === true) logger.setJsonOnly(true)
    const ctx: CommandContext = await loadCommandContext(opts, deps)
    const smokeMode: SmokeMode = parseSmokeMode(opts.smoke) ?? ctx.config.smoke?.mode ?? 'warn'
    const plan: ServicePlan = buildPlan({ env: ctx.environment, config: ctx.config, values: ctx.values, baseDir: ctx.baseDir })
    validatePlan(plan)
    if (opts.dryRun === true) {
      if (logger.isJsonMode()) logger.json({ ok: true, action: 'deploy', mode: 'dry-run', environment: ctx.environment.name, target, plan: describePlan(plan), final: true })
      else printPlan(ctx, target, plan)
      return { exitCode: 0 }
    }
    const policies = policiesFrom(ctx.config)
    const clock = clockFor(deps)
    const orchestrator = new Orchestrator({
      platform: platformFor(ctx, deps),
      clock,
      verifier: new HealthVerifier(httpFor(deps), clock),
      state: stateFor(ctx, deps),
      schema: { initializer: new SchemaInitializer(deps.sqlFactory), target: schemaTargetFrom(ctx) }
    })
    logger.section(`Deploying ${target === 'all' ? 'all services' : target} to ${ctx.environment.name}`)
    const report: RunReport = await orchestrator.run({
      environment: ctx.environment,
      plan,
      token: ctx.token,
      target,
      values: ctx.values,
      policies: { deploy: policies.deploy, database: policies.database, health: policies.health },
      smoke: {
        mode: smokeMode,
        settleMs: ctx.config.smoke?.settleMs ?? constants.DEFAULT_SETTLE_MS,
        apiPaths: ctx.config.smoke?.apiPaths ?? constants.DEFAULT_API_PATHS,
        policy: policies.smoke
      },
      httpTimeoutMs: constants.HTTP_TIMEOUT_MS,
      signal: deps.signal
    })
    if (logger.isJsonMode()) logger.json({ ...report, ...checkAgainst(validateSummary, report) })
    else printRunSummary(report)
    await writeCiOutputs(report, { outputFile: ctx.values.GITHUB_OUTPUT, stepSummaryFile: ctx.values.GITHUB_STEP_SUMMARY })
    return { exitCode: report.ok ? 0 : 1, report }
  } catch (err) {
    emitFailure(opts, target, describeError(err))
    return { exitCode: 1 }
  }
}

/**
 * Register the root `deploy-all [target]` action.
 */
export function registerDeployCommand(program: Command): void {
  program
    .argument('[target]', 'database|db|backend|api|frontend|web|verify|test (default: all)')
    .option('--env <environment>', 'Target environment: staging | production (defaults to ENVIRONMENT)')
    .option('--token <token>', 'Railway token (defaults to RAILWAY_TOKEN)')
    .option('--config <path>', `Path to ${constants.CONFIG_FILE}`)
    .option('--env-file <path>', `Env file overlay (defaults to ${constants.ENV_FILE_DIR}/<environment>.env)`)
    .option('--smoke <mode>', 'Smoke test failure handling: warn | fail')
    .option('--dry-run', 'Print the resolved plan without calling Railway')
    .addHelpText('after', TARGETS_HELP)
    .action(async (target: string | undefined, opts: DeployOptions): Promise<void> => {
      const ac = new AbortController()
      let interrupts = 0
      const onSignal = (sig: NodeJS.Signals): void => {
        interrupts++
        if (interrupts > 1) process.exit(130)
        logger.warn(`${sig} received: stopping after the current step (press again to exit now)`)
        ac.abort()
      }
      process.on('SIGINT', onSignal)
      process.on('SIGTERM', onSignal)
      try {
        const json: boolean = opts.json === true || program.opts<{ json?: boolean }>().json === true
        const outcome: DeployOutcome = await runDeploy(target, { ...opts, json }, { signal: ac.signal })
        if (outcome.exitCode !== 0) process.exitCode = outcome.exitCode
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
