export type ErrorCode =
  | 'INVALID_ENVIRONMENT'
  | 'MISSING_PROJECT_ID'
  | 'MISSING_TOKEN'
  | 'INVALID_CONFIG'
  | 'PLATFORM_COMMAND_FAILED'
  | 'UNRESOLVED_VARIABLE'
  | 'TIMED_OUT'
  | 'DEPLOY_FAILED'
  | 'HEALTH_CHECK_FAILED'
  | 'SCHEMA_INIT_FAILED'
  | 'ABORTED'
  | 'UNKNOWN'

export interface ErrorInfo {
  readonly code: ErrorCode
  readonly message: string
  readonly remedy?: string
  readonly command?: string
  readonly exitCode?: number
  readonly elapsedMs?: number
  readonly lastError?: string
}

/**
 * Base class for every failure the deploy flow knows how to report.
 * Configuration errors are raised before any platform call is made.
 */
export abstract class DeployError extends Error {
  public abstract readonly code: ErrorCode
  public readonly remedy?: string

  protected constructor(message: string, remedy?: string) {
    super(message)
    this.name = new.target.name
    this.remedy = remedy
  }

  public toInfo(): ErrorInfo {
    return { code: this.code, message: this.message, remedy: this.remedy }
  }
}

export class InvalidEnvironmentError extends DeployError {
  public readonly code = 'INVALID_ENVIRONMENT' as const
  public constructor(public readonly value: string) {
    super(`ENVIRONMENT must be either 'staging' or 'production' (got '${value}')`, 'Set ENVIRONMENT=staging or ENVIRONMENT=production, or pass --env')
  }
}

export class MissingProjectIdError extends DeployError {
  public readonly code = 'MISSING_PROJECT_ID' as const
  public constructor(public readonly environment: string, public readonly key: string) {
    super(`Railway project ID not found for environment: ${environment}`, `Set ${key} in the environment or the env file`)
  }
}

export class MissingTokenError extends DeployError {
  public readonly code = 'MISSING_TOKEN' as const
  public constructor() {
    super('RAILWAY_TOKEN is required', 'Export RAILWAY_TOKEN or pass --token')
  }
}

export class ConfigError extends DeployError {
  public readonly code = 'INVALID_CONFIG' as const
  public constructor(message: string, public readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'Fix deploy.config.json or pass --config <path>')
  }
}

export class PlatformCommandFailedError extends DeployError {
  public readonly code = 'PLATFORM_COMMAND_FAILED' as const
  public constructor(public readonly command: string, public readonly exitCode: number, public readonly stderr: string) {
    super(`Command failed (exit ${exitCode}): ${command}${stderr.trim() !== '' ? `\n${stderr.trim()}` : ''}`, mapPlatformError(stderr).remedy)
  }

  public override toInfo(): ErrorInfo {
    return { ...super.toInfo(), command: this.command, exitCode: this.exitCode }
  }
}

export class CliNotInstalledError extends DeployError {
  public readonly code = 'PLATFORM_COMMAND_FAILED' as const
  public constructor(bin = 'railway') {
    super(`${bin} CLI not found on PATH`, 'Install the Railway CLI: npm install -g @railway/cli')
  }
}

export class UnresolvedVariableError extends DeployError {
  public readonly code = 'UNRESOLVED_VARIABLE' as const
  public constructor(public readonly service: string, public readonly variable: string, detail: string) {
    super(`Variable ${variable} for ${service} is unresolved: ${detail}`, 'Deploy the producing service first, or set the matching {ROLE}_{FIELD}_{ENV} value')
  }
}

export class DeployTimeoutError extends DeployError {
  public readonly code = 'TIMED_OUT' as const
  public constructor(public readonly service: string, public readonly elapsedMs: number, what: string, public readonly lastError?: string) {
    super(
      `${service}: ${what} did not complete after ${Math.round(elapsedMs / 1000)}s${lastError !== undefined ? ` (last error: ${lastError})` : ''}`,
      'The deploy may still be in progress. Check `railway status` and rerun when ready'
    )
  }

  public override toInfo(): ErrorInfo {
    return { ...super.toInfo(), elapsedMs: this.elapsedMs, ...(this.lastError !== undefined ? { lastError: this.lastError } : {}) }
  }
}

export class DeploymentFailedError extends DeployError {
  public readonly code = 'DEPLOY_FAILED' as const
  public constructor(public readonly service: string, detail: string) {
    super(`${service}: platform reported a failed deployment (${detail})`, `Inspect build logs with: railway logs --service ${service}`)
  }
}

export class HealthCheckFailedError extends DeployError {
  public readonly code = 'HEALTH_CHECK_FAILED' as const
  public constructor(public readonly service: string, public readonly url: string, lastError: string) {
    super(`${service}: health check against ${url} failed: ${lastError}`)
  }
}

export class SchemaInitError extends DeployError {
  public readonly code = 'SCHEMA_INIT_FAILED' as const
  public constructor(message: string) {
    super(`Schema initialization failed: ${message}`, 'Verify DATABASE_URL and run: deploy-all schema --verify-only')
  }
}

export class AbortedError extends DeployError {
  public readonly code = 'ABORTED' as const
  public constructor(where: string) {
    super(`Aborted by operator ${where}`)
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Normalize anything thrown into the shape carried by results and summaries. */
export function describeError(err: unknown): ErrorInfo {
  if (err instanceof DeployError) return err.toInfo()
  return { code: 'UNKNOWN', message: errorMessage(err) }
}

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/** Map raw `railway` CLI output to a remedy the operator can act on. */
export function mapPlatformError(raw: string): { readonly reason: string; readonly remedy?: string } {
  const txt = normalize(raw)
  if (txt.includes('unauthorized') || txt.includes('not logged in') || txt.includes('invalid token') || txt.includes('login')) {
    return { reason: 'auth', remedy: 'Check RAILWAY_TOKEN; create a new project token in the Railway dashboard if it expired' }
  }
  if (txt.includes('project not found') || txt.includes('no linked project') || txt.includes('project does not exist')) {
    return { reason: 'project', remedy: 'Verify RAILWAY_PROJECT_ID_STAGING / RAILWAY_PROJECT_ID_PROD' }
  }
  if (txt.includes('service not found') || txt.includes('no service')) {
    return { reason: 'service', remedy: 'Run the full deploy once so the service is created' }
  }
  if (txt.includes('command not found') || txt.includes('enoent')) {
    return { reason: 'cli', remedy: 'Install the Railway CLI: npm install -g @railway/cli' }
  }
  if (txt.includes('network') || txt.includes('etimedout') || txt.includes('econnreset') || txt.includes('timeout')) {
    return { reason: 'network', remedy: 'Retry the command. If it persists, check connectivity or Railway status' }
  }
  return { reason: 'unknown' }
}
