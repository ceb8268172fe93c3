import type { ErrorInfo } from '../utils/errors'

export type EnvironmentName = 'staging' | 'production'
export type ServiceRole = 'database' | 'backend' | 'frontend'

export const SERVICE_ROLES: readonly ServiceRole[] = ['database', 'backend', 'frontend']

/**
 * Resolved once per run and frozen; every service name and config key is
 * derived from it.
 */
export interface Environment {
  readonly name: EnvironmentName
  /** Upper-case key used in `{ROLE}_{FIELD}_{ENV}` config names */
  readonly key: 'STAGING' | 'PROD'
  /** Suffix used in service names, e.g. `shop-backend-prod` */
  readonly suffix: 'staging' | 'prod'
  readonly projectId: string
  readonly appName: string
  readonly defaultUrls: Readonly<Record<'backend' | 'frontend', string>>
}

export interface VariableEntry {
  readonly name: string
  readonly value: string
}

/** Fully resolved variables for one service, in declaration order. */
export type VariableSet = readonly VariableEntry[]

export type DeploymentStatus = 'pending' | 'deployed' | 'failed' | 'timed-out'

export type DeployerState = 'Configuring' | 'VariablesSet' | 'Deploying' | 'AwaitingReady' | 'Verified' | 'Failed' | 'TimedOut'

export interface DeploymentFailure extends ErrorInfo {
  /** State the deployer was in when it failed */
  readonly step: DeployerState | 'SchemaInit'
}

export interface DeploymentResult {
  readonly role: ServiceRole
  readonly service: string
  readonly status: DeploymentStatus
  readonly url?: string
  /** Values produced for dependents, e.g. the database's DATABASE_URL */
  readonly outputs: Readonly<Record<string, string>>
  readonly error?: DeploymentFailure
  readonly startedAt: string
  readonly finishedAt: string
  readonly transitions: readonly DeployerState[]
}

export type RunTarget = 'all' | ServiceRole | 'verify'

export interface SmokeCheck {
  readonly name: string
  readonly url: string
  readonly healthy: boolean
  readonly attempts: number
  readonly status?: number
  readonly lastError?: string
}

export interface SmokeReport {
  readonly healthy: boolean
  readonly checks: readonly SmokeCheck[]
}

export type RunStatus = 'success' | 'failed' | 'aborted'

export interface RunReport {
  readonly ok: boolean
  readonly action: 'deploy'
  readonly status: RunStatus
  readonly environment: EnvironmentName
  readonly target: RunTarget
  readonly results: readonly DeploymentResult[]
  readonly warnings: readonly string[]
  readonly smoke?: SmokeReport
  readonly error?: ErrorInfo
  readonly startedAt: string
  readonly finishedAt: string
  readonly final: true
}
