export type SmokeMode = 'warn' | 'fail'

export interface PollPolicyConfig {
  readonly intervalMs?: number
  readonly maxAttempts?: number
}

export interface ServiceConfig {
  /** Directory uploaded by `railway up`, relative to the config file */
  readonly sourceDir?: string
  /** Path checked after deploy (backend defaults to /health, frontend to /) */
  readonly healthPath?: string
  /** Extra literal variables set on the service */
  readonly variables?: Readonly<Record<string, string>>
}

export interface DatabaseConfig extends Omit<ServiceConfig, 'healthPath'> {
  readonly bootstrapFile?: string
  readonly table?: string
  readonly requiredColumns?: readonly string[]
}

/** Shape of `deploy.config.json`; every field is optional. */
export interface DeployConfig {
  readonly appName?: string
  readonly database?: DatabaseConfig
  readonly backend?: ServiceConfig
  readonly frontend?: ServiceConfig
  readonly polling?: {
    readonly deploy?: PollPolicyConfig
    readonly database?: PollPolicyConfig
    readonly health?: PollPolicyConfig
    readonly smoke?: PollPolicyConfig
  }
  readonly smoke?: {
    readonly mode?: SmokeMode
    readonly settleMs?: number
    readonly apiPaths?: readonly string[]
  }
}
