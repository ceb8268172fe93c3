import type { VariableSet } from '../../types/deployment'

export type PlatformStatus = 'deployed' | 'in-progress' | 'failed' | 'unknown'

export interface DeployHandle {
  readonly service: string
  readonly startedAt: string
  readonly logsUrl?: string
}

export interface StatusReport {
  readonly status: PlatformStatus
  /** Raw status word as printed by the platform, for logs */
  readonly raw?: string
}

/**
 * The PlatformClient is the only component that talks to the hosting
 * platform. Each operation is one external invocation; a non-zero exit
 * surfaces as PlatformCommandFailedError and nothing is retried here.
 */
export interface PlatformClient {
  isInstalled(): Promise<boolean>
  authenticate(token: string): Promise<void>
  linkProject(projectId: string): Promise<void>
  serviceExists(name: string): Promise<boolean>
  createService(name: string): Promise<void>
  addPlugin(name: string, plugin: string): Promise<void>
  setVariables(name: string, vars: VariableSet): Promise<void>
  getVariable(name: string, key: string): Promise<string | undefined>
  deploy(name: string, sourceDir: string): Promise<DeployHandle>
  pollStatus(name: string): Promise<StatusReport>
  resolveDomain(name: string): Promise<string | undefined>
}
