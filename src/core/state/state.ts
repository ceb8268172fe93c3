import { join } from 'node:path'
import { homedir } from 'node:os'
import { fsx } from '../../utils/fs'
import { constants } from '../../constants'
import type { EnvironmentName, ServiceRole } from '../../types/deployment'

export interface EnvironmentState {
  readonly urls?: Readonly<Partial<Record<ServiceRole, string>>>
  readonly services?: Readonly<Partial<Record<ServiceRole, string>>>
  readonly updatedAt?: string
}

export type RootState = Readonly<Partial<Record<EnvironmentName, EnvironmentState>>>

export function getConfigDir(): string {
  const override: string | undefined = process.env.TD_CONFIG_DIR
  if (override && override.length > 0) return override
  const plat: NodeJS.Platform = process.platform
  if (plat === 'win32') {
    const base: string = process.env.LOCALAPPDATA || process.env.APPDATA || join(homedir(), 'AppData', 'Local')
    return join(base, 'TierDeploy', 'Config')
  }
  if (plat === 'darwin') return join(homedir(), 'Library', 'Application Support', 'TierDeploy')
  const xdg: string | undefined = process.env.XDG_CONFIG_HOME
  return join(xdg || join(homedir(), '.config'), 'tierdeploy')
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function roleMap(v: unknown): Partial<Record<ServiceRole, string>> | undefined {
  if (!isRecord(v)) return undefined
  const out: Partial<Record<ServiceRole, string>> = {}
  for (const role of ['database', 'backend', 'frontend'] as const) {
    const val: unknown = v[role]
    if (typeof val === 'string' && val.length > 0) out[role] = val
  }
  return out
}

function envState(v: unknown): EnvironmentState | undefined {
  if (!isRecord(v)) return undefined
  return {
    urls: roleMap(v.urls),
    services: roleMap(v.services),
    updatedAt: typeof v.updatedAt === 'string' ? v.updatedAt : undefined
  }
}

/**
 * Persists the last deployed URLs per environment in the OS config dir
 * (or `.tierdeploy/state.json` when TD_STATE_IN_PROJECT=1). Secrets such as
 * DATABASE_URL are never written.
 */
export class StateStore {
  public readonly file: string

  public constructor(args: { readonly cwd: string }) {
    const forceProject: boolean = process.env.TD_STATE_IN_PROJECT === '1'
    const dir: string = forceProject ? join(args.cwd, constants.STATE_DIR) : getConfigDir()
    this.file = join(dir, constants.STATE_FILE)
  }

  public async read(): Promise<RootState> {
    let raw: unknown
    try { raw = await fsx.readJson(this.file) } catch { return {} /* corrupt state is treated as empty */ }
    if (!isRecord(raw)) return {}
    return { staging: envState(raw.staging), production: envState(raw.production) }
  }

  public async readEnvironment(env: EnvironmentName): Promise<EnvironmentState> {
    return (await this.read())[env] ?? {}
  }

  public async recordDeployment(env: EnvironmentName, entries: readonly { readonly role: ServiceRole; readonly service: string; readonly url?: string }[], now: Date = new Date()): Promise<void> {
    const root: RootState = await this.read()
    const prev: EnvironmentState = root[env] ?? {}
    const urls: Partial<Record<ServiceRole, string>> = { ...prev.urls }
    const services: Partial<Record<ServiceRole, string>> = { ...prev.services }
    for (const e of entries) {
      services[e.role] = e.service
      if (e.url !== undefined) urls[e.role] = e.url
    }
    await fsx.writeJson(this.file, { ...root, [env]: { urls, services, updatedAt: now.toISOString() } })
  }
}
