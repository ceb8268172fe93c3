import { parse } from 'dotenv'
import { join } from 'node:path'
import { fsx } from '../../utils/fs'
import { ConfigError } from '../../utils/errors'
import { constants } from '../../constants'
import type { EnvironmentName } from '../../types/deployment'

export type ConfigValues = Readonly<Record<string, string | undefined>>

const VAR_RE = /\$\{([A-Za-z0-9_]+)\}|\$([A-Za-z0-9_]+)/g
const MAX_PASSES = 5

/**
 * Parse dotenv text, dropping blank values and expanding `${VAR}` / `$VAR`
 * from the file first, then from `base`. Unknown references expand to ''.
 */
export function parseEnvText(buf: string, base: ConfigValues = {}): Readonly<Record<string, string>> {
  const parsed: Record<string, string> = parse(buf)
  const trimmed: Record<string, string> = {}
  for (const [k, v] of Object.entries(parsed)) {
    const tv: string = v.trim()
    if (tv.length > 0) trimmed[k] = tv
  }
  const resolveVar = (name: string): string | undefined => {
    if (Object.prototype.hasOwnProperty.call(trimmed, name)) return trimmed[name]
    return base[name]
  }
  const expandOnce = (value: string): string => value.replace(VAR_RE, (_m: string, g1?: string, g2?: string) => {
    const key: string = (g1 ?? g2) ?? ''
    return (key !== '' ? resolveVar(key) : undefined) ?? ''
  })
  const expanded: Record<string, string> = {}
  for (const [k, v] of Object.entries(trimmed)) {
    let cur: string = v
    for (let i = 0; i < MAX_PASSES; i++) {
      const next: string = expandOnce(cur)
      if (next === cur) break
      cur = next
    }
    expanded[k] = cur
  }
  return expanded
}

export async function parseEnvFile(args: { readonly path: string; readonly base?: ConfigValues }): Promise<Readonly<Record<string, string>> | null> {
  const buf: string | null = await fsx.readText(args.path)
  if (buf === null) return null
  return parseEnvText(buf, args.base ?? {})
}

export function defaultEnvFilePath(cwd: string, environment: EnvironmentName): string {
  return join(cwd, constants.ENV_FILE_DIR, `${environment}.env`)
}

export interface LoadedConfigValues {
  readonly values: ConfigValues
  /** Path of the env file that was applied, if any */
  readonly envFile?: string
}

/**
 * Process env overlaid by the env file. An explicit `--env-file` that is
 * missing is a configuration error; the per-environment default is optional.
 */
export async function loadConfigValues(args: {
  readonly cwd: string
  readonly environment: EnvironmentName
  readonly envFile?: string
  readonly base: ConfigValues
}): Promise<LoadedConfigValues> {
  const explicit: boolean = typeof args.envFile === 'string' && args.envFile.length > 0
  const path: string = explicit && args.envFile !== undefined ? args.envFile : defaultEnvFilePath(args.cwd, args.environment)
  const fromFile = await parseEnvFile({ path, base: args.base })
  if (fromFile === null) {
    if (explicit) throw new ConfigError(`Env file not found: ${path}`)
    return { values: { ...args.base } }
  }
  return { values: { ...args.base, ...fromFile }, envFile: path }
}
