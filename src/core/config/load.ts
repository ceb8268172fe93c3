import { join, isAbsolute, resolve } from 'node:path'
import { fsx } from '../../utils/fs'
import { ConfigError, errorMessage } from '../../utils/errors'
import { compileSchema, formatSchemaErrors } from '../../utils/schema'
import { deployConfigSchema } from '../../schemas/deploy-config.schema'
import { constants } from '../../constants'
import type { DeployConfig } from '../../types/config'

const validateConfig = compileSchema<DeployConfig>(deployConfigSchema)

export interface LoadedDeployConfig {
  readonly config: DeployConfig
  /** Directory relative paths in the config resolve against */
  readonly baseDir: string
  readonly path?: string
}

/**
 * Load and validate `deploy.config.json`. The default file is optional;
 * an explicit `--config` path must exist.
 */
export async function loadDeployConfig(args: { readonly cwd: string; readonly path?: string }): Promise<LoadedDeployConfig> {
  const explicit: boolean = typeof args.path === 'string' && args.path.length > 0
  const path: string = explicit && args.path !== undefined
    ? (isAbsolute(args.path) ? args.path : resolve(args.cwd, args.path))
    : join(args.cwd, constants.CONFIG_FILE)
  let raw: unknown
  try {
    raw = await fsx.readJson(path)
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${path}: ${errorMessage(err)}`)
  }
  if (raw === undefined) {
    if (explicit) throw new ConfigError(`Config file not found: ${path}`)
    return { config: {}, baseDir: args.cwd }
  }
  if (!validateConfig(raw)) throw new ConfigError(`Invalid ${path}`, formatSchemaErrors(validateConfig.errors))
  return { config: raw, baseDir: resolve(path, '..'), path }
}
