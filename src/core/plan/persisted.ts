import type { Environment } from '../../types/deployment'
import type { PlatformClient } from '../platform/platform-client'
import type { EnvironmentState } from '../state/state'
import type { ConfigValues } from '../config/env-file'
import { configKey } from '../environment/resolve'
import { errorMessage } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { serviceName, type VariableRef } from './service-spec'
import type { ReferenceSource } from './variables'

/** Config key holding a persisted output, e.g. BACKEND_URL_PROD or DATABASE_URL_STAGING. */
export function persistedKey(env: Environment, ref: VariableRef): string {
  return ref.output === 'URL' ? configKey(env, ref.role, 'url') : `${ref.output}_${env.key}`
}

/**
 * Fallback for references whose producer is not part of this run. Tried in
 * order: the platform variable on the producer (outputs only), the state
 * store, the `{ROLE}_{FIELD}_{ENV}` config key, then the default URL.
 */
export function persistedSource(args: {
  readonly env: Environment
  readonly values: ConfigValues
  readonly state: EnvironmentState
  readonly platform?: PlatformClient
}): ReferenceSource {
  const { env, values, state, platform } = args
  return async (ref: VariableRef): Promise<string | undefined> => {
    if (ref.output !== 'URL' && platform !== undefined) {
      const producer: string = serviceName(env, ref.role)
      try {
        const v: string | undefined = await platform.getVariable(producer, ref.output)
        if (v !== undefined) return v
      } catch (err) {
        logger.debug(`Could not read ${ref.output} from ${producer}: ${errorMessage(err)}`)
      }
    }
    if (ref.output === 'URL') {
      const saved: string | undefined = state.urls?.[ref.role]
      if (saved !== undefined) return saved
    }
    const fromConfig: string | undefined = values[persistedKey(env, ref)]?.trim()
    if (fromConfig !== undefined && fromConfig.length > 0) return fromConfig
    if (ref.output === 'URL' && ref.role !== 'database') {
      logger.warn(`No recorded ${ref.role} URL; using default ${env.defaultUrls[ref.role]}`)
      return env.defaultUrls[ref.role]
    }
    return undefined
  }
}
