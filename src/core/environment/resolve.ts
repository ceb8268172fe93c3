import type { Environment, EnvironmentName } from '../../types/deployment'
import { InvalidEnvironmentError, MissingProjectIdError } from '../../utils/errors'

const KEYS: Readonly<Record<EnvironmentName, { readonly key: Environment['key']; readonly suffix: Environment['suffix'] }>> = {
  staging: { key: 'STAGING', suffix: 'staging' },
  production: { key: 'PROD', suffix: 'prod' }
}

function isEnvironmentName(raw: string): raw is EnvironmentName {
  return raw === 'staging' || raw === 'production'
}

/** Exactly `staging` or `production`; case-sensitive. */
export function parseEnvironmentName(raw: string): EnvironmentName {
  if (!isEnvironmentName(raw)) throw new InvalidEnvironmentError(raw)
  return raw
}

export function defaultUrl(appName: string, role: 'backend' | 'frontend', suffix: Environment['suffix']): string {
  return `https://${appName}-${role}-${suffix}.railway.app`
}

/**
 * Resolve the deployment environment from raw input and configuration values.
 * Pure: reads only `values`, never the process environment directly.
 */
export function resolveEnvironment(raw: string, values: Readonly<Record<string, string | undefined>>, appName: string): Environment {
  const name: EnvironmentName = parseEnvironmentName(raw)
  const { key, suffix } = KEYS[name]
  const scopedKey = `RAILWAY_PROJECT_ID_${key}`
  const projectId: string = (values[scopedKey] ?? '').trim() || (values.RAILWAY_PROJECT_ID ?? '').trim()
  if (projectId.length === 0) throw new MissingProjectIdError(name, scopedKey)
  return Object.freeze({
    name,
    key,
    suffix,
    projectId,
    appName,
    defaultUrls: Object.freeze({
      backend: defaultUrl(appName, 'backend', suffix),
      frontend: defaultUrl(appName, 'frontend', suffix)
    })
  })
}

/** `{ROLE}_{FIELD}_{ENV}`, e.g. `BACKEND_URL_PROD`. */
export function configKey(env: Pick<Environment, 'key'>, role: string, field: string): string {
  return `${role.toUpperCase()}_${field.toUpperCase()}_${env.key}`
}
