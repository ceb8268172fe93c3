import { isAbsolute, resolve } from 'node:path'
import type { Environment, ServiceRole } from '../../types/deployment'
import type { DeployConfig } from '../../types/config'
import type { ConfigValues } from '../config/env-file'
import { configKey } from '../environment/resolve'
import { ConfigError } from '../../utils/errors'
import { constants } from '../../constants'

/** Output a producer publishes; `URL` is the service's public URL. */
export type OutputName = 'URL' | 'DATABASE_URL'

export interface VariableRef {
  readonly role: ServiceRole
  readonly output: OutputName
}

export type VariableSource =
  | { readonly kind: 'literal'; readonly value: string }
  | { readonly kind: 'ref'; readonly ref: VariableRef }

export interface VariableDecl {
  readonly name: string
  readonly source: VariableSource
}

export type HealthPredicateName = 'statusOk' | 'databaseConnected'

export interface HealthSpec {
  readonly path: string
  readonly predicate: HealthPredicateName
}

export interface ServiceSpec {
  readonly role: ServiceRole
  readonly name: string
  readonly sourceDir: string
  readonly plugin?: string
  readonly variables: readonly VariableDecl[]
  readonly dependsOn: readonly ServiceRole[]
  readonly exposesDomain: boolean
  readonly health?: HealthSpec
}

/** Ordered deploy plan; position is the execution order. */
export type ServicePlan = readonly ServiceSpec[]

export function serviceName(env: Pick<Environment, 'appName' | 'suffix'>, role: ServiceRole): string {
  return `${env.appName}-${role}-${env.suffix}`
}

const literal = (name: string, value: string): VariableDecl => ({ name, source: { kind: 'literal', value } })
const ref = (name: string, role: ServiceRole, output: OutputName): VariableDecl => ({ name, source: { kind: 'ref', ref: { role, output } } })

function extras(vars: Readonly<Record<string, string>> | undefined): VariableDecl[] {
  return Object.entries(vars ?? {}).map(([k, v]) => literal(k, v))
}

function dir(baseDir: string, configured: string | undefined, fallback: string): string {
  const d: string = configured ?? fallback
  return isAbsolute(d) ? d : resolve(baseDir, d)
}

function pick(values: ConfigValues, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v: string | undefined = values[k]?.trim()
    if (v !== undefined && v.length > 0) return v
  }
  return undefined
}

/**
 * Build the three-tier plan: database, then backend, then frontend.
 * Static values (CORS origins, ports) are fixed here; cross-service values
 * stay late-bound references until their producer has deployed.
 */
export function buildPlan(args: {
  readonly env: Environment
  readonly config: DeployConfig
  readonly values: ConfigValues
  readonly baseDir: string
}): ServicePlan {
  const { env, config, values, baseDir } = args
  const cors: string = pick(values, configKey(env, 'cors', 'origins'), configKey(env, 'frontend', 'url')) ?? env.defaultUrls.frontend
  const database: ServiceSpec = {
    role: 'database',
    name: serviceName(env, 'database'),
    sourceDir: dir(baseDir, config.database?.sourceDir, 'db'),
    plugin: 'postgresql',
    variables: [literal('ENVIRONMENT', env.name), ...extras(config.database?.variables)],
    dependsOn: [],
    exposesDomain: false
  }
  const backend: ServiceSpec = {
    role: 'backend',
    name: serviceName(env, 'backend'),
    sourceDir: dir(baseDir, config.backend?.sourceDir, 'backend'),
    variables: [
      ref('DATABASE_URL', 'database', 'DATABASE_URL'),
      literal('ENVIRONMENT', env.name),
      literal('CORS_ORIGINS', cors),
      literal('PORT', '8000'),
      literal('PYTHONDONTWRITEBYTECODE', '1'),
      literal('PYTHONUNBUFFERED', '1'),
      literal('PYTHONPATH', '/app'),
      ...extras(config.backend?.variables)
    ],
    dependsOn: ['database'],
    exposesDomain: true,
    health: { path: config.backend?.healthPath ?? constants.DEFAULT_HEALTH_PATH, predicate: 'databaseConnected' }
  }
  const frontend: ServiceSpec = {
    role: 'frontend',
    name: serviceName(env, 'frontend'),
    sourceDir: dir(baseDir, config.frontend?.sourceDir, 'frontend'),
    variables: [
      ref('BACKEND_URL', 'backend', 'URL'),
      literal('ENVIRONMENT', env.name),
      literal('PORT', '80'),
      ...extras(config.frontend?.variables)
    ],
    dependsOn: ['backend'],
    exposesDomain: true,
    health: { path: config.frontend?.healthPath ?? '/', predicate: 'statusOk' }
  }
  return [database, backend, frontend]
}

const VAR_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Structural checks run before any platform call: unique names, dependencies
 * ordered earlier, every reference backed by a declared dependency and no
 * empty literals.
 */
export function validatePlan(plan: ServicePlan): void {
  const issues: string[] = []
  const seenNames = new Set<string>()
  const seenRoles = new Set<ServiceRole>()
  for (const spec of plan) {
    if (seenNames.has(spec.name)) issues.push(`duplicate service name ${spec.name}`)
    if (seenRoles.has(spec.role)) issues.push(`duplicate role ${spec.role}`)
    for (const dep of spec.dependsOn) {
      if (!seenRoles.has(dep)) issues.push(`${spec.name} depends on ${dep}, which is not deployed before it`)
    }
    const varNames = new Set<string>()
    for (const v of spec.variables) {
      if (!VAR_NAME_RE.test(v.name)) issues.push(`${spec.name}: invalid variable name '${v.name}'`)
      if (varNames.has(v.name)) issues.push(`${spec.name}: variable ${v.name} declared twice`)
      varNames.add(v.name)
      if (v.source.kind === 'literal' && v.source.value.trim().length === 0) issues.push(`${spec.name}: variable ${v.name} is empty`)
      if (v.source.kind === 'ref' && !spec.dependsOn.includes(v.source.ref.role)) {
        issues.push(`${spec.name}: variable ${v.name} references ${v.source.ref.role}, which is not in dependsOn`)
      }
    }
    seenNames.add(spec.name)
    seenRoles.add(spec.role)
  }
  if (issues.length > 0) throw new ConfigError('Invalid deploy plan', issues)
}
