import { describe, it, expect } from 'vitest'
import { resolve } from 'node:path'
import { buildPlan, validatePlan, serviceName, type ServicePlan, type ServiceSpec } from '../core/plan/service-spec'
import { resolveVariables } from '../core/plan/variables'
import { persistedSource, persistedKey } from '../core/plan/persisted'
import { resolveEnvironment } from '../core/environment/resolve'
import { ConfigError, UnresolvedVariableError } from '../utils/errors'
import type { DeploymentResult, ServiceRole } from '../types/deployment'
import { FakePlatform } from '../../tests/helpers/fakes'

const env = resolveEnvironment('staging', { RAILWAY_PROJECT_ID_STAGING: 'proj-1' }, 'shop')

function plan(values: Record<string, string> = {}): ServicePlan {
  return buildPlan({ env, config: {}, values, baseDir: '/repo' })
}

function spec(p: ServicePlan, role: ServiceRole): ServiceSpec {
  const s = p.find(x => x.role === role)
  if (s === undefined) throw new Error(`no ${role}`)
  return s
}

function deployed(role: ServiceRole, extra: Partial<DeploymentResult> = {}): DeploymentResult {
  return {
    role,
    service: serviceName(env, role),
    status: 'deployed',
    outputs: {},
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:01:00.000Z',
    transitions: ['Configuring', 'VariablesSet', 'Deploying', 'AwaitingReady', 'Verified'],
    ...extra
  }
}

describe('buildPlan', () => {
  it('orders database, backend, frontend with declared dependencies', () => {
    const p = plan()
    expect(p.map(s => s.name)).toEqual(['shop-database-staging', 'shop-backend-staging', 'shop-frontend-staging'])
    expect(p.map(s => s.dependsOn)).toEqual([[], ['database'], ['backend']])
    expect(spec(p, 'database').plugin).toBe('postgresql')
    expect(spec(p, 'database').exposesDomain).toBe(false)
    expect(spec(p, 'backend').sourceDir).toBe(resolve('/repo', 'backend'))
    expect(spec(p, 'backend').health).toEqual({ path: '/health', predicate: 'databaseConnected' })
    expect(spec(p, 'frontend').health).toEqual({ path: '/', predicate: 'statusOk' })
  })

  it('uses CORS_ORIGINS_{ENV}, then FRONTEND_URL_{ENV}, then the default frontend URL', () => {
    const cors = (p: ServicePlan): unknown => spec(p, 'backend').variables.find(v => v.name === 'CORS_ORIGINS')?.source
    expect(cors(plan({ CORS_ORIGINS_STAGING: 'https://a.test', FRONTEND_URL_STAGING: 'https://b.test' }))).toEqual({ kind: 'literal', value: 'https://a.test' })
    expect(cors(plan({ FRONTEND_URL_STAGING: 'https://b.test' }))).toEqual({ kind: 'literal', value: 'https://b.test' })
    expect(cors(plan())).toEqual({ kind: 'literal', value: 'https://shop-frontend-staging.railway.app' })
  })

  it('passes structural validation', () => {
    expect(() => validatePlan(plan())).not.toThrow()
  })
})

describe('validatePlan', () => {
  it('rejects a dependency that is not deployed earlier', () => {
    const [db, backend, frontend] = plan()
    expect(() => validatePlan([backend, db, frontend])).toThrow(ConfigError)
  })

  it('rejects references to roles outside dependsOn', () => {
    const p = plan()
    const frontend: ServiceSpec = { ...spec(p, 'frontend'), dependsOn: [] }
    expect(() => validatePlan([spec(p, 'database'), spec(p, 'backend'), frontend])).toThrow(/references backend, which is not in dependsOn/)
  })

  it('rejects empty literals and duplicate variables', () => {
    const p = plan()
    const db: ServiceSpec = {
      ...spec(p, 'database'),
      variables: [...spec(p, 'database').variables, { name: 'EXTRA', source: { kind: 'literal', value: ' ' } }, { name: 'ENVIRONMENT', source: { kind: 'literal', value: 'x' } }]
    }
    try {
      validatePlan([db])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      expect(err instanceof ConfigError ? err.issues : []).toEqual([
        'shop-database-staging: variable EXTRA is empty',
        'shop-database-staging: variable ENVIRONMENT declared twice'
      ])
    }
  })
})

describe('resolveVariables', () => {
  it('fails for the backend before the database has a result', async () => {
    const p = plan()
    await expect(resolveVariables(spec(p, 'backend'), new Map())).rejects.toBeInstanceOf(UnresolvedVariableError)
  })

  it('resolves references from producer results in declaration order', async () => {
    const p = plan()
    const results = new Map<ServiceRole, DeploymentResult>([
      ['database', deployed('database', { outputs: { DATABASE_URL: 'postgres://u:test-secret@db:5432/app' } })]
    ])
    const vars = await resolveVariables(spec(p, 'backend'), results)
    expect(vars).toEqual([
      { name: 'DATABASE_URL', value: 'postgres://u:test-secret@db:5432/app' },
      { name: 'ENVIRONMENT', value: 'staging' },
      { name: 'CORS_ORIGINS', value: 'https://shop-frontend-staging.railway.app' },
      { name: 'PORT', value: '8000' },
      { name: 'PYTHONDONTWRITEBYTECODE', value: '1' },
      { name: 'PYTHONUNBUFFERED', value: '1' },
      { name: 'PYTHONPATH', value: '/app' }
    ])
  })

  it('reads the URL output for frontend BACKEND_URL', async () => {
    const p = plan()
    const results = new Map<ServiceRole, DeploymentResult>([['backend', deployed('backend', { url: 'https://api.test' })]])
    const vars = await resolveVariables(spec(p, 'frontend'), results)
    expect(vars[0]).toEqual({ name: 'BACKEND_URL', value: 'https://api.test' })
  })

  it('ignores a failed producer', async () => {
    const p = plan()
    const results = new Map<ServiceRole, DeploymentResult>([['backend', deployed('backend', { status: 'failed', url: 'https://api.test' })]])
    await expect(resolveVariables(spec(p, 'frontend'), results)).rejects.toThrow('backend did not produce URL')
  })

  it('consults the fallback source when the producer did not run', async () => {
    const p = plan()
    const vars = await resolveVariables(spec(p, 'frontend'), new Map(), async (ref) => `https://saved-${ref.role}.test`)
    expect(vars[0]).toEqual({ name: 'BACKEND_URL', value: 'https://saved-backend.test' })
  })
})

describe('persistedSource', () => {
  const ref = { role: 'database', output: 'DATABASE_URL' } as const

  it('names the persisted config keys', () => {
    expect(persistedKey(env, ref)).toBe('DATABASE_URL_STAGING')
    expect(persistedKey(env, { role: 'backend', output: 'URL' })).toBe('BACKEND_URL_STAGING')
  })

  it('prefers the platform variable on the producer', async () => {
    const platform = new FakePlatform({ variables: { 'shop-database-staging:DATABASE_URL': 'postgres://platform' } })
    const source = persistedSource({ env, values: { DATABASE_URL_STAGING: 'postgres://config' }, state: {}, platform })
    expect(await source(ref)).toBe('postgres://platform')
    expect(platform.calls).toEqual(['getVariable:shop-database-staging'])
  })

  it('falls back to config when the platform read fails', async () => {
    const platform = new FakePlatform({ failures: ['getVariable:shop-database-staging'] })
    const source = persistedSource({ env, values: { DATABASE_URL_STAGING: 'postgres://config' }, state: {}, platform })
    expect(await source(ref)).toBe('postgres://config')
  })

  it('resolves URLs from state, then config, then the default', async () => {
    const backend = { role: 'backend', output: 'URL' } as const
    const fromState = persistedSource({ env, values: { BACKEND_URL_STAGING: 'https://config.test' }, state: { urls: { backend: 'https://state.test' } } })
    const fromConfig = persistedSource({ env, values: { BACKEND_URL_STAGING: 'https://config.test' }, state: {} })
    const fromDefault = persistedSource({ env, values: {}, state: {} })
    expect(await fromState(backend)).toBe('https://state.test')
    expect(await fromConfig(backend)).toBe('https://config.test')
    expect(await fromDefault(backend)).toBe('https://shop-backend-staging.railway.app')
  })

  it('has no default for the database URL', async () => {
    const source = persistedSource({ env, values: {}, state: {} })
    expect(await source(ref)).toBeUndefined()
  })
})
