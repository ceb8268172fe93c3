import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadDeployConfig } from '../core/config/load'
import { ConfigError } from '../utils/errors'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tierdeploy-config-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('loadDeployConfig', () => {
  it('returns an empty config when deploy.config.json is absent', async () => {
    expect(await loadDeployConfig({ cwd: dir })).toEqual({ config: {}, baseDir: dir })
  })

  it('loads a valid file and resolves paths against its directory', async () => {
    const config = { appName: 'shop', smoke: { mode: 'fail', apiPaths: ['/items', '/health'] }, polling: { deploy: { intervalMs: 5000, maxAttempts: 10 } } }
    await writeFile(join(dir, 'deploy.config.json'), JSON.stringify(config))
    const loaded = await loadDeployConfig({ cwd: dir })
    expect(loaded.config).toEqual(config)
    expect(loaded.baseDir).toBe(dir)
    expect(loaded.path).toBe(join(dir, 'deploy.config.json'))
  })

  it('rejects unknown keys with the offending path', async () => {
    await writeFile(join(dir, 'deploy.config.json'), JSON.stringify({ backend: { sourceDir: 'api', helthPath: '/health' } }))
    const err = await loadDeployConfig({ cwd: dir }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConfigError)
    expect(err instanceof ConfigError ? err.issues : []).toEqual(['/backend must NOT have additional properties'])
  })

  it('rejects a bad smoke mode', async () => {
    await writeFile(join(dir, 'deploy.config.json'), JSON.stringify({ smoke: { mode: 'loud' } }))
    await expect(loadDeployConfig({ cwd: dir })).rejects.toThrow(/\/smoke\/mode must be equal to one of the allowed values/)
  })

  it('reports malformed JSON', async () => {
    await writeFile(join(dir, 'deploy.config.json'), '{ "appName": ')
    await expect(loadDeployConfig({ cwd: dir })).rejects.toThrow(/^Invalid JSON in /)
  })

  it('requires an explicit --config path to exist', async () => {
    await expect(loadDeployConfig({ cwd: dir, path: 'custom.json' })).rejects.toThrow(`Config file not found: ${join(dir, 'custom.json')}`)
  })
})
