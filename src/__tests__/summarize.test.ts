import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { renderSummaryTable, renderStepSummary, githubOutputLines, writeCiOutputs } from '../utils/summarize'
import type { DeploymentResult, RunReport } from '../types/deployment'

function result(extra: Partial<DeploymentResult> & Pick<DeploymentResult, 'role' | 'service'>): DeploymentResult {
  return {
    status: 'deployed',
    outputs: {},
    startedAt: '2024-01-01T00:00:00.000Z',
    finishedAt: '2024-01-01T00:01:00.000Z',
    transitions: [],
    ...extra
  }
}

const report: RunReport = {
  ok: false,
  action: 'deploy',
  status: 'failed',
  environment: 'staging',
  target: 'all',
  results: [
    result({ role: 'database', service: 'shop-database-staging', outputs: { DATABASE_URL: 'postgres://u:test-secret@db/app' } }),
    result({
      role: 'backend',
      service: 'shop-backend-staging',
      status: 'failed',
      url: 'https://api.test',
      error: { code: 'HEALTH_CHECK_FAILED', message: 'shop-backend-staging: health check failed\nmore', step: 'AwaitingReady' }
    })
  ],
  warnings: ['No domain reported'],
  startedAt: '2024-01-01T00:00:00.000Z',
  finishedAt: '2024-01-01T00:02:05.000Z',
  final: true
}

describe('renderSummaryTable', () => {
  it('lists each service, its first error line and the duration', () => {
    expect(renderSummaryTable(report)).toEqual([
      'Summary (staging, all)',
      `  ${'SERVICE'.padEnd(28)} ${'STATUS'.padEnd(10)} URL`,
      `  ${'shop-database-staging'.padEnd(28)} ${'deployed'.padEnd(10)} —`,
      `  ${'shop-backend-staging'.padEnd(28)} ${'failed'.padEnd(10)} https://api.test`,
      '    ✖ AwaitingReady: shop-backend-staging: health check failed',
      '  ! No domain reported',
      '  Result: failed in 2m 5s'
    ])
  })
})

describe('renderStepSummary', () => {
  it('renders a markdown table with warnings', () => {
    expect(renderStepSummary(report)).toBe([
      '## Deploy Summary (staging)',
      '',
      '- Target: all',
      '- Result: failed',
      '',
      '| Role | Service | Status | URL |',
      '| --- | --- | --- | --- |',
      '| database | shop-database-staging | deployed | — |',
      '| backend | shop-backend-staging | failed | https://api.test |',
      '',
      '### Warnings',
      '',
      '- No domain reported',
      ''
    ].join('\n'))
  })
})

describe('githubOutputLines', () => {
  it('only exports values from deployed services', () => {
    expect(githubOutputLines(report)).toEqual(['DATABASE_URL=postgres://u:test-secret@db/app'])
  })
})

describe('writeCiOutputs', () => {
  let dir: string
  beforeEach(async () => { dir = await mkdtemp(join(tmpdir(), 'tierdeploy-ci-')) })
  afterEach(async () => { await rm(dir, { recursive: true, force: true }) })

  it('appends outputs and the step summary', async () => {
    const outputFile = join(dir, 'output')
    const stepSummaryFile = join(dir, 'summary.md')
    await writeCiOutputs(report, { outputFile, stepSummaryFile })
    expect(await readFile(outputFile, 'utf8')).toBe('DATABASE_URL=postgres://u:test-secret@db/app\n')
    expect(await readFile(stepSummaryFile, 'utf8')).toBe(renderStepSummary(report) + '\n')
  })
})
