import { appendFile } from 'node:fs/promises'
import { colors, padVisible } from './colors'
import { logger } from './logger'
import { errorMessage } from './errors'
import type { DeploymentResult, RunReport } from '../types/deployment'

function fmtMs(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return '—'
  const s = Math.round(ms / 1000)
  const m = Math.floor(s / 60)
  const r = s % 60
  return `${m}m ${r}s`
}

function durationOf(startedAt: string, finishedAt: string): number {
  return Date.parse(finishedAt) - Date.parse(startedAt)
}

function statusCell(r: DeploymentResult): string {
  if (r.status === 'deployed') return colors.green(r.status)
  if (r.status === 'pending') return colors.dim(r.status)
  return colors.red(r.status)
}

/** Per-service table printed at the end of a human-mode run. */
export function renderSummaryTable(report: RunReport): string[] {
  const lines: string[] = []
  lines.push(colors.bold(`Summary (${report.environment}, ${report.target})`))
  const header: string = `  ${padVisible('SERVICE', 28)} ${padVisible('STATUS', 10)} URL`
  lines.push(colors.dim(header))
  for (const r of report.results) {
    lines.push(`  ${padVisible(r.service, 28)} ${padVisible(statusCell(r), 10)} ${r.url ?? '—'}`)
    if (r.error !== undefined) lines.push(`    ${colors.red('✖')} ${r.error.step}: ${r.error.message.split('\n')[0]}`)
  }
  if (report.smoke !== undefined) {
    const healthy: number = report.smoke.checks.filter(c => c.healthy).length
    lines.push(`  Smoke test: ${healthy}/${report.smoke.checks.length} healthy`)
  }
  for (const w of report.warnings) lines.push(`  ${colors.yellow('!')} ${w}`)
  lines.push(`  Result: ${report.ok ? colors.green(report.status) : colors.red(report.status)} in ${fmtMs(durationOf(report.startedAt, report.finishedAt))}`)
  return lines
}

export function printRunSummary(report: RunReport): void {
  logger.info('\n' + renderSummaryTable(report).join('\n'))
}

/** Markdown appended to GITHUB_STEP_SUMMARY. */
export function renderStepSummary(report: RunReport): string {
  const rows: string[] = report.results.map(r => `| ${r.role} | ${r.service} | ${r.status} | ${r.url ?? '—'} |`)
  return [
    `## Deploy Summary (${report.environment})`,
    '',
    `- Target: ${report.target}`,
    `- Result: ${report.status}`,
    '',
    '| Role | Service | Status | URL |',
    '| --- | --- | --- | --- |',
    ...rows,
    ...(report.warnings.length > 0 ? ['', '### Warnings', '', ...report.warnings.map(w => `- ${w}`)] : []),
    ''
  ].join('\n')
}

/** `KEY=value` lines for GITHUB_OUTPUT; only values the run actually produced. */
export function githubOutputLines(report: RunReport): string[] {
  const lines: string[] = []
  const by = (role: DeploymentResult['role']): DeploymentResult | undefined => report.results.find(r => r.role === role && r.status === 'deployed')
  const dbUrl: string | undefined = by('database')?.outputs.DATABASE_URL
  if (dbUrl !== undefined) lines.push(`DATABASE_URL=${dbUrl}`)
  const backend: string | undefined = by('backend')?.url
  if (backend !== undefined) lines.push(`BACKEND_URL=${backend}`)
  const frontend: string | undefined = by('frontend')?.url
  if (frontend !== undefined) lines.push(`FRONTEND_URL=${frontend}`)
  return lines
}

export interface CiOutputTargets {
  readonly outputFile?: string
  readonly stepSummaryFile?: string
}

export async function writeCiOutputs(report: RunReport, targets: CiOutputTargets): Promise<void> {
  try {
    if (targets.outputFile) {
      const lines: string[] = githubOutputLines(report)
      if (lines.length > 0) await appendFile(targets.outputFile, lines.join('\n') + '\n', 'utf8')
    }
    if (targets.stepSummaryFile) await appendFile(targets.stepSummaryFile, renderStepSummary(report) + '\n', 'utf8')
  } catch (err) {
    logger.warn(`Could not write CI outputs: ${errorMessage(err)}`)
  }
}
