import type { ExecResult, ProcessRunner } from '../../utils/process'
import { has } from '../../utils/process'
import { PlatformCommandFailedError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { constants } from '../../constants'
import type { VariableSet } from '../../types/deployment'
import type { DeployHandle, PlatformClient, PlatformStatus, StatusReport } from './platform-client'

const MASK = '******'

export interface RailwayClientOptions {
  readonly runner: ProcessRunner
  /** Working directory for every command except `up`, which runs in the source dir */
  readonly cwd: string
  readonly bin?: string
  readonly timeoutMs?: number
}

/** Output lines split into cells; `service list` prints plain lines or box-drawn tables. */
function tokens(line: string): string[] {
  return line.split(/[\s│|]+/).map(t => t.trim()).filter(t => t.length > 0)
}

export function parseServiceList(stdout: string, name: string): boolean {
  return stdout.split(/\r?\n/).some(line => tokens(line).includes(name))
}

const FAILED_RE = /\b(failed|crashed|error|removed)\b/
const PROGRESS_RE = /\b(building|deploying|initializing|queued|waiting|in[ -]progress)\b/
const DEPLOYED_RE = /\b(deployed|success|active|running)\b/

function classify(text: string): PlatformStatus {
  if (FAILED_RE.test(text)) return 'failed'
  if (PROGRESS_RE.test(text)) return 'in-progress'
  if (DEPLOYED_RE.test(text)) return 'deployed'
  return 'unknown'
}

/**
 * Map `railway status` output to a PlatformStatus. A `Status:` line wins;
 * otherwise the whole output is scanned.
 */
export function parseStatus(stdout: string): StatusReport {
  const lower: string = stdout.toLowerCase()
  const m = /^\s*(?:deployment\s+)?status\s*:\s*(.+)$/m.exec(lower)
  if (m !== null) {
    const raw: string = m[1].trim()
    return { status: classify(raw), raw }
  }
  const status: PlatformStatus = classify(lower)
  return status === 'unknown' ? { status } : { status, raw: status }
}

const HOST_RE = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)+$/i

/** First URL (or bare hostname) in the output, as `https://host`. */
export function parseDomain(stdout: string): string | undefined {
  const url = /https?:\/\/[^\s"'<>]+/.exec(stdout)
  if (url !== null) {
    try { return `https://${new URL(url[0]).host}` } catch { /* fall through to hostnames */ }
  }
  for (const line of stdout.split(/\r?\n/)) {
    for (const tok of tokens(line)) {
      const host: string = tok.replace(/[.,;:]+$/, '')
      if (HOST_RE.test(host)) return `https://${host.toLowerCase()}`
    }
  }
  return undefined
}

export function parseLogsUrl(stdout: string): string | undefined {
  const urls: string[] = stdout.match(/https?:\/\/[^\s"'<>]+/g) ?? []
  return urls.find(u => /logs|deployments|railway\.(app|com)\/project/.test(u)) ?? urls[0]
}

function isAlreadyExists(res: ExecResult): boolean {
  const text: string = `${res.stdout}\n${res.stderr}`.toLowerCase()
  return text.includes('already exists') || text.includes('already added')
}

/**
 * PlatformClient over the `railway` CLI. Arguments are passed without a
 * shell; tokens and variable values are masked in any command text that
 * reaches logs or errors.
 */
export class RailwayClient implements PlatformClient {
  private readonly bin: string
  private readonly secrets: string[] = []

  public constructor(private readonly opts: RailwayClientOptions) {
    this.bin = opts.bin ?? constants.PLATFORM_BIN
  }

  public async isInstalled(): Promise<boolean> {
    return has(this.opts.runner, this.bin)
  }

  public async authenticate(token: string): Promise<void> {
    if (token.length > 0) this.secrets.push(token)
    await this.run(['login', '--token', token], `${this.bin} login --token ${MASK}`)
  }

  public async linkProject(projectId: string): Promise<void> {
    await this.run(['link', projectId])
  }

  public async serviceExists(name: string): Promise<boolean> {
    const res: ExecResult = await this.run(['service', 'list'])
    return parseServiceList(res.stdout, name)
  }

  public async createService(name: string): Promise<void> {
    await this.run(['service', 'create', '--name', name], undefined, isAlreadyExists)
  }

  public async addPlugin(name: string, plugin: string): Promise<void> {
    await this.run(['plugin', 'add', plugin, '--service', name], undefined, isAlreadyExists)
  }

  public async setVariables(name: string, vars: VariableSet): Promise<void> {
    if (vars.length === 0) return
    const pairs: string[] = vars.map(v => `${v.name}=${v.value}`)
    const shown: string = `${this.bin} variables set ${vars.map(v => `${v.name}=${MASK}`).join(' ')} --service ${name}`
    await this.run(['variables', 'set', ...pairs, '--service', name], shown)
  }

  public async getVariable(name: string, key: string): Promise<string | undefined> {
    const res: ExecResult = await this.run(['variables', 'get', key, '--service', name])
    const value: string = res.stdout.trim()
    return value.length > 0 ? value : undefined
  }

  public async deploy(name: string, sourceDir: string): Promise<DeployHandle> {
    const startedAt: string = new Date().toISOString()
    const res: ExecResult = await this.run(['up', '--service', name, '--detach'], undefined, undefined, sourceDir)
    const logsUrl: string | undefined = parseLogsUrl(res.stdout)
    return logsUrl !== undefined ? { service: name, startedAt, logsUrl } : { service: name, startedAt }
  }

  public async pollStatus(name: string): Promise<StatusReport> {
    const res: ExecResult = await this.run(['status', '--service', name])
    return parseStatus(res.stdout)
  }

  public async resolveDomain(name: string): Promise<string | undefined> {
    const res: ExecResult = await this.run(['domain', '--service', name])
    return parseDomain(res.stdout)
  }

  private redactors(): RegExp[] {
    return this.secrets.map(s => new RegExp(s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g'))
  }

  private async run(args: readonly string[], shown?: string, tolerate?: (res: ExecResult) => boolean, cwd?: string): Promise<ExecResult> {
    const command: string = shown ?? [this.bin, ...args].join(' ')
    logger.debug(`$ ${command}`)
    const res: ExecResult = await this.opts.runner.exec(this.bin, args, {
      cwd: cwd ?? this.opts.cwd,
      timeoutMs: this.opts.timeoutMs ?? constants.PLATFORM_TIMEOUT_MS,
      redactors: this.redactors()
    })
    if (res.ok) return res
    if (tolerate !== undefined && tolerate(res)) {
      logger.debug(`${command}: already present, continuing`)
      return res
    }
    throw new PlatformCommandFailedError(command, res.code ?? -1, res.stderr.trim() !== '' ? res.stderr : res.stdout)
  }
}
