import { spawn, type SpawnOptions } from 'node:child_process'
import { EOL } from 'node:os'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  readonly timeoutMs?: number
  readonly redactors?: readonly RegExp[]
}

/**
 * Runs external programs without a shell, so arguments (variable values
 * in particular) reach the child verbatim.
 */
export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
}

function redact(s: string, patterns?: readonly RegExp[]): string {
  if (!patterns || patterns.length === 0) return s
  let out = s
  for (const re of patterns) out = out.replace(re, '***')
  return out
}

function wantsCi(): boolean {
  return process.env.TD_FORCE_CI === '1' || process.env.TD_JSON === '1' || process.env.CI === 'true' || process.env.CI === '1' || process.env.GITHUB_ACTIONS === 'true'
}

function buildEnv(extra?: Readonly<Record<string, string>>): NodeJS.ProcessEnv {
  const merged: NodeJS.ProcessEnv = extra !== undefined ? { ...process.env, ...extra } : { ...process.env }
  // Keep provider CLIs non-interactive and plain-text when running unattended
  if (wantsCi()) {
    merged.CI = '1'
    if (!merged.FORCE_COLOR) merged.FORCE_COLOR = '0'
    if (!merged.TERM) merged.TERM = 'dumb'
  }
  return merged
}

export class NodeProcessRunner implements ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const nodeOpts: SpawnOptions = { cwd: opts?.cwd, env: buildEnv(opts?.env), shell: false, windowsHide: true }
    const child = spawn(bin, [...args], nodeOpts)
    let stdout = ''
    let stderr = ''
    // decode as a stream so multi-byte characters split across chunks survive
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (s: string) => { stdout += s })
    child.stderr?.on('data', (s: string) => { stderr += s })

    let timeoutTimer: NodeJS.Timeout | undefined
    if (opts?.timeoutMs && opts.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => {
        stderr += `${EOL}timed out after ${opts.timeoutMs}ms${EOL}`
        try { child.kill('SIGTERM') } catch { /* already exited */ }
      }, opts.timeoutMs)
    }

    return new Promise<ExecResult>((resolve) => {
      let settled = false
      const finish = (code: number | null): void => {
        if (settled) return
        settled = true
        if (timeoutTimer) clearTimeout(timeoutTimer)
        resolve({ ok: code === 0, code, stdout: redact(stdout, opts?.redactors), stderr: redact(stderr, opts?.redactors) })
      }
      // ENOENT and friends: the binary could not be started at all
      child.on('error', (err: Error) => { stderr += `${err.message}${EOL}`; finish(127) })
      child.on('close', (code: number | null) => { finish(code) })
    })
  }
}

export async function has(runner: ProcessRunner, bin: string): Promise<boolean> {
  const res: ExecResult = await runner.exec(bin, ['--version'], { timeoutMs: 15_000 })
  return res.ok
}
