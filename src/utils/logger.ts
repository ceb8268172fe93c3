import { dirname } from 'node:path'
import { mkdir, appendFile } from 'node:fs/promises'
import { colorize, type ColorName } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  readonly debug: (msg: string) => void
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly highlight: (msg: string, color: ColorName) => string
  readonly json: (val: unknown) => void
  readonly event: (val: Readonly<Record<string, unknown>>) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setJsonCompact: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setSummaryOnly: (on: boolean) => void
  readonly setJsonFile: (path: string) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly addRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly isJsonMode: () => boolean
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let jsonCompact = false
let ndjson = false
let timestampsOn = false
let summaryOnly = false
let jsonFilePath: string | undefined
let redactors: RegExp[] = []

async function safeAppend(path: string, line: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await appendFile(path, line, 'utf8')
  } catch { /* file sinks are best-effort */ }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function toPattern(p: string | RegExp): RegExp | undefined {
  if (p instanceof RegExp) return p.global ? p : new RegExp(p.source, p.flags + 'g')
  if (p.length < 4) return undefined
  return new RegExp(escapeRegExp(p), 'g')
}

function applyRedaction(msg: string): string {
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function enabled(kind: LogLevel): boolean {
  return LEVEL_RANK[kind] <= LEVEL_RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly || !enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

function isFinal(val: unknown): boolean {
  return typeof val === 'object' && val !== null && 'final' in val && val.final === true
}

function emitJson(val: unknown, compact: boolean): void {
  const v: unknown = enrichJson(val)
  const line: string = applyRedaction(compact ? JSON.stringify(v) : JSON.stringify(v, null, 2))
  // eslint-disable-next-line no-console
  console.log(line)
  if (jsonFilePath) void safeAppend(jsonFilePath, applyRedaction(JSON.stringify(v)) + '\n')
}

export const logger: Logger = {
  debug: (msg: string): void => { write('debug', msg) },
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  success: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`))
  },
  note: (msg: string): void => {
    if (jsonOnly || !enabled('info')) return
    write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`))
  },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('magenta', bar)}\n${colorize('bold', applyRedaction(title))}\n${colorize('magenta', bar)}`)
  },
  highlight: (msg: string, color: ColorName): string => colorize(color, msg),
  json: (val: unknown): void => {
    if (summaryOnly && !isFinal(val)) return
    emitJson(val, ndjson || jsonCompact)
  },
  // Streaming events only surface under --ndjson
  event: (val: Readonly<Record<string, unknown>>): void => {
    if (!ndjson || summaryOnly) return
    emitJson(val, true)
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setJsonCompact: (on: boolean): void => { jsonCompact = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) { jsonOnly = true; jsonCompact = true } },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setSummaryOnly: (on: boolean): void => { summaryOnly = on },
  setJsonFile: (path: string): void => { jsonFilePath = path.length > 0 ? path : undefined },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map(toPattern).filter((r): r is RegExp => r !== undefined)
  },
  addRedactors: (patterns: readonly (string | RegExp)[]): void => {
    for (const p of patterns) {
      const re = toPattern(p)
      if (re !== undefined && !redactors.some((r) => r.source === re.source)) redactors.push(re)
    }
  },
  isJsonMode: (): boolean => jsonOnly
}
