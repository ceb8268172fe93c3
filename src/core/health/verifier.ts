import type { Clock, PollOutcome, PollPolicy } from '../../utils/retry'
import { pollUntil } from '../../utils/retry'
import type { HttpClient, HttpResponse } from './http'
import type { HealthPredicateName } from '../plan/service-spec'

export type PredicateResult = { readonly ok: true } | { readonly ok: false; readonly reason: string }
export type HealthPredicate = (res: HttpResponse) => PredicateResult

export interface HealthProbe {
  readonly url: string
  readonly predicate: HealthPredicate
  readonly policy: PollPolicy
  readonly timeoutMs: number
}

export type HealthOutcome =
  | { readonly healthy: true; readonly attempts: number; readonly status: number }
  | { readonly healthy: false; readonly attempts: number; readonly lastError: string }

const OK: PredicateResult = { ok: true }
const HEALTHY_WORDS: readonly string[] = ['connected', 'ok', 'healthy']

export const statusOk: HealthPredicate = (res) => res.status === 200 ? OK : { ok: false, reason: `HTTP ${res.status}` }

/** Accepts `"connected"` as well as a nested `{ "status": "connected" }`. */
function healthyWord(value: unknown): boolean {
  if (typeof value === 'string') return HEALTHY_WORDS.includes(value.toLowerCase())
  if (typeof value === 'object' && value !== null && 'status' in value) return healthyWord(value.status)
  return false
}

function parseJson(body: string): unknown {
  try { return JSON.parse(body) } catch { return undefined }
}

/**
 * 200 plus a body that reports a live database. JSON bodies are checked on
 * `database`, itself a word or an object with a `status` (or `status` when absent); plain text must mention "connected".
 */
export const databaseConnected: HealthPredicate = (res) => {
  if (res.status !== 200) return { ok: false, reason: `HTTP ${res.status}` }
  const data: unknown = parseJson(res.body)
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    const db: unknown = 'database' in data ? data.database : undefined
    if (db !== undefined) {
      return healthyWord(db) ? OK : { ok: false, reason: `database: ${JSON.stringify(db)}` }
    }
    const status: unknown = 'status' in data ? data.status : undefined
    return typeof status === 'string' && ['ok', 'healthy'].includes(status.toLowerCase()) ? OK : { ok: false, reason: `status: ${JSON.stringify(status ?? null)}` }
  }
  return res.body.toLowerCase().includes('connected') ? OK : { ok: false, reason: 'response does not report a database connection' }
}

export const predicates: Readonly<Record<HealthPredicateName, HealthPredicate>> = { statusOk, databaseConnected }

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

/**
 * Bounded HTTP polling check. Never throws for an unhealthy target; the
 * caller decides whether Unhealthy is fatal.
 */
export class HealthVerifier {
  public constructor(private readonly http: HttpClient, private readonly clock: Clock) {}

  public async verify(target: HealthProbe, signal?: AbortSignal): Promise<HealthOutcome> {
    const outcome: PollOutcome<number> = await pollUntil<number>({
      policy: target.policy,
      clock: this.clock,
      signal,
      label: target.url,
      check: async () => {
        const res: HttpResponse = await this.http.get(target.url, { timeoutMs: target.timeoutMs, signal })
        const verdict: PredicateResult = target.predicate(res)
        if (!verdict.ok) throw new Error(verdict.reason)
        return res.status
      }
    })
    if (outcome.ok) return { healthy: true, attempts: outcome.attempts, status: outcome.value }
    return { healthy: false, attempts: outcome.attempts, lastError: outcome.lastError ?? 'no response' }
  }
}
