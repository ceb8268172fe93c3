import { AbortedError, errorMessage } from './errors'

/** Time source for every wait in the deploy flow; tests swap in a simulated one. */
export interface Clock {
  now(): number
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: (): number => Date.now(),
  sleep: (ms: number, signal?: AbortSignal): Promise<void> => new Promise<void>((resolve) => {
    if (ms <= 0 || signal?.aborted === true) return resolve()
    const onAbort = (): void => { clearTimeout(timer); resolve() }
    const timer: NodeJS.Timeout = setTimeout(() => { signal?.removeEventListener('abort', onAbort); resolve() }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export interface PollPolicy {
  readonly intervalMs: number
  readonly maxAttempts: number
}

export interface PollAttempt {
  readonly attempt: number
  readonly maxAttempts: number
  readonly elapsedMs: number
}

export type PollOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number; readonly elapsedMs: number }
  | { readonly ok: false; readonly attempts: number; readonly elapsedMs: number; readonly lastError?: string }

/**
 * Thrown from a check to end polling immediately; the error is rethrown
 * to the caller instead of counting as a failed attempt.
 */
export class StopPolling extends Error {
  public constructor(public readonly inner: unknown) {
    super(errorMessage(inner))
    this.name = 'StopPolling'
  }
}

export interface PollArgs<T> {
  readonly policy: PollPolicy
  readonly clock: Clock
  /** Resolve a value to stop; `undefined` means "not yet". Thrown errors count as a failed attempt. */
  readonly check: (attempt: PollAttempt) => Promise<T | undefined>
  readonly signal?: AbortSignal
  readonly label?: string
  readonly onAttempt?: (attempt: PollAttempt, attemptError?: string) => void
}

/**
 * Bounded retry loop shared by deploy-status polling, connection-string
 * polling and health checks. Sleeps `intervalMs` between attempts (never
 * after the last one), so simulated time stays under intervalMs × maxAttempts.
 */
export async function pollUntil<T>(args: PollArgs<T>): Promise<PollOutcome<T>> {
  const maxAttempts: number = Math.max(1, Math.floor(args.policy.maxAttempts))
  const intervalMs: number = Math.max(0, args.policy.intervalMs)
  const t0: number = args.clock.now()
  let lastError: string | undefined
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (args.signal?.aborted === true) throw new AbortedError(`while waiting for ${args.label ?? 'a condition'}`)
    const info: PollAttempt = { attempt, maxAttempts, elapsedMs: args.clock.now() - t0 }
    let attemptError: string | undefined
    try {
      const value: T | undefined = await args.check(info)
      if (value !== undefined) return { ok: true, value, attempts: attempt, elapsedMs: args.clock.now() - t0 }
    } catch (err) {
      if (err instanceof StopPolling) throw err.inner
      attemptError = errorMessage(err)
      lastError = attemptError
    }
    args.onAttempt?.(info, attemptError)
    if (attempt < maxAttempts) await args.clock.sleep(intervalMs, args.signal)
  }
  return { ok: false, attempts: maxAttempts, elapsedMs: args.clock.now() - t0, lastError }
}
