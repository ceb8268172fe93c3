export interface HttpResponse {
  readonly status: number
  readonly body: string
}

export interface HttpGetOptions {
  readonly timeoutMs: number
  readonly signal?: AbortSignal
}

export interface HttpClient {
  get(url: string, opts: HttpGetOptions): Promise<HttpResponse>
}

/** HttpClient over the global fetch, with a per-request timeout. */
export class FetchHttpClient implements HttpClient {
  public async get(url: string, opts: HttpGetOptions): Promise<HttpResponse> {
    const ac = new AbortController()
    const timer: NodeJS.Timeout = setTimeout(() => ac.abort(new Error(`request timed out after ${opts.timeoutMs}ms`)), opts.timeoutMs)
    const onAbort = (): void => { ac.abort(opts.signal?.reason) }
    opts.signal?.addEventListener('abort', onAbort, { once: true })
    try {
      const res: Response = await fetch(url, { method: 'GET', redirect: 'follow', signal: ac.signal, headers: { accept: 'application/json, text/html;q=0.9, */*;q=0.8' } })
      const body: string = await res.text()
      return { status: res.status, body }
    } catch (err) {
      if (ac.signal.aborted && ac.signal.reason instanceof Error) throw ac.signal.reason
      throw err
    } finally {
      clearTimeout(timer)
      opts.signal?.removeEventListener('abort', onAbort)
    }
  }
}
