export interface HttpResponse {
  status: number
  body: Uint8Array
}

/**
 * The only capability the client needs from the network. Tests substitute
 * an in-process implementation.
 */
export interface HttpTransport {
  get(url: string, headers: Record<string, string>): Promise<HttpResponse>
}

export interface FetchTransportOptions {
  /** Abort each request after this many milliseconds. */
  timeoutMs?: number
  fetchImpl?: typeof fetch
}

export function createFetchTransport(
  options: FetchTransportOptions = {},
): HttpTransport {
  const { timeoutMs = 10_000, fetchImpl = fetch } = options

  return {
    async get(url, headers) {
      const response = await fetchImpl(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      })
      const body = new Uint8Array(await response.arrayBuffer())
      return { status: response.status, body }
    },
  }
}
