import type { HttpResponse, HttpTransport } from './transport.js'

export interface RecordedRequest {
  url: URL
  headers: Record<string, string>
}

type Route = (url: URL) => HttpResponse | Error | undefined

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return { status, body: new TextEncoder().encode(JSON.stringify(body)) }
}

export function bytesResponse(bytes: number[], status = 200): HttpResponse {
  return { status, body: Uint8Array.from(bytes) }
}

/**
 * In-process HttpTransport. Routes are tried in order; the first one that
 * returns a value answers the request. Unmatched requests get a 404.
 */
export class StubTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = []
  private readonly routes: Route[] = []

  on(pathname: string, respond: HttpResponse | Error | ((url: URL) => HttpResponse)): this {
    this.routes.push((url) => {
      if (!url.pathname.endsWith(pathname)) return undefined
      return typeof respond === 'function' ? respond(url) : respond
    })
    return this
  }

  async get(url: string, headers: Record<string, string>): Promise<HttpResponse> {
    const parsed = new URL(url)
    this.requests.push({ url: parsed, headers })

    for (const route of this.routes) {
      const result = route(parsed)
      if (result instanceof Error) throw result
      if (result) return result
    }
    return jsonResponse({ status_message: 'not found' }, 404)
  }
}
