/**
 * Raised for any failed exchange with TMDB: the request never completed,
 * the server answered with a non-2xx status, or the body did not match the
 * expected shape.
 */
export class TmdbNetworkError extends Error {
  readonly url: string
  readonly status?: number

  constructor(
    message: string,
    options: { url: string; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause })
    this.name = 'TmdbNetworkError'
    this.url = options.url
    this.status = options.status
  }
}
