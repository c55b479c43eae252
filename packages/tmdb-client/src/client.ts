import type { Logger } from 'pino'
import type { z } from 'zod'
import { TmdbNetworkError } from './errors.js'
import { createFetchTransport, type HttpResponse, type HttpTransport } from './transport.js'
import {
  ActorDetailsSchema,
  DiscoverMoviesResponseSchema,
  PersonSearchHitSchema,
  PersonSearchResponseSchema,
  type ActorDetails,
  type MovieSummary,
} from './types.js'

export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3'
export const TMDB_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p'
export const DEFAULT_IMAGE_SIZE = 'w92'

export interface TmdbClientOptions {
  /** TMDB API read access token, sent as a bearer credential. */
  token: string
  transport?: HttpTransport
  apiBaseUrl?: string
  imageBaseUrl?: string
  imageSize?: string
  logger?: Logger
}

export function resolveImageUrl(
  imagePath: string,
  size: string = DEFAULT_IMAGE_SIZE,
  baseUrl: string = TMDB_IMAGE_BASE_URL,
): string {
  return `${baseUrl}/${size}${imagePath}`
}

export class TmdbClient {
  private readonly headers: Readonly<Record<string, string>>
  private readonly transport: HttpTransport
  private readonly apiBaseUrl: string
  private readonly imageBaseUrl: string
  private readonly imageSize: string
  private readonly logger?: Logger

  constructor(options: TmdbClientOptions) {
    if (!options.token) {
      throw new Error('TmdbClient requires a non-empty token')
    }
    this.headers = Object.freeze({
      Accept: 'application/json',
      Authorization: `Bearer ${options.token}`,
    })
    this.transport = options.transport ?? createFetchTransport()
    this.apiBaseUrl = (options.apiBaseUrl ?? TMDB_API_BASE_URL).replace(/\/$/, '')
    this.imageBaseUrl = (options.imageBaseUrl ?? TMDB_IMAGE_BASE_URL).replace(/\/$/, '')
    this.imageSize = options.imageSize ?? DEFAULT_IMAGE_SIZE
    this.logger = options.logger
  }

  /**
   * Returns the id of the first search hit, in TMDB's relevance order.
   * No disambiguation is attempted.
   */
  async findActorIdByName(name: string): Promise<number | null> {
    const data = await this.getJson(
      '/search/person',
      { query: name, language: 'en-US' },
      PersonSearchResponseSchema,
    )

    for (const item of data.results ?? []) {
      const hit = PersonSearchHitSchema.safeParse(item)
      if (hit.success) {
        return hit.data.id
      }
    }
    return null
  }

  async fetchActorById(actorId: number): Promise<ActorDetails> {
    return this.getJson(`/person/${actorId}`, {}, ActorDetailsSchema)
  }

  async fetchActorDetails(name: string): Promise<ActorDetails | null> {
    const actorId = await this.findActorIdByName(name)
    if (actorId === null) {
      return null
    }
    return this.fetchActorById(actorId)
  }

  async fetchMoviesByActor(actorId: number): Promise<MovieSummary[]> {
    const data = await this.getJson(
      '/discover/movie',
      { with_cast: String(actorId) },
      DiscoverMoviesResponseSchema,
    )
    return data.results
  }

  resolveImageUrl(imagePath: string): string {
    return resolveImageUrl(imagePath, this.imageSize, this.imageBaseUrl)
  }

  async fetchImageAsBase64(imagePath: string): Promise<string> {
    const response = await this.send(this.resolveImageUrl(imagePath))
    return Buffer.from(response.body).toString('base64')
  }

  private async getJson<T extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: T,
  ): Promise<z.output<T>> {
    const url = new URL(`${this.apiBaseUrl}${endpoint}`)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value)
    }

    const response = await this.send(url.toString())

    let json: unknown
    try {
      json = JSON.parse(Buffer.from(response.body).toString('utf8'))
    } catch (error) {
      throw new TmdbNetworkError(`TMDB returned a non-JSON body for ${endpoint}`, {
        url: url.toString(),
        status: response.status,
        cause: error,
      })
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')
      throw new TmdbNetworkError(`Unexpected TMDB response for ${endpoint}: ${issues}`, {
        url: url.toString(),
        status: response.status,
        cause: parsed.error,
      })
    }
    return parsed.data
  }

  private async send(url: string): Promise<HttpResponse> {
    let response: HttpResponse
    try {
      response = await this.transport.get(url, { ...this.headers })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.logger?.debug({ url, err: error }, 'TMDB request failed')
      throw new TmdbNetworkError(`TMDB request failed: ${reason}`, { url, cause: error })
    }

    this.logger?.debug({ url, status: response.status }, 'TMDB response')

    if (response.status < 200 || response.status > 299) {
      const hint = response.status === 401 ? ' (check TMDB_TOKEN)' : ''
      throw new TmdbNetworkError(`TMDB API error: HTTP ${response.status}${hint}`, {
        url,
        status: response.status,
      })
    }
    return response
  }
}
