export {
  TmdbClient,
  resolveImageUrl,
  DEFAULT_IMAGE_SIZE,
  TMDB_API_BASE_URL,
  TMDB_IMAGE_BASE_URL,
} from './client.js'
export type { TmdbClientOptions } from './client.js'
export { TmdbNetworkError } from './errors.js'
export { createFetchTransport } from './transport.js'
export type { FetchTransportOptions, HttpResponse, HttpTransport } from './transport.js'
export { GENDERS } from './types.js'
export type { ActorDetails, Gender, MovieSummary } from './types.js'
