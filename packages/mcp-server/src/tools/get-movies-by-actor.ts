import type { MovieSummary, TmdbClient } from '@tmdb-mcp/tmdb-client'
import { textContent, toolError, toolSuccess, type ToolOutcome } from '../result.js'

export interface GetMoviesByActorArgs {
  actor_id: number
}

export function formatReleaseYear(releaseDate: string): string | null {
  return releaseDate.length >= 4 ? releaseDate.slice(0, 4) : null
}

export function formatMovieLine(movie: MovieSummary, index: number): string {
  const year = formatReleaseYear(movie.release_date)
  return year === null ? `${index}. ${movie.title}` : `${index}. ${movie.title} (${year})`
}

export async function getMoviesByActorTool(
  args: GetMoviesByActorArgs,
  client: TmdbClient,
): Promise<ToolOutcome> {
  const movies = await client.fetchMoviesByActor(args.actor_id)

  if (movies.length === 0) {
    return toolError('No movies were found!')
  }

  return toolSuccess(textContent(movies.map(formatMovieLine).join('\n')))
}
