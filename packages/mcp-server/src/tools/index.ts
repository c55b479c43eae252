/**
 * Tool catalog and request decoding.
 *
 * Each tool declares its advertised JSON schema and the zod schema that
 * validates incoming arguments side by side. To add a tool, add an entry to
 * the catalog, a variant to ToolRequest, and a case to both switches below.
 */

import { ErrorCode, McpError, type Tool } from '@modelcontextprotocol/sdk/types.js'
import type { TmdbClient } from '@tmdb-mcp/tmdb-client'
import { z } from 'zod'
import type { ToolOutcome } from '../result.js'
import { getActorInfoTool, type GetActorInfoArgs } from './get-actor-info.js'
import { getMoviesByActorTool, type GetMoviesByActorArgs } from './get-movies-by-actor.js'

// --- Zod schemas for tool argument validation ---

const GetActorInfoArgsSchema = z.object({
  actor_name: z.string().min(1, 'actor_name is required'),
}) satisfies z.ZodType<GetActorInfoArgs>

const GetMoviesByActorArgsSchema = z.object({
  actor_id: z.number().int('actor_id must be an integer').safe(),
}) satisfies z.ZodType<GetMoviesByActorArgs>

export type ToolRequest =
  | ({ name: 'get_actor_info' } & GetActorInfoArgs)
  | ({ name: 'get_movies_by_actor' } & GetMoviesByActorArgs)

export type ToolName = ToolRequest['name']

// Entries carry no icons: Tool.icons is optional and there is no hosted image to point at.
export const toolDefinitions: Tool[] = [
  {
    name: 'get_actor_info',
    title: 'Get Actor Information',
    description:
      'Search for detailed information about an actor based on their name. ' +
      'Returns the actor id, date and place of birth, biography and, when available, ' +
      'a profile picture. Use the returned id with get_movies_by_actor.',
    inputSchema: {
      type: 'object',
      properties: {
        actor_name: {
          type: 'string',
          description: 'The name of the actor',
          minLength: 1,
        },
      },
      required: ['actor_name'],
    },
  },
  {
    name: 'get_movies_by_actor',
    title: 'Get Movies by Actor ID',
    description:
      'Retrieve a list of movies featuring a specific actor. ' +
      'Specify `actor_id` to search for movies that the actor appeared in.',
    inputSchema: {
      type: 'object',
      properties: {
        actor_id: {
          type: 'integer',
          description: 'TMDB id of the actor, as returned by get_actor_info',
        },
      },
      required: ['actor_id'],
    },
  },
]

function parseArgs<T>(tool: ToolName, schema: z.ZodType<T>, args: unknown): T {
  const result = schema.safeParse(args ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`)
      .join('; ')
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool ${tool}: ${issues}`)
  }
  return result.data
}

/**
 * Turns a raw tools/call into a typed request, or throws an InvalidParams
 * McpError before any tool code runs.
 */
export function decodeToolRequest(name: string, args: unknown): ToolRequest {
  switch (name) {
    case 'get_actor_info': {
      const parsed = parseArgs('get_actor_info', GetActorInfoArgsSchema, args)
      return { name: 'get_actor_info', ...parsed }
    }
    case 'get_movies_by_actor': {
      const parsed = parseArgs('get_movies_by_actor', GetMoviesByActorArgsSchema, args)
      return { name: 'get_movies_by_actor', ...parsed }
    }
    default:
      throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`)
  }
}

export async function runTool(request: ToolRequest, client: TmdbClient): Promise<ToolOutcome> {
  switch (request.name) {
    case 'get_actor_info':
      return getActorInfoTool(request, client)
    case 'get_movies_by_actor':
      return getMoviesByActorTool(request, client)
  }
}
