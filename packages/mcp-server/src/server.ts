import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js'
import type { TmdbClient } from '@tmdb-mcp/tmdb-client'
import type { Logger } from 'pino'
import { encodeToolResult, toolError, type ToolOutcome } from './result.js'
import { decodeToolRequest, runTool, toolDefinitions, type ToolRequest } from './tools/index.js'

export const SERVER_NAME = 'tmdb-mcp'
export const SERVER_VERSION = '0.1.0'

export interface ServerDeps {
  client: TmdbClient
  logger: Logger
}

/**
 * Runs a decoded request. Anything thrown by the tool, upstream failures
 * included, is reported back as a domain error rather than a protocol error.
 */
export async function callTool(request: ToolRequest, deps: ServerDeps): Promise<CallToolResult> {
  const startedAt = Date.now()
  let outcome: ToolOutcome

  try {
    outcome = await runTool(request, deps.client)
  } catch (error) {
    deps.logger.error({ err: error, tool: request.name }, 'tool execution failed')
    outcome = toolError(error instanceof Error ? error.message : String(error))
  }

  const durationMs = Date.now() - startedAt
  if (outcome.ok) {
    deps.logger.info({ tool: request.name, durationMs }, 'tool call completed')
  } else {
    deps.logger.warn(
      { tool: request.name, durationMs, reason: outcome.message },
      'tool call returned an error',
    )
  }

  return encodeToolResult(outcome)
}

export function createMcpServer(deps: ServerDeps): Server {
  const logger = deps.logger.child({ component: 'mcp-server' })

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: 'TMDB Actor and Movie Lookup',
    },
    {
      capabilities: {
        tools: {},
      },
      instructions:
        'Use get_actor_info to look up an actor by name, then get_movies_by_actor ' +
        'with the returned id to list their movies.',
    },
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions }
  })

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: rawArgs } = request.params
    logger.debug({ tool: name }, 'tool call received')

    let toolRequest: ToolRequest
    try {
      toolRequest = decodeToolRequest(name, rawArgs)
    } catch (error) {
      logger.warn({ tool: name, err: error }, 'rejected malformed tool call')
      throw error
    }
    return callTool(toolRequest, { ...deps, logger })
  })

  return server
}

export { ConfigError, loadServerConfig } from './config.js'
export type { ServerConfig } from './config.js'
export { createLogger } from './logger.js'
export { decodeToolRequest, toolDefinitions } from './tools/index.js'
export type { ToolName, ToolRequest } from './tools/index.js'
export { encodeToolResult } from './result.js'
export type { ContentItem, ToolOutcome } from './result.js'
