#!/usr/bin/env node
import dotenv from 'dotenv'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { TmdbClient, createFetchTransport } from '@tmdb-mcp/tmdb-client'
import { ConfigError, loadServerConfig } from './config.js'
import { createLogger } from './logger.js'
import { createMcpServer } from './server.js'

const envPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../.env')
dotenv.config({ path: envPath })

async function main() {
  const config = loadServerConfig()
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty })

  const client = new TmdbClient({
    token: config.tmdbToken,
    transport: createFetchTransport({ timeoutMs: config.timeoutMs }),
    apiBaseUrl: config.apiBaseUrl,
    imageBaseUrl: config.imageBaseUrl,
    imageSize: config.imageSize,
    logger: logger.child({ component: 'tmdb-client' }),
  })

  const server = createMcpServer({ client, logger })
  const transport = new StdioServerTransport()
  await server.connect(transport)

  logger.info(
    { apiBaseUrl: config.apiBaseUrl, timeoutMs: config.timeoutMs },
    'TMDB MCP server running on stdio',
  )
}

main().catch((error) => {
  const logger = createLogger()
  if (error instanceof ConfigError) {
    logger.fatal(error.message)
  } else {
    logger.fatal({ err: error }, 'fatal error')
  }
  process.exit(1)
})
