import { destination, pino, type Logger } from 'pino'

// stdout carries the MCP protocol, so every log line goes to stderr
const STDERR = 2

export function createLogger(options: { level?: string; pretty?: boolean } = {}): Logger {
  const { level = 'info', pretty = false } = options

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    })
  }

  return pino({ level, base: { service: 'tmdb-mcp' } }, destination(STDERR))
}
