import { z } from 'zod'

const ServerConfigSchema = z.object({
  tmdbToken: z.string({ required_error: 'TMDB_TOKEN must be set' }).min(1, 'TMDB_TOKEN must be set'),
  apiBaseUrl: z.string().url().default('https://api.themoviedb.org/3'),
  imageBaseUrl: z.string().url().default('https://image.tmdb.org/t/p'),
  imageSize: z.string().min(1).default('w92'),
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  logLevel: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  logPretty: z
    .string()
    .transform((v) => v === 'true')
    .default('false'),
})

export type ServerConfig = z.infer<typeof ServerConfigSchema>

const ENV_NAMES: Record<keyof ServerConfig, string> = {
  tmdbToken: 'TMDB_TOKEN',
  apiBaseUrl: 'TMDB_API_BASE_URL',
  imageBaseUrl: 'TMDB_IMAGE_BASE_URL',
  imageSize: 'TMDB_IMAGE_SIZE',
  timeoutMs: 'TMDB_TIMEOUT_MS',
  logLevel: 'LOG_LEVEL',
  logPretty: 'LOG_PRETTY',
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

function isConfigKey(key: unknown): key is keyof ServerConfig {
  return typeof key === 'string' && key in ENV_NAMES
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ServerConfigSchema.safeParse({
    tmdbToken: env.TMDB_TOKEN,
    apiBaseUrl: env.TMDB_API_BASE_URL,
    imageBaseUrl: env.TMDB_IMAGE_BASE_URL,
    imageSize: env.TMDB_IMAGE_SIZE,
    timeoutMs: env.TMDB_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
    logPretty: env.LOG_PRETTY,
  })

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => {
        const [key] = i.path
        const name = isConfigKey(key) ? ENV_NAMES[key] : i.path.join('.')
        return `${name}: ${i.message}`
      })
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error })
  }
  return result.data
}
