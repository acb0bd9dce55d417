import path from 'path'
import { z } from 'zod'

/** "true" | "1" | "yes" (case-insensitive) enable a flag; anything else leaves it off. */
export function isFlagEnabled(value: string | undefined): boolean {
  if (value == null || typeof value !== 'string') return false
  return /^(1|true|yes)$/i.test(value.trim())
}

const envSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  DAILY_KEYWORD: z.string().trim().min(1).default('wireless earbuds'),
  DAILY_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  DAILY_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  DISABLE_SCHEDULER: z.string().optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  DEBUG: z.string().optional(),
  GENERATED_POSTS_DIR: z.string().default('generated_posts'),
  DAILY_POSTS_DIR: z.string().default('daily_posts'),
  MOCK_SEO_DATA_FILE: z.string().default('mock_seo_data.json'),
  CORS_ORIGINS: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(30),
})

export interface AppConfig {
  openaiApiKey?: string
  openaiModel: string
  dailyKeyword: string
  dailyHour: number
  dailyMinute: number
  schedulerEnabled: boolean
  port: number
  debug: boolean
  generatedPostsDir: string
  dailyPostsDir: string
  mockSeoDataFile: string
  corsOrigins: string[]
  rateLimitPerMinute: number
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Parse environment variables into an immutable config. Blank values count as unset so
 * defaults still apply to `FOO=` lines in .env files.
 * @throws ConfigError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') present[key] = value
  }

  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  const e = parsed.data
  return Object.freeze({
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    dailyKeyword: e.DAILY_KEYWORD,
    dailyHour: e.DAILY_HOUR,
    dailyMinute: e.DAILY_MINUTE,
    schedulerEnabled: !isFlagEnabled(e.DISABLE_SCHEDULER),
    port: e.PORT,
    debug: isFlagEnabled(e.DEBUG),
    generatedPostsDir: path.normalize(e.GENERATED_POSTS_DIR),
    dailyPostsDir: path.normalize(e.DAILY_POSTS_DIR),
    mockSeoDataFile: e.MOCK_SEO_DATA_FILE,
    corsOrigins: (e.CORS_ORIGINS || '')
      .split(',')
      .map((o) => o.trim().replace(/\/$/, ''))
      .filter(Boolean),
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
  })
}
