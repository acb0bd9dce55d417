import express, { type Express } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import type { AppConfig } from './config'
import { setupSentryErrorHandler, sentryRequestIdScope } from './lib/sentry'
import { errorHandler, notFoundHandler } from './middleware/errorHandler'
import { requestIdMiddleware } from './middleware/requestId'
import { createGenerateRouter } from './routes/generate'
import { createHealthRouter } from './routes/health'
import { createPostsRouter } from './routes/posts'
import { createSchedulerRouter } from './routes/scheduler'
import type { BlogPipeline } from './services/pipeline'
import type { DailyPostScheduler } from './workers/dailyScheduler'

export interface AppServices {
  config: Pick<AppConfig, 'corsOrigins' | 'rateLimitPerMinute'>
  pipeline: BlogPipeline
  scheduler: DailyPostScheduler
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** No allowlist configured → any origin; requests without an Origin (curl, server-to-server) always pass. */
export function isAllowedOrigin(origin: string | undefined, allowlist: readonly string[]): boolean {
  if (!origin) return true
  if (allowlist.length === 0) return true
  return allowlist.includes(normalizeOrigin(origin))
}

export function createApp({ config, pipeline, scheduler }: AppServices): Express {
  const app = express()
  app.disable('x-powered-by')
  app.set('trust proxy', 1)

  // Model calls are the expensive part; only the generation endpoints are limited
  const generationLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: config.rateLimitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests. Please wait.' },
  })

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      callback(null, isAllowedOrigin(origin, config.corsOrigins))
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  }

  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(cors(corsOptions))
  app.use(express.json())

  app.use(createHealthRouter())
  app.use(createGenerateRouter(pipeline, generationLimiter))
  app.use(createPostsRouter(pipeline.dirs))
  app.use(createSchedulerRouter(scheduler, generationLimiter))

  app.use(notFoundHandler)
  setupSentryErrorHandler(app)
  app.use(errorHandler)

  return app
}
