/**
 * Structured JSON logger for the API and the daily scheduler. One format: level, timestamp,
 * service, env, release, requestId. Redacts credential keys.
 * LOG_LEVEL wins; otherwise DEBUG=true lowers the level to debug.
 */
import pino from 'pino'
import { isFlagEnabled } from '../config'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (isFlagEnabled(process.env.DEBUG) ? 'debug' : 'info')

const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers.cookie',
  'OPENAI_API_KEY',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'scheduler'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger carrying the request id (API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Message of an unknown thrown value, for `{ error }` bodies and log lines. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return typeof err === 'string' ? err : 'Unknown error'
}
