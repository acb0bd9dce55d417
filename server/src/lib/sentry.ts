/**
 * Sentry for the API and the scheduled job. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes.
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import { errorMessage, getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function isEnabled(): boolean {
  return Boolean(DSN && DSN.trim())
}

export function initSentry(): void {
  if (!isEnabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
      integrations: [Sentry.expressIntegration()],
    })
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed', error: errorMessage(err) })
  }
}

/** Call after all routes, before the JSON error handler. No-op without SENTRY_DSN. */
export function setupSentryErrorHandler(app: Express): void {
  if (!isEnabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Tag the Sentry scope with the request id. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  if (isEnabled() && req.requestId) Sentry.getCurrentScope().setTag('request_id', req.requestId)
  next()
}

/** Report a failed scheduled job run with its job id and name as tags. */
export function captureJobError(jobId: string, jobName: string, err: unknown): void {
  if (!isEnabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'scheduler')
    scope.setTag('job_id', jobId)
    scope.setTag('job_name', jobName)
    Sentry.captureException(err)
  })
}
