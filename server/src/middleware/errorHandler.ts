import type { NextFunction, Request, Response } from 'express'
import { HttpError } from '../lib/httpError'
import { errorMessage } from '../lib/logger'
import { requestLogger } from './requestId'

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' })
}

/** Last middleware: every error leaves as `{ error }` JSON. */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err)
    return
  }
  const status = err instanceof HttpError ? err.status : 500
  if (status >= 500) {
    requestLogger(req).error({ msg: 'Unhandled request error', error: errorMessage(err) })
  }
  res.status(status).json({ error: errorMessage(err) })
}
