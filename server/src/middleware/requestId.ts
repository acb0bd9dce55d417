/**
 * Request context: read x-request-id from the edge or generate a UUID, echo it back, attach a
 * request-scoped logger, and log one line per finished request.
 */
import type { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { withRequestId } from '../lib/logger'

export const REQUEST_ID_HEADER = 'x-request-id'

declare global {
  namespace Express {
    interface Request {
      requestId?: string
      log?: Logger
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4()
  const log = withRequestId(id)
  req.requestId = id
  req.log = log
  res.setHeader(REQUEST_ID_HEADER, id)

  const startedAt = Date.now()
  res.on('finish', () => {
    log.info({
      msg: 'Request completed',
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    })
  })
  next()
}

/** Logger for this request; falls back to a fresh child when the middleware did not run. */
export function requestLogger(req: Request): Logger {
  return req.log ?? withRequestId(req.requestId)
}
