import { Router, type Request, type RequestHandler, type Response } from 'express'
import { errorMessage } from '../lib/logger'
import { requestLogger } from '../middleware/requestId'
import type { DailyPostScheduler } from '../workers/dailyScheduler'

export function createSchedulerRouter(scheduler: DailyPostScheduler, limiter: RequestHandler): Router {
  const router = Router()

  /** POST /generate-daily: run the daily job now and wait for it */
  router.post('/generate-daily', limiter, async (req: Request, res: Response) => {
    try {
      const savedFile = await scheduler.runNow()
      res.json({ message: 'Daily post generation triggered successfully', saved_file: savedFile })
    } catch (err) {
      requestLogger(req).error({ msg: 'Error in manual daily generation', error: errorMessage(err) })
      res.status(500).json({ error: errorMessage(err) })
    }
  })

  /** GET /scheduler/status: registered jobs and next run times */
  router.get('/scheduler/status', (_req: Request, res: Response) => {
    res.json(scheduler.status())
  })

  return router
}
