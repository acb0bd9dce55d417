import { Router, type Request, type RequestHandler, type Response } from 'express'
import { errorMessage } from '../lib/logger'
import { requestLogger } from '../middleware/requestId'
import type { BlogPipeline } from '../services/pipeline'

function queryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : ''
}

export function createGenerateRouter(pipeline: BlogPipeline, limiter: RequestHandler): Router {
  const router = Router()

  /** GET /generate?keyword=&save=true: SEO data + post for one keyword, optionally saved */
  router.get('/generate', limiter, async (req: Request, res: Response) => {
    const keyword = queryString(req.query.keyword)
    if (!keyword) {
      return res.status(400).json({ error: 'keyword parameter is required' })
    }
    const save = queryString(req.query.save).toLowerCase() === 'true'
    const log = requestLogger(req)

    try {
      const result = await pipeline.generate(keyword, log)
      const savedFile = save ? pipeline.save(result, log) : null
      return res.json({ ...result, saved_file: savedFile })
    } catch (err) {
      log.error({ msg: 'Error generating blog post', keyword, error: errorMessage(err) })
      return res.status(500).json({ error: errorMessage(err) })
    }
  })

  return router
}
