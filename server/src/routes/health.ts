/**
 * Capability listing and liveness.
 */
import { Router, type Request, type Response } from 'express'

export function createHealthRouter(): Router {
  const router = Router()

  /** GET /: what this service can do */
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'AI Blog Post Generator API',
      endpoints: {
        '/generate': 'GET - Generate blog post with ?keyword=<keyword>&save=true (optional)',
        '/posts': 'GET - List generated posts',
        '/posts/<filename>': 'GET - View specific post (?dir=daily for daily posts)',
        '/generate-daily': 'POST - Run the daily post job now',
        '/scheduler/status': 'GET - Scheduled jobs and next run times',
        '/health': 'GET - Health check',
      },
    })
  })

  /** GET /health: process up, no dependency check */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() })
  })

  return router
}
