import fs from 'fs'
import { Router, type NextFunction, type Request, type Response } from 'express'
import { HttpError } from '../lib/httpError'
import { errorMessage } from '../lib/logger'
import { requestLogger } from '../middleware/requestId'
import { listPosts, resolvePostPath, type PostDirectories } from '../services/postStorage'

export function createPostsRouter(dirs: PostDirectories): Router {
  const router = Router()

  /** GET /posts: saved posts from both directories, newest first */
  router.get('/posts', (req: Request, res: Response) => {
    try {
      const posts = listPosts(dirs)
      res.json({ total_posts: posts.length, posts })
    } catch (err) {
      requestLogger(req).error({ msg: 'Error listing posts', error: errorMessage(err) })
      res.status(500).json({ error: errorMessage(err) })
    }
  })

  /** GET /posts/:filename?dir=daily: one saved post as HTML */
  router.get('/posts/:filename', (req: Request, res: Response, next: NextFunction) => {
    const dir = typeof req.query.dir === 'string' ? req.query.dir : undefined
    let filePath: string
    try {
      filePath = resolvePostPath(dirs, req.params.filename, dir)
    } catch (err) {
      const status = err instanceof HttpError ? err.status : 500
      return res.status(status).json({ error: errorMessage(err) })
    }

    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      return res.status(404).json({ error: 'Post not found' })
    }

    res.type('html')
    res.sendFile(filePath, (err) => {
      if (err) next(err)
    })
  })

  return router
}
