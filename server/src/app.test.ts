import fs from 'fs'
import os from 'os'
import path from 'path'
import type { Server } from 'http'
import { afterAll, beforeAll, describe, it, expect } from 'vitest'
import { createApp } from './app'
import { BlogPostGenerator } from './services/blogGenerator'
import { BlogPipeline } from './services/pipeline'
import { DailyPostScheduler } from './workers/dailyScheduler'

const fixedNow = () => new Date(2026, 9, 19, 9, 0, 0)

let root: string
let server: Server
let baseUrl: string
let pipeline: BlogPipeline

beforeAll(async () => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'blog-app-'))
  pipeline = new BlogPipeline({
    generator: new BlogPostGenerator({ model: null, now: fixedNow }),
    dirs: { generated: path.join(root, 'generated_posts'), daily: path.join(root, 'daily_posts') },
    dailyKeyword: 'wireless earbuds',
    seo: { random: () => 0.5 },
    now: fixedNow,
  })
  const scheduler = new DailyPostScheduler((log) => pipeline.generateDaily(log), { hour: 9, minute: 0 })
  const app = createApp({ config: { corsOrigins: [], rateLimitPerMinute: 1000 }, pipeline, scheduler })

  server = app.listen(0)
  await new Promise<void>((resolve) => server.once('listening', () => resolve()))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('server has no port')
  baseUrl = `http://127.0.0.1:${address.port}`
})

afterAll(async () => {
  server.closeAllConnections()
  await new Promise<void>((resolve) => server.close(() => resolve()))
  fs.rmSync(root, { recursive: true, force: true })
})

describe('service endpoints', () => {
  it('lists capabilities', async () => {
    const res = await fetch(`${baseUrl}/`)
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      message: 'AI Blog Post Generator API',
      endpoints: { '/generate': expect.any(String), '/posts': expect.any(String) },
    })
  })

  it('reports health and echoes the request id', async () => {
    const res = await fetch(`${baseUrl}/health`, { headers: { 'x-request-id': 'req-123' } })
    expect(res.status).toBe(200)
    expect(res.headers.get('x-request-id')).toBe('req-123')
    expect(await res.json()).toEqual({ status: 'healthy', timestamp: expect.any(String) })
  })

  it('answers unknown routes with JSON 404', async () => {
    const res = await fetch(`${baseUrl}/nope`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found' })
  })
})

describe('GET /generate', () => {
  it('requires a keyword', async () => {
    for (const query of ['', '?keyword=', '?keyword=%20%20']) {
      const res = await fetch(`${baseUrl}/generate${query}`)
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'keyword parameter is required' })
    }
  })

  it('returns seo data and the post without saving by default', async () => {
    const res = await fetch(`${baseUrl}/generate?keyword=desk%20lamp`)
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      keyword: 'desk lamp',
      seo_data: { keyword: 'desk lamp', search_volume: 27500, competition_level: 'High' },
      blog_post: { title: 'The Ultimate Guide to Desk Lamp: Everything You Need to Know' },
      generated_at: fixedNow().toISOString(),
      saved_file: null,
    })
    expect(fs.existsSync(pipeline.dirs.generated)).toBe(false)
  })

  it('saves the post when save=true and serves it back', async () => {
    const res = await fetch(`${baseUrl}/generate?keyword=desk%20lamp&save=TRUE`)
    expect(res.status).toBe(200)
    const savedFile = path.join(pipeline.dirs.generated, 'desk_lamp_20261019_090000.html')
    expect(await res.json()).toMatchObject({ saved_file: savedFile })

    const list = await fetch(`${baseUrl}/posts`)
    expect(await list.json()).toEqual({
      total_posts: 1,
      posts: [
        {
          filename: 'desk_lamp_20261019_090000.html',
          directory: 'generated_posts',
          created: expect.any(String),
          size: fs.statSync(savedFile).size,
          url: '/posts/desk_lamp_20261019_090000.html',
        },
      ],
    })

    const view = await fetch(`${baseUrl}/posts/desk_lamp_20261019_090000.html`)
    expect(view.status).toBe(200)
    expect(view.headers.get('content-type')).toContain('text/html')
    expect(await view.text()).toBe(fs.readFileSync(savedFile, 'utf8'))
  })
})

describe('GET /posts/:filename', () => {
  it('returns 404 for a missing post', async () => {
    const res = await fetch(`${baseUrl}/posts/missing.html`)
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Post not found' })
  })

  it('refuses names outside the posts directory', async () => {
    const res = await fetch(`${baseUrl}/posts/..%2F..%2Fetc%2Fpasswd`)
    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({ error: 'Access denied' })
  })
})

describe('daily job endpoints', () => {
  it('reports the scheduler as stopped with its job', async () => {
    const res = await fetch(`${baseUrl}/scheduler/status`)
    expect(await res.json()).toEqual({
      scheduler_running: false,
      jobs: [{ id: 'daily_blog_post', name: 'Generate Daily Blog Post', next_run: null, trigger: 'cron[0 9 * * *]' }],
    })
  })

  it('runs the daily job on demand', async () => {
    const res = await fetch(`${baseUrl}/generate-daily`, { method: 'POST' })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      message: 'Daily post generation triggered successfully',
      saved_file: path.join(pipeline.dirs.daily, 'daily_post_wireless_earbuds_20261019_090000.html'),
    })

    const saved: unknown = JSON.parse(
      fs.readFileSync(path.join(pipeline.dirs.daily, 'daily_post_wireless_earbuds_20261019_090000.json'), 'utf8')
    )
    expect(saved).toMatchObject({
      keyword: 'wireless earbuds',
      blog_post: { title: 'The Ultimate Guide to Wireless Earbuds: Everything You Need to Know' },
    })

    const view = await fetch(`${baseUrl}/posts/daily_post_wireless_earbuds_20261019_090000.html?dir=daily`)
    expect(view.status).toBe(200)
  })
})
