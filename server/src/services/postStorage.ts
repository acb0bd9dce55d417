import fs, { type Stats } from 'fs'
import path from 'path'
import { HttpError } from '../lib/httpError'
import type { BlogPost, GenerationResult, PostDirectoryName, PostListing } from '../types'

export interface PostDirectories {
  generated: string
  daily: string
}

export const DAILY_PREFIX = 'daily_post_'

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`
  const time = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  return `${day}_${time}`
}

/** Spaces and slashes become underscores; nothing else is touched. */
export function safeKeyword(keyword: string): string {
  return keyword.replace(/[ /]/g, '_')
}

export function postStem(keyword: string, date: Date): string {
  return `${safeKeyword(keyword)}_${formatTimestamp(date)}`
}

function writePostFiles(dir: string, stem: string, html: string, record: unknown): string {
  fs.mkdirSync(dir, { recursive: true })
  const htmlPath = path.join(dir, `${stem}.html`)
  fs.writeFileSync(htmlPath, html, 'utf8')
  fs.writeFileSync(path.join(dir, `${stem}.json`), JSON.stringify(record, null, 2), 'utf8')
  return htmlPath
}

/**
 * Write `{stem}.html` (the post content) and `{stem}.json` (the post record) into dir.
 * Two saves of one keyword in the same second overwrite each other.
 * @returns path of the .html file
 */
export function savePost(post: BlogPost, keyword: string, dir: string, now: Date = new Date()): string {
  return writePostFiles(dir, postStem(keyword, now), post.content, post)
}

/** Daily-job variant: `daily_post_` prefix, and the JSON holds the whole generation result. */
export function saveDailyPost(result: GenerationResult, dir: string, now: Date = new Date()): string {
  return writePostFiles(dir, `${DAILY_PREFIX}${postStem(result.keyword, now)}`, result.blog_post.content, result)
}

function createdAt(stats: Stats): Date {
  return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime
}

/** Every .html post in both directories, newest first. Missing directories are skipped. */
export function listPosts(dirs: PostDirectories): PostListing[] {
  const sources: { dir: string; directory: PostDirectoryName; query: string }[] = [
    { dir: dirs.generated, directory: 'generated_posts', query: '' },
    { dir: dirs.daily, directory: 'daily_posts', query: '?dir=daily' },
  ]

  const entries: { listing: PostListing; createdMs: number }[] = []
  for (const source of sources) {
    if (!fs.existsSync(source.dir)) continue
    for (const filename of fs.readdirSync(source.dir)) {
      if (!filename.endsWith('.html')) continue
      const stats = fs.statSync(path.join(source.dir, filename))
      if (!stats.isFile()) continue
      const created = createdAt(stats)
      entries.push({
        createdMs: created.getTime(),
        listing: {
          filename,
          directory: source.directory,
          created: created.toISOString(),
          size: stats.size,
          url: `/posts/${encodeURIComponent(filename)}${source.query}`,
        },
      })
    }
  }

  return entries.sort((a, b) => b.createdMs - a.createdMs).map((e) => e.listing)
}

/**
 * Absolute path of a stored post. `daily` selects the daily directory, anything else the
 * generated one.
 * @throws HttpError 403 when the name resolves outside the directory
 */
export function resolvePostPath(dirs: PostDirectories, filename: string, dir?: string): string {
  const baseDir = path.resolve(dir === 'daily' ? dirs.daily : dirs.generated)
  const resolved = path.resolve(baseDir, filename)
  if (!resolved.startsWith(baseDir + path.sep)) {
    throw new HttpError(403, 'Access denied')
  }
  return resolved
}
