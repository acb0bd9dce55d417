import type { Logger } from 'pino'
import { getLogger } from '../lib/logger'
import type { GenerationResult } from '../types'
import type { BlogPostGenerator } from './blogGenerator'
import { saveDailyPost, savePost, type PostDirectories } from './postStorage'
import { getSeoData, type SeoDataOptions } from './seoData'

export interface BlogPipelineOptions {
  generator: BlogPostGenerator
  dirs: PostDirectories
  dailyKeyword: string
  seo?: Omit<SeoDataOptions, 'logger'>
  logger?: Logger
  now?: () => Date
}

/** Keyword → SEO data → blog post, plus saving into the generated/daily directories. */
export class BlogPipeline {
  readonly dirs: PostDirectories
  readonly dailyKeyword: string
  private readonly generator: BlogPostGenerator
  private readonly seo: Omit<SeoDataOptions, 'logger'>
  private readonly log: Logger
  private readonly now: () => Date

  constructor(options: BlogPipelineOptions) {
    this.generator = options.generator
    this.dirs = options.dirs
    this.dailyKeyword = options.dailyKeyword
    this.seo = options.seo ?? {}
    this.log = options.logger ?? getLogger('api')
    this.now = options.now ?? (() => new Date())
  }

  async generate(keyword: string, log: Logger = this.log): Promise<GenerationResult> {
    log.info({ msg: 'Fetching SEO data', keyword })
    const seoData = getSeoData(keyword, { ...this.seo, logger: log })

    log.info({ msg: 'Generating blog post', keyword, model: this.generator.hasModel })
    const blogPost = await this.generator.generateBlogPost(keyword, seoData)

    return {
      keyword,
      seo_data: seoData,
      blog_post: blogPost,
      generated_at: this.now().toISOString(),
    }
  }

  /** @returns path of the saved .html file */
  save(result: GenerationResult, log: Logger = this.log): string {
    const file = savePost(result.blog_post, result.keyword, this.dirs.generated, this.now())
    log.info({ msg: 'Blog post saved', file })
    return file
  }

  /** Generate the configured daily keyword and store it under the daily directory. */
  async generateDaily(log: Logger = this.log): Promise<string> {
    log.info({ msg: 'Starting daily blog post generation', keyword: this.dailyKeyword })
    const result = await this.generate(this.dailyKeyword, log)
    const file = saveDailyPost(result, this.dirs.daily, this.now())
    log.info({ msg: 'Daily blog post saved', file })
    return file
  }
}
