import type { Logger } from 'pino'
import { getLogger, errorMessage } from '../lib/logger'
import type { BlogPost, SeoData } from '../types'
import {
  calculateReadingTime,
  cleanMarkdownArtifacts,
  countWords,
  extractTitle,
  generateMetaDescription,
  generateTags,
  processBlogContent,
} from '../utils/contentProcessing'
import type { ContentModel } from './contentModel'
import { buildFallbackPost } from './fallbackTemplate'
import { BLOG_WRITER_SYSTEM_PROMPT, buildBlogPostPrompt } from './prompts'

export const GENERATION_TEMPERATURE = 0.7
export const GENERATION_MAX_TOKENS = 2500

export interface BlogPostGeneratorOptions {
  /** null → every post uses the fallback template */
  model: ContentModel | null
  logger?: Logger
  now?: () => Date
}

/** Turn cleaned-up model output into a BlogPost. */
export function buildPostFromHtml(rawHtml: string, keyword: string, seoData: Pick<SeoData, 'related_keywords'>): BlogPost {
  const content = processBlogContent(cleanMarkdownArtifacts(rawHtml), keyword)
  const wordCount = countWords(content)
  return {
    title: extractTitle(content),
    content,
    word_count: wordCount,
    meta_description: generateMetaDescription(keyword, content),
    tags: generateTags(keyword, seoData),
    estimated_reading_time: calculateReadingTime(wordCount),
  }
}

export class BlogPostGenerator {
  private readonly model: ContentModel | null
  private readonly log: Logger
  private readonly now: () => Date

  constructor(options: BlogPostGeneratorOptions) {
    this.model = options.model
    this.log = options.logger ?? getLogger('api')
    this.now = options.now ?? (() => new Date())
  }

  get hasModel(): boolean {
    return this.model !== null
  }

  /**
   * Raw HTML from the model, or null when no model is configured or the call failed.
   * Failures are logged here and never thrown.
   */
  async requestContent(keyword: string, seoData: SeoData): Promise<string | null> {
    if (!this.model) {
      this.log.warn({ msg: 'OpenAI API key not configured; using fallback content', keyword })
      return null
    }
    try {
      return await this.model.complete({
        system: BLOG_WRITER_SYSTEM_PROMPT,
        prompt: buildBlogPostPrompt(keyword, seoData),
        temperature: GENERATION_TEMPERATURE,
        maxTokens: GENERATION_MAX_TOKENS,
      })
    } catch (err) {
      this.log.error({ msg: 'Content model call failed; using fallback content', keyword, error: errorMessage(err) })
      return null
    }
  }

  async generateBlogPost(keyword: string, seoData: SeoData): Promise<BlogPost> {
    const raw = await this.requestContent(keyword, seoData)
    if (raw === null) return buildFallbackPost(keyword, seoData, this.now())
    const post = buildPostFromHtml(raw, keyword, seoData)
    this.log.debug({ msg: 'Blog post generated', keyword, wordCount: post.word_count })
    return post
  }
}
