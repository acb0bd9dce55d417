/**
 * Records exchanged over HTTP and written to disk. Field names are snake_case because they
 * are the wire format of /generate and of the saved .json files.
 */

export type CompetitionLevel = 'Low' | 'Medium' | 'High'

export interface RankingPage {
  url: string
  title: string
  domain_authority: number
}

/** Keyword-research metrics; used only as prompt context. */
export interface SeoData {
  keyword: string
  search_volume: number
  /** 0-100 */
  keyword_difficulty: number
  avg_cpc: number
  related_keywords: string[]
  top_ranking_pages: RankingPage[]
  /** Month abbreviation (Jan..Dec) → relative interest */
  search_trends: Record<string, number>
  competition_level: CompetitionLevel
  suggested_bid: number
}

export interface BlogPost {
  title: string
  /** Full HTML document */
  content: string
  word_count: number
  meta_description: string
  tags: string[]
  /** e.g. "7 min read" */
  estimated_reading_time: string
}

export interface GenerationResult {
  keyword: string
  seo_data: SeoData
  blog_post: BlogPost
  generated_at: string
}

export type PostDirectoryName = 'generated_posts' | 'daily_posts'

export interface PostListing {
  filename: string
  directory: PostDirectoryName
  created: string
  size: number
  url: string
}
