import fs from 'fs'
import type { Logger } from 'pino'
import { z } from 'zod'
import { getLogger, errorMessage } from '../lib/logger'
import type { CompetitionLevel, SeoData } from '../types'
import { toTitleCase } from '../utils/contentProcessing'
import { defaultRandom, randomInt, randomUniform, roundTo2, sample, type RandomSource } from '../utils/random'

const COMMERCIAL_TERMS = ['buy', 'best', 'review', 'price', 'cheap', 'discount', 'deal']
const INFORMATIONAL_TERMS = ['how', 'what', 'why', 'guide', 'tutorial', 'tips']

const KEYWORD_MODIFIERS = [
  'best', 'top', 'review', 'guide', 'how to', 'cheap', 'discount',
  '2024', '2025', 'buy', 'price', 'vs', 'comparison', 'alternative',
]
const SUFFIX_MODIFIERS = new Set(['vs', 'comparison'])

export const TREND_MONTHS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
]

interface MetricBand {
  volume: [number, number]
  difficulty: [number, number]
  cpc: [number, number]
}

// Longer, more specific keywords: less volume, less competition
const LONG_TAIL: MetricBand = { volume: [100, 2000], difficulty: [15, 45], cpc: [0.5, 3.5] }
const MEDIUM_TAIL: MetricBand = { volume: [1000, 8000], difficulty: [35, 65], cpc: [1.5, 6.0] }
const SHORT_TAIL: MetricBand = { volume: [5000, 50000], difficulty: [60, 95], cpc: [3.0, 15.0] }

const seoDataSchema = z.object({
  keyword: z.string(),
  search_volume: z.number().int().nonnegative(),
  keyword_difficulty: z.number().int().min(0).max(100),
  avg_cpc: z.number(),
  related_keywords: z.array(z.string()),
  top_ranking_pages: z.array(
    z.object({
      url: z.string(),
      title: z.string(),
      domain_authority: z.number().int(),
    })
  ),
  search_trends: z.record(z.string(), z.number().int()),
  competition_level: z.enum(['Low', 'Medium', 'High']),
  suggested_bid: z.number(),
})

const mockDatabaseSchema = z.record(z.string(), z.unknown())

function splitWords(keyword: string): string[] {
  return keyword.trim().split(/\s+/).filter(Boolean)
}

function bandFor(wordCount: number): MetricBand {
  if (wordCount >= 4) return LONG_TAIL
  if (wordCount === 3) return MEDIUM_TAIL
  return SHORT_TAIL
}

export function getCompetitionLevel(difficulty: number): CompetitionLevel {
  if (difficulty < 30) return 'Low'
  if (difficulty < 60) return 'Medium'
  return 'High'
}

/** Five sampled modifiers applied to the keyword, then its reversed word order; at most 8. */
export function generateRelatedKeywords(keyword: string, random: RandomSource = defaultRandom): string[] {
  const related = sample(random, KEYWORD_MODIFIERS, 5).map((modifier) => {
    if (modifier === 'how to') return `${modifier} choose ${keyword}`
    if (SUFFIX_MODIFIERS.has(modifier)) return `${keyword} ${modifier}`
    return `${modifier} ${keyword}`
  })

  const words = splitWords(keyword)
  if (words.length > 1) {
    related.push([...words].reverse().join(' '))
  }

  return related.slice(0, 8)
}

/** Twelve months around one shared base; each month at least 10. */
export function generateSearchTrends(random: RandomSource = defaultRandom): Record<string, number> {
  const base = randomInt(random, 70, 100)
  const trends: Record<string, number> = {}
  for (const month of TREND_MONTHS) {
    trends[month] = Math.max(10, base + randomInt(random, -20, 30))
  }
  return trends
}

export function generateMockSeoData(keyword: string, random: RandomSource = defaultRandom): SeoData {
  const band = bandFor(splitWords(keyword).length)
  let searchVolume = randomInt(random, band.volume[0], band.volume[1])
  const keywordDifficulty = randomInt(random, band.difficulty[0], band.difficulty[1])
  let avgCpc = roundTo2(randomUniform(random, band.cpc[0], band.cpc[1]))

  // Commercial intent is checked first; a keyword matching both lists is treated as commercial
  const lower = keyword.toLowerCase()
  if (COMMERCIAL_TERMS.some((term) => lower.includes(term))) {
    avgCpc *= randomUniform(random, 1.5, 2.5)
    searchVolume = Math.trunc(searchVolume * randomUniform(random, 0.8, 1.2))
  } else if (INFORMATIONAL_TERMS.some((term) => lower.includes(term))) {
    avgCpc *= randomUniform(random, 0.3, 0.8)
    searchVolume = Math.trunc(searchVolume * randomUniform(random, 1.2, 1.8))
  }

  const relatedKeywords = generateRelatedKeywords(keyword, random)
  const slug = keyword.replace(/ /g, '-')
  const titleCased = toTitleCase(keyword)
  const topRankingPages = [1, 2, 3, 4, 5].map((i) => ({
    url: `https://example${i}.com/article-about-${slug}`,
    title: `Ultimate Guide to ${titleCased} - Top ${randomInt(random, 5, 15)} Picks`,
    domain_authority: randomInt(random, 40, 90),
  }))

  return {
    keyword,
    search_volume: searchVolume,
    keyword_difficulty: keywordDifficulty,
    avg_cpc: roundTo2(avgCpc),
    related_keywords: relatedKeywords,
    top_ranking_pages: topRankingPages,
    search_trends: generateSearchTrends(random),
    competition_level: getCompetitionLevel(keywordDifficulty),
    suggested_bid: roundTo2(avgCpc * randomUniform(random, 0.8, 1.2)),
  }
}

/**
 * Read the lookup table (lowercased keyword → SeoData). A missing file is an empty table;
 * an unreadable one is logged and treated as empty. Malformed entries are logged and skipped,
 * the rest of the table is kept.
 */
export function loadMockDatabase(filePath: string, logger: Logger = getLogger('api')): Record<string, SeoData> {
  if (!fs.existsSync(filePath)) return {}
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  } catch (err) {
    logger.warn({ msg: 'Could not read mock SEO data file', file: filePath, error: errorMessage(err) })
    return {}
  }

  const table = mockDatabaseSchema.safeParse(raw)
  if (!table.success) {
    logger.warn({ msg: 'Ignoring mock SEO data file that is not a keyword table', file: filePath })
    return {}
  }

  const entries: Record<string, SeoData> = {}
  for (const [key, value] of Object.entries(table.data)) {
    const entry = seoDataSchema.safeParse(value)
    if (!entry.success) {
      logger.warn({ msg: 'Skipping malformed mock SEO data entry', file: filePath, keyword: key, issues: entry.error.issues.length })
      continue
    }
    entries[key] = entry.data
  }
  return entries
}

export interface SeoDataOptions {
  /** Lookup table consulted before random generation */
  mockDataFile?: string
  random?: RandomSource
  logger?: Logger
}

export function getSeoData(keyword: string, options: SeoDataOptions = {}): SeoData {
  if (options.mockDataFile) {
    const table = loadMockDatabase(options.mockDataFile, options.logger)
    const key = keyword.toLowerCase()
    if (Object.hasOwn(table, key)) return table[key]
  }
  return generateMockSeoData(keyword, options.random)
}
