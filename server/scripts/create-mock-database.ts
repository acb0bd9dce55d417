/**
 * Write the SEO lookup table so the sample keywords return stable metrics.
 * Run from server/: npm run mock-data [-- <seed>]
 * Writes MOCK_SEO_DATA_FILE (default mock_seo_data.json). A numeric seed makes the output reproducible.
 */
import '../src/env'
import fs from 'fs'
import { loadConfig } from '../src/config'
import { getLogger } from '../src/lib/logger'
import { generateMockSeoData } from '../src/services/seoData'
import type { SeoData } from '../src/types'
import { createSeededRandom, defaultRandom } from '../src/utils/random'

const SAMPLE_KEYWORDS = [
  'wireless earbuds',
  'best headphones',
  'laptop reviews',
  'gaming mouse',
  'smartphone 2024',
  'fitness tracker',
  'coffee maker',
  'air fryer recipes',
  'yoga mat',
  'running shoes',
]

function main() {
  const log = getLogger('api')
  const config = loadConfig()
  const seedArg = process.argv[2]
  const seed = seedArg !== undefined ? Number(seedArg) : NaN
  const random = Number.isFinite(seed) ? createSeededRandom(seed) : defaultRandom

  const table: Record<string, SeoData> = {}
  for (const keyword of SAMPLE_KEYWORDS) {
    table[keyword.toLowerCase()] = generateMockSeoData(keyword, random)
  }

  fs.writeFileSync(config.mockSeoDataFile, JSON.stringify(table, null, 2), 'utf8')
  log.info({ msg: 'Mock SEO database created', file: config.mockSeoDataFile, keywords: SAMPLE_KEYWORDS.length })
}

main()
