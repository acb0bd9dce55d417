import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterAll, beforeAll, describe, it, expect } from 'vitest'
import type { SeoData } from '../types'
import { createSeededRandom, type RandomSource } from '../utils/random'
import {
  TREND_MONTHS,
  generateMockSeoData,
  generateRelatedKeywords,
  generateSearchTrends,
  getCompetitionLevel,
  getSeoData,
  loadMockDatabase,
} from './seoData'

const half: RandomSource = () => 0.5

function sequence(values: number[]): RandomSource {
  let i = 0
  return () => (i < values.length ? values[i++] : 0)
}

function expectBand(keyword: string, volume: [number, number], difficulty: [number, number], cpc: [number, number]) {
  for (let seed = 1; seed <= 50; seed++) {
    const data = generateMockSeoData(keyword, createSeededRandom(seed))
    expect(data.search_volume).toBeGreaterThanOrEqual(volume[0])
    expect(data.search_volume).toBeLessThanOrEqual(volume[1])
    expect(data.keyword_difficulty).toBeGreaterThanOrEqual(difficulty[0])
    expect(data.keyword_difficulty).toBeLessThanOrEqual(difficulty[1])
    expect(data.avg_cpc).toBeGreaterThanOrEqual(cpc[0])
    expect(data.avg_cpc).toBeLessThanOrEqual(cpc[1])
  }
}

describe('generateMockSeoData', () => {
  it('uses the long-tail band for four or more words', () => {
    expectBand('quiet mechanical keyboard switches', [100, 2000], [15, 45], [0.5, 3.5])
  })

  it('uses the medium band for three words', () => {
    expectBand('ergonomic office chair', [1000, 8000], [35, 65], [1.5, 6])
  })

  it('uses the broad band for one or two words', () => {
    expectBand('desk lamp', [5000, 50000], [60, 95], [3, 15])
    expectBand('lamp', [5000, 50000], [60, 95], [3, 15])
  })

  it('builds the full record from the random source', () => {
    const related = ['2024 desk lamp', 'best desk lamp', '2025 desk lamp', 'review desk lamp', 'buy desk lamp', 'lamp desk']
    const trends = Object.fromEntries(TREND_MONTHS.map((m) => [m, 90]))
    const pages = [1, 2, 3, 4, 5].map((i) => ({
      url: `https://example${i}.com/article-about-desk-lamp`,
      title: 'Ultimate Guide to Desk Lamp - Top 10 Picks',
      domain_authority: 65,
    }))

    expect(generateMockSeoData('desk lamp', half)).toEqual({
      keyword: 'desk lamp',
      search_volume: 27500,
      keyword_difficulty: 78,
      avg_cpc: 9,
      related_keywords: related,
      top_ranking_pages: pages,
      search_trends: trends,
      competition_level: 'High',
      suggested_bid: 9,
    })
  })

  it('lowers CPC and raises volume for informational keywords', () => {
    const data = generateMockSeoData('how to tie a tie', half)
    expect(data.search_volume).toBe(1575)
    expect(data.avg_cpc).toBe(1.1)
  })

  it('treats a keyword matching both lists as commercial', () => {
    const data = generateMockSeoData('best guide to lamps', half)
    expect(data.search_volume).toBe(1050)
    expect(data.avg_cpc).toBe(4)
  })

  it('derives competition level from difficulty', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const data = generateMockSeoData('ergonomic office chair', createSeededRandom(seed))
      expect(data.competition_level).toBe(getCompetitionLevel(data.keyword_difficulty))
    }
  })
})

describe('getCompetitionLevel', () => {
  it('switches at 30 and 60', () => {
    expect(getCompetitionLevel(0)).toBe('Low')
    expect(getCompetitionLevel(29)).toBe('Low')
    expect(getCompetitionLevel(30)).toBe('Medium')
    expect(getCompetitionLevel(59)).toBe('Medium')
    expect(getCompetitionLevel(60)).toBe('High')
    expect(getCompetitionLevel(100)).toBe('High')
  })
})

describe('generateRelatedKeywords', () => {
  it('applies the modifier templates and the reversed variant', () => {
    expect(generateRelatedKeywords('desk lamp', sequence([0.82, 0, 0, 0, 0]))).toEqual([
      'desk lamp vs',
      'top desk lamp',
      'review desk lamp',
      'guide desk lamp',
      'how to choose desk lamp',
      'lamp desk',
    ])
  })

  it('skips the reversed variant for single words', () => {
    expect(generateRelatedKeywords('lamp', () => 0)).toEqual([
      'best lamp',
      'top lamp',
      'review lamp',
      'guide lamp',
      'how to choose lamp',
    ])
  })

  it('never returns more than eight', () => {
    for (let seed = 1; seed <= 30; seed++) {
      expect(generateRelatedKeywords('a very long multi word keyword', createSeededRandom(seed)).length).toBeLessThanOrEqual(8)
    }
  })
})

describe('generateSearchTrends', () => {
  it('covers twelve months within base ± range', () => {
    const trends = generateSearchTrends(createSeededRandom(9))
    expect(Object.keys(trends)).toEqual(TREND_MONTHS)
    for (const value of Object.values(trends)) {
      expect(value).toBeGreaterThanOrEqual(50)
      expect(value).toBeLessThanOrEqual(130)
    }
  })
})

describe('getSeoData lookup table', () => {
  let dir: string
  const stored: SeoData = {
    keyword: 'desk lamp',
    search_volume: 1234,
    keyword_difficulty: 42,
    avg_cpc: 1.5,
    related_keywords: ['best desk lamp'],
    top_ranking_pages: [],
    search_trends: { Jan: 80 },
    competition_level: 'Medium',
    suggested_bid: 1.6,
  }

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seo-data-'))
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  function writeTable(name: string, contents: string): string {
    const file = path.join(dir, name)
    fs.writeFileSync(file, contents)
    return file
  }

  it('returns the stored record for the lowercased keyword', () => {
    const file = writeTable('valid.json', JSON.stringify({ 'desk lamp': stored }))
    expect(getSeoData('Desk Lamp', { mockDataFile: file })).toEqual(stored)
  })

  it('generates data for keywords not in the table', () => {
    const file = writeTable('valid2.json', JSON.stringify({ 'desk lamp': stored }))
    const data = getSeoData('floor lamp', { mockDataFile: file, random: half })
    expect(data.keyword).toBe('floor lamp')
    expect(data.search_volume).toBe(27500)
  })

  it('does not treat object prototype names as stored keywords', () => {
    const file = writeTable('valid3.json', JSON.stringify({ 'desk lamp': stored }))
    expect(getSeoData('constructor', { mockDataFile: file, random: half }).keyword).toBe('constructor')
  })

  it('ignores unparseable and mis-shaped tables', () => {
    const broken = writeTable('broken.json', '{not json')
    const misShaped = writeTable('shape.json', JSON.stringify({ 'desk lamp': { keyword: 1 } }))
    expect(loadMockDatabase(broken)).toEqual({})
    expect(loadMockDatabase(misShaped)).toEqual({})
    expect(getSeoData('desk lamp', { mockDataFile: misShaped, random: half }).search_volume).toBe(27500)
  })

  it('keeps valid entries when another entry is malformed', () => {
    const file = writeTable('mixed.json', JSON.stringify({ 'desk lamp': stored, 'floor lamp': { keyword: 1 } }))
    expect(loadMockDatabase(file)).toEqual({ 'desk lamp': stored })
    expect(getSeoData('desk lamp', { mockDataFile: file })).toEqual(stored)
  })

  it('ignores a file that is not a keyword table', () => {
    expect(loadMockDatabase(writeTable('list.json', JSON.stringify([stored])))).toEqual({})
  })

  it('treats a missing file as an empty table', () => {
    expect(loadMockDatabase(path.join(dir, 'absent.json'))).toEqual({})
  })
})
