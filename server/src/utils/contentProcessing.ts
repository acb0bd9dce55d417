/**
 * Post-processing for model-written HTML: artifact cleanup, affiliate placeholders, document
 * shell, and the derived fields of a BlogPost (title, meta description, tags, word count,
 * reading time).
 */

export const AFFILIATE_LINKS: Readonly<Record<string, string>> = {
  '{{AFF_LINK_1}}': 'https://amazon.com/affiliate/product1?tag=yourtag',
  '{{AFF_LINK_2}}': 'https://amazon.com/affiliate/product2?tag=yourtag',
  '{{AFF_LINK_3}}': 'https://amazon.com/affiliate/product3?tag=yourtag',
  '{{AFF_LINK_4}}': 'https://bestbuy.com/affiliate/product4?tag=yourtag',
  '{{AFF_LINK_5}}': 'https://walmart.com/affiliate/product5?tag=yourtag',
}

export const DEFAULT_TITLE = 'Generated Blog Post'
export const META_DESCRIPTION_MAX_LENGTH = 155
export const MAX_TAGS = 10
export const WORDS_PER_MINUTE = 225

const GENERIC_TAGS = ['review', 'guide', 'buying guide', '2024', 'best']
const DOCTYPE = '<!DOCTYPE html>'

const STYLESHEET = `        body { font-family: Arial, sans-serif; line-height: 1.6; max-width: 800px; margin: 0 auto; padding: 20px; }
        h1, h2, h3 { color: #333; }
        a { color: #007bff; text-decoration: none; }
        a:hover { text-decoration: underline; }
        .faq { margin-top: 30px; }
        .faq h3 { margin-top: 20px; }`

export function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '')
}

/** Title casing: first letter of each letter run upper, the rest lower. */
export function toTitleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
}

/** Wrap a body fragment in the standard page shell. */
export function renderHtmlDocument(title: string, body: string): string {
  return `${DOCTYPE}
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <style>
${STYLESHEET}
    </style>
</head>
<body>
${body}
</body>
</html>`
}

/**
 * Remove what chat models tend to leave around HTML: markdown fences, a document nested inside
 * another document's <body>, and the doubled closing tags that nesting leaves at the end.
 */
export function cleanMarkdownArtifacts(raw: string): string {
  let content = raw.replace(/```html\s*/g, '').replace(/```\s*/g, '')
  content = content.replace(
    /<!DOCTYPE html>\s*<html[^>]*>\s*<head>[\s\S]*?<\/head>\s*<body>\s*<!DOCTYPE html>/g,
    DOCTYPE
  )
  content = content.replace(/(<\/body>\s*<\/html>)\s*<\/body>\s*<\/html>\s*$/, '$1')
  return content.trim()
}

/** Literal replacement of every known placeholder; unknown ones stay in the text. */
export function replaceAffiliatePlaceholders(content: string): string {
  let out = content
  for (const [placeholder, link] of Object.entries(AFFILIATE_LINKS)) {
    out = out.split(placeholder).join(link)
  }
  return out
}

export function ensureDocumentStructure(content: string, keyword: string): string {
  if (content.trim().startsWith(DOCTYPE)) return content
  const title = extractTitleText(content) || `${toTitleCase(keyword)} - Expert Guide`
  return renderHtmlDocument(title, content)
}

export function processBlogContent(content: string, keyword: string): string {
  return ensureDocumentStructure(replaceAffiliatePlaceholders(content), keyword)
}

/**
 * First <h1>, then the first heading of any level, then <title>, then the first plain-text
 * line longer than 10 characters (cut at 100). Inner markup of a heading is kept.
 */
export function extractTitle(content: string): string {
  const patterns = [
    /<h1[^>]*>([\s\S]*?)<\/h1>/i,
    /<h[1-6][^>]*>([\s\S]*?)<\/h[1-6]>/i,
    /<title[^>]*>([\s\S]*?)<\/title>/i,
  ]
  for (const pattern of patterns) {
    const match = pattern.exec(content)
    if (match) return match[1].trim()
  }

  for (const line of content.split('\n')) {
    const clean = stripTags(line).trim()
    if (clean.length > 10) {
      return clean.length > 100 ? `${clean.slice(0, 100)}...` : clean
    }
  }

  return DEFAULT_TITLE
}

export function extractTitleText(content: string): string {
  return stripTags(extractTitle(content)).trim()
}

function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  // A space right after the budget still closes the last whole word
  const cut = text.slice(0, maxLength - 2)
  const lastSpace = cut.lastIndexOf(' ')
  const head = lastSpace > 0 ? cut.slice(0, lastSpace) : cut.slice(0, maxLength - 3)
  return `${head.trimEnd()}...`
}

/**
 * First of the opening five text lines of the tag-stripped document that mentions the keyword
 * and runs past 50 chars, cut to 155 at a word boundary. On a wrapped page those lines are the
 * <title> and the stylesheet, so only a long enough title can qualify there.
 */
export function generateMetaDescription(keyword: string, content: string): string {
  const needle = keyword.toLowerCase()
  const lines = stripTags(content)
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)

  for (const line of lines.slice(0, 5)) {
    if (line.length > 50 && line.toLowerCase().includes(needle)) {
      return truncateAtWord(line, META_DESCRIPTION_MAX_LENGTH)
    }
  }

  return `Discover everything you need to know about ${keyword}. Expert reviews, comparisons, and buying guides to help you make the best choice.`
}

export function generateTags(keyword: string, seoData: { related_keywords?: string[] }): string[] {
  const tags = [keyword, ...(seoData.related_keywords ?? []).slice(0, 5)]
  const existing = tags.join(' ').toLowerCase()
  const generic = GENERIC_TAGS.filter((tag) => !existing.includes(tag))
  return [...tags, ...generic].slice(0, MAX_TAGS)
}

export function countWords(content: string): number {
  return stripTags(content).split(/\s+/).filter(Boolean).length
}

export function calculateReadingTime(wordCount: number): string {
  const minutes = Math.max(1, Math.round(wordCount / WORDS_PER_MINUTE))
  return `${minutes} min read`
}
