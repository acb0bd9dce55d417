import type { SeoData } from '../types'

export const BLOG_WRITER_SYSTEM_PROMPT =
  'You are an expert SEO content writer and affiliate marketer. Create engaging, informative blog posts that rank well in search engines and naturally incorporate affiliate links. Return ONLY clean HTML content without any markdown code blocks or extra formatting.'

/**
 * User prompt for one post. Only volume, difficulty, competition and the first five related
 * keywords are passed to the model; missing metrics render as N/A.
 */
export function buildBlogPostPrompt(keyword: string, seoData: Partial<SeoData>): string {
  const relatedKeywords = (seoData.related_keywords ?? []).slice(0, 5).join(', ')

  return `
Write a comprehensive, SEO-optimized blog post about "${keyword}".

SEO Data Context:
- Search Volume: ${seoData.search_volume ?? 'N/A'}
- Keyword Difficulty: ${seoData.keyword_difficulty ?? 'N/A'}
- Competition Level: ${seoData.competition_level ?? 'Medium'}
- Related Keywords: ${relatedKeywords}

Requirements:
1. Create an engaging title with the main keyword
2. Write a compelling introduction that hooks the reader
3. Structure the content with clear H2 and H3 headings
4. Include the main keyword naturally throughout (aim for 1-2% density)
5. Incorporate related keywords naturally
6. Add 3-5 placeholder affiliate links using the format {{AFF_LINK_1}}, {{AFF_LINK_2}}, etc.
7. Include a FAQ section with 3-4 common questions
8. End with a compelling conclusion that encourages action
9. Make it approximately 1500-2000 words
10. Use HTML formatting for structure

Content Style:
- Write in a friendly, authoritative tone
- Use bullet points and numbered lists where appropriate
- Include practical tips and actionable advice
- Make it valuable for readers searching for "${keyword}"
- Naturally mention product features, benefits, and comparisons

IMPORTANT: Return ONLY the HTML content without any markdown code blocks, backticks, or extra formatting. Start directly with the HTML content.
`
}
