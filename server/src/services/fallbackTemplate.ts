import type { BlogPost, SeoData } from '../types'
import {
  calculateReadingTime,
  countWords,
  generateTags,
  renderHtmlDocument,
  toTitleCase,
} from '../utils/contentProcessing'

function formatMonthYear(date: Date): string {
  return date.toLocaleString('en-US', { month: 'long', year: 'numeric' })
}

/**
 * Static guide used when no model is configured or the model call fails. Already a full
 * document, so it skips cleanup and wrapping.
 */
export function buildFallbackPost(
  keyword: string,
  seoData: Pick<SeoData, 'related_keywords'>,
  now: Date = new Date()
): BlogPost {
  const titleCased = toTitleCase(keyword)
  const title = `The Ultimate Guide to ${titleCased}: Everything You Need to Know`

  const body = `    <h1>${title}</h1>
    
    <p>Welcome to our comprehensive guide about <strong>${keyword}</strong>. In this article, we'll cover everything you need to know to make an informed decision.</p>
    
    <h2>What Makes Great ${titleCased}?</h2>
    <p>When looking for the best ${keyword}, there are several key factors to consider:</p>
    <ul>
        <li>Quality and durability</li>
        <li>Value for money</li>
        <li>User reviews and ratings</li>
        <li>Brand reputation</li>
        <li>Warranty and support</li>
    </ul>
    
    <h2>Top Recommendations</h2>
    <p>Based on our research and testing, here are our top picks for ${keyword}:</p>
    
    <h3>1. Premium Choice</h3>
    <p>For those looking for the best quality, we recommend checking out <a href="https://amazon.com/affiliate/product1?tag=yourtag" target="_blank" rel="noopener">this premium option</a>.</p>
    
    <h3>2. Best Value</h3>
    <p>If you're looking for great value, <a href="https://amazon.com/affiliate/product2?tag=yourtag" target="_blank" rel="noopener">this budget-friendly choice</a> offers excellent features at an affordable price.</p>
    
    <h2>Buying Guide</h2>
    <p>Here's what to look for when shopping for ${keyword}:</p>
    <ol>
        <li>Set your budget range</li>
        <li>Read customer reviews</li>
        <li>Compare features</li>
        <li>Check warranty terms</li>
        <li>Consider future needs</li>
    </ol>
    
    <div class="faq">
        <h2>Frequently Asked Questions</h2>
        
        <h3>What's the best ${keyword} for beginners?</h3>
        <p>For beginners, we recommend starting with <a href="https://amazon.com/affiliate/product3?tag=yourtag" target="_blank" rel="noopener">this user-friendly option</a> that offers great features without overwhelming complexity.</p>
        
        <h3>How much should I spend on ${keyword}?</h3>
        <p>The price range varies widely, but you can find quality options starting from budget-friendly to premium levels. Consider your specific needs and budget.</p>
        
        <h3>Are there any special features I should look for?</h3>
        <p>Look for features that match your specific use case, such as durability, ease of use, and compatibility with your existing setup.</p>
    </div>
    
    <h2>Conclusion</h2>
    <p>Choosing the right ${keyword} doesn't have to be complicated. By considering the factors we've outlined and checking out our recommended options, you'll be well on your way to making the perfect choice for your needs.</p>
    
    <p><em>Last updated: ${formatMonthYear(now)}</em></p>`

  const content = renderHtmlDocument(title, body)
  const wordCount = countWords(content)

  return {
    title,
    content,
    word_count: wordCount,
    meta_description: `Complete guide to ${keyword}. Expert recommendations, buying tips, and reviews to help you choose the best ${keyword} for your needs.`,
    tags: generateTags(keyword, seoData),
    estimated_reading_time: calculateReadingTime(wordCount),
  }
}
