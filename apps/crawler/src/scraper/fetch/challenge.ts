/**
 * Anti-bot interstitial detection.
 *
 * Keyword match over the page title and body text, lowercased. Used by the
 * HTTP fetcher to classify a response and by the renderer to decide whether
 * to keep waiting.
 */

const CHALLENGE_INDICATORS = [
  'cloudflare',
  'checking your browser',
  'ray id',
  'performance & security',
  'verify you are a human',
  'just a moment',
] as const

export function isChallengePage(title: string, body: string): boolean {
  const haystack = `${title}\n${body}`.toLowerCase()
  return CHALLENGE_INDICATORS.some(indicator => haystack.includes(indicator))
}

/** Interstitials are small; full album pages are not. */
const MAX_CHALLENGE_DOCUMENT_BYTES = 16 * 1024

/**
 * Same predicate over raw HTML. The body is only inspected for short
 * documents, since real pages load scripts from CDN hosts that contain
 * the same keywords.
 */
export function looksLikeChallengeHtml(html: string): boolean {
  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)
  const title = titleMatch ? titleMatch[1] : ''
  const body = html.length <= MAX_CHALLENGE_DOCUMENT_BYTES ? html : ''
  return isChallengePage(title, body)
}
