// Content checks and sanitizing for user-submitted text

const SPAM_PATTERNS = [
  /(.)\1{10,}/i, // aaaaaaaaaaa
  /\b(?:buy|click|subscribe|follow|compra|clica)\s+(?:now|here|my|ara|aquí)\b/i,
  /(?:https?:\/\/[^\s]+\s*){3,}/i, // link dumps
]

export type ModerationResult = {
  allowed: boolean
  reason?: string
}

export function moderateContent(text: string, maxLength = 1000): ModerationResult {
  const normalizedText = text.trim()

  if (normalizedText.length === 0) {
    return { allowed: false, reason: 'Content is empty' }
  }
  if (normalizedText.length > maxLength) {
    return { allowed: false, reason: `Content too long (max ${maxLength} characters)` }
  }
  for (const pattern of SPAM_PATTERNS) {
    if (pattern.test(normalizedText)) {
      return { allowed: false, reason: 'Content looks like spam' }
    }
  }
  if (isLikelySpam(normalizedText)) {
    return { allowed: false, reason: 'Content looks like spam' }
  }
  return { allowed: true }
}

/**
 * Escape text for interpolation into HTML (emails, server-rendered markup).
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;')
}

const ALLOWED_TAGS = new Set(['p', 'br', 'strong', 'em', 'u', 'a'])
const SAFE_HREF = /^(?:https?:|mailto:|\/)/i

function cleanTag(match: string, closing: string, rawName: string, attrs: string): string {
  const name = rawName.toLowerCase()
  if (!ALLOWED_TAGS.has(name)) return ''
  if (closing) return `</${name}>`
  if (name !== 'a') return `<${name}>`

  const kept: string[] = []
  for (const [, attr, dq, sq] of attrs.matchAll(/([a-z-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/gi)) {
    const value = dq ?? sq ?? ''
    const key = attr.toLowerCase()
    if (key === 'title' || (key === 'href' && SAFE_HREF.test(value.trim()))) {
      kept.push(`${key}="${sanitizeText(value)}"`)
    }
  }
  return kept.length ? `<a ${kept.join(' ')}>` : '<a>'
}

/**
 * Keep a small set of formatting tags (p, br, strong, em, u, a[href|title])
 * and strip every other tag. Text outside tags is left as written.
 */
export function sanitizeHtml(text: string): string {
  return text
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(\/?)([a-z][a-z0-9]*)\b([^>]*)>/gi, cleanTag)
}

/**
 * Check if text looks like spam
 */
export function isLikelySpam(text: string): boolean {
  const normalizedText = text.toLowerCase()

  // All caps
  if (text.length > 20 && /\p{L}/u.test(text) && text === text.toUpperCase()) {
    return true
  }

  // Mostly numbers/symbols
  const letterCount = (text.match(/\p{L}/gu) || []).length
  if (text.length > 10 && letterCount / text.length < 0.3) {
    return true
  }

  // Repeated words
  const words = normalizedText.split(/\s+/)
  const uniqueWords = new Set(words)
  if (words.length > 5 && uniqueWords.size / words.length < 0.3) {
    return true
  }

  return false
}
