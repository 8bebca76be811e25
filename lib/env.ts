/**
 * Environment variable utilities
 * Validates and provides typed access to environment variables
 */

export const env = {
  // Gemini
  get GEMINI_KEY(): string {
    return process.env.GEMINI_KEY || ''
  },
  get GEMINI_MODEL(): string {
    return process.env.GEMINI_MODEL || 'gemini-2.5-flash'
  },

  // Output
  get ARTICLE_OUTPUT(): string {
    return process.env.ARTICLE_OUTPUT || 'article.html'
  },
}

/**
 * Validate that required environment variables are set
 */
export function validateEnv(): { valid: boolean; missing: string[] } {
  const required = ['GEMINI_KEY'] as const

  const missing: string[] = []

  for (const key of required) {
    if (!env[key]) {
      missing.push(key)
    }
  }

  return {
    valid: missing.length === 0,
    missing,
  }
}
