import { describe, it, expect, afterEach, vi } from 'vitest'
import { env, validateEnv } from './env'

describe('env', () => {
    afterEach(() => {
        vi.unstubAllEnvs()
    })

    it('falls back to defaults', () => {
        vi.stubEnv('GEMINI_MODEL', '')
        vi.stubEnv('ARTICLE_OUTPUT', '')

        expect(env.GEMINI_MODEL).toBe('gemini-2.5-flash')
        expect(env.ARTICLE_OUTPUT).toBe('article.html')
    })

    it('reads values set after import', () => {
        vi.stubEnv('GEMINI_MODEL', 'gemini-2.5-pro')

        expect(env.GEMINI_MODEL).toBe('gemini-2.5-pro')
    })

    it('reports a missing GEMINI_KEY', () => {
        vi.stubEnv('GEMINI_KEY', '')

        expect(validateEnv()).toEqual({ valid: false, missing: ['GEMINI_KEY'] })
    })

    it('is valid when GEMINI_KEY is set', () => {
        vi.stubEnv('GEMINI_KEY', 'test-key')

        expect(validateEnv()).toEqual({ valid: true, missing: [] })
    })
})
