import type { SamplingParams } from '@/lib/types/article'

export const KEYWORD_COUNT = 5

export const DEFAULT_SAMPLING: SamplingParams = {
    maxOutputTokens: 800,
    temperature: 0.8,
    topP: 0.9,
    doSample: true,
}

/**
 * Instruction asking for a Russian article built from all keywords, with
 * `#`-marked title, body headings and conclusion so the parser can split it.
 */
export function buildArticlePrompt(keywords: string): string {
    return (
        `Напиши информативную и логичную статью на русском языке используя все слова из: ${keywords}. ` +
        `Структурируй текст обособленными #заголовком, #абзацами и #выводом. Пиши только текст статьи.`
    )
}
