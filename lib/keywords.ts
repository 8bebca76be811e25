import { KEYWORD_COUNT } from '@/lib/article-prompt'

export class KeywordCountError extends Error {
    constructor(public readonly received: number) {
        super(
            `Ошибка: нужно ровно ${KEYWORD_COUNT} слов, получено ${received}.\n` +
            `Пример: --prompt 'волна корабль плыть приключение сокровища'`
        )
        this.name = 'KeywordCountError'
    }
}

/**
 * Normalise the topic words to single spaces. Exactly five are required.
 */
export function parseKeywords(input: string): string {
    const words = input.trim().split(/\s+/).filter(Boolean)

    if (words.length !== KEYWORD_COUNT) {
        throw new KeywordCountError(words.length)
    }

    return words.join(' ')
}
