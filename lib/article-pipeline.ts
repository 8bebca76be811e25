import { buildArticlePrompt, DEFAULT_SAMPLING } from '@/lib/article-prompt'
import { parseArticle } from '@/lib/article-parser'
import { renderArticle } from '@/lib/article-renderer'
import type { TextGenerator } from '@/lib/text-generator'
import type { SamplingParams, StructuredDocument } from '@/lib/types/article'

export interface ArticlePipelineOptions {
    keywords: string
    outputPath: string
    generator: TextGenerator
    sampling?: SamplingParams
}

/**
 * Generate, parse and render one article. Steps run strictly in sequence.
 */
export async function runArticlePipeline(options: ArticlePipelineOptions): Promise<StructuredDocument> {
    const { keywords, outputPath, generator, sampling = DEFAULT_SAMPLING } = options

    console.log(`[ArticlePipeline] Генерация статьи по теме: ${keywords}`)

    const rawText = await generator.generate(buildArticlePrompt(keywords), sampling)
    const document = parseArticle(rawText)

    console.log(`[ArticlePipeline] Parsed "${document.title}": ${document.sections.length} sections, conclusion ${document.conclusion ? 'present' : 'missing'}`)
    if (!document.title) {
        console.warn('[ArticlePipeline] No heading markers found in model output, rendering an empty article')
    }

    await renderArticle(document, outputPath)
    console.log(`[ArticlePipeline] HTML сохранён: ${outputPath}`)

    return document
}
