/**
 * Text generation service
 *
 * The pipeline only depends on the TextGenerator interface; Gemini is the
 * production implementation. No retries here: a failed call ends the run.
 */

import { GoogleGenAI } from '@google/genai'
import type { SamplingParams } from '@/lib/types/article'

export interface TextGenerator {
    generate(prompt: string, sampling: SamplingParams): Promise<string>
}

export class GenerationError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'GenerationError'
    }
}

export class GeminiTextGenerator implements TextGenerator {
    private readonly ai: GoogleGenAI

    constructor(apiKey: string, private readonly model: string) {
        this.ai = new GoogleGenAI({ apiKey })
    }

    async generate(prompt: string, sampling: SamplingParams): Promise<string> {
        console.log(`[Gemini] Generating with ${this.model} (max ${sampling.maxOutputTokens} tokens)`)
        const start = Date.now()

        // Without sampling, fall back to greedy decoding
        const samplingConfig = sampling.doSample
            ? { temperature: sampling.temperature, topP: sampling.topP }
            : { temperature: 0, topK: 1 }

        const response = await this.ai.models.generateContent({
            model: this.model,
            contents: prompt,
            config: {
                maxOutputTokens: sampling.maxOutputTokens,
                ...samplingConfig,
            },
        })

        const content = response.text || ''
        if (!content) {
            console.error('[Gemini] ERROR: No content from Gemini API')
            throw new GenerationError('No content from Gemini API')
        }

        console.log(`[Gemini] Received ${content.length} chars in ${Date.now() - start}ms`)
        return content
    }
}
