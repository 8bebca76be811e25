/**
 * Article types shared by the parser, renderer and generation pipeline
 */

/**
 * A body section: heading text plus its paragraph
 */
export interface ArticleSection {
    heading: string
    body: string
}

/**
 * Parsed article, built once per run from the raw model output
 */
export interface StructuredDocument {
    title: string
    sections: ArticleSection[]
    conclusion: string // empty when the model produced no conclusion block
}

/**
 * Sampling settings forwarded to the text generation service
 */
export interface SamplingParams {
    maxOutputTokens: number
    temperature: number
    topP: number
    doSample: boolean
}

/**
 * Accumulator carried through the parser's line walk
 */
export interface ParserState {
    currentHeading: string | null
    bodyLines: string[]
    inConclusion: boolean
}
