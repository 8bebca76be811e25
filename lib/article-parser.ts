/**
 * Converts the model's loosely structured reply into a StructuredDocument.
 *
 * The generator is asked for `#`-prefixed headings but does not always comply,
 * so the walk is tolerant: leading chatter before the first marker is dropped,
 * blank lines are ignored, the first marker always becomes the title, and the
 * conclusion is recognised by a case-insensitive "вывод" prefix.
 */

import type { ArticleSection, ParserState, StructuredDocument } from '@/lib/types/article'

export const HEADING_MARKER = '#'
export const CONCLUSION_KEYWORD = 'вывод'
export const CONCLUSION_LABEL = 'Вывод'

export function createEmptyDocument(): StructuredDocument {
    return { title: '', sections: [], conclusion: '' }
}

function createInitialState(): ParserState {
    return { currentHeading: null, bodyLines: [], inConclusion: false }
}

function isMarkerLine(line: string): boolean {
    return line.startsWith(HEADING_MARKER)
}

/**
 * Finalise the in-progress block. Headings without body text are dropped,
 * and a later conclusion overwrites an earlier one.
 */
export function flushBlock(
    document: StructuredDocument,
    state: ParserState
): { document: StructuredDocument; state: ParserState } {
    const cleared: ParserState = { ...state, bodyLines: [] }

    if (!state.currentHeading || state.bodyLines.length === 0) {
        return { document, state: cleared }
    }

    const body = state.bodyLines.join(' ').trim()

    if (state.inConclusion) {
        return { document: { ...document, conclusion: body }, state: cleared }
    }

    const section: ArticleSection = { heading: state.currentHeading, body }
    return {
        document: { ...document, sections: [...document.sections, section] },
        state: cleared,
    }
}

/**
 * Apply one marker line: flush the previous block, then decide whether the
 * heading is the title, the conclusion or a regular section.
 */
function applyHeading(
    document: StructuredDocument,
    state: ParserState,
    line: string
): { document: StructuredDocument; state: ParserState } {
    const flushed = flushBlock(document, state)
    const headerText = line.slice(HEADING_MARKER.length).trim()

    if (!flushed.document.title) {
        return { document: { ...flushed.document, title: headerText }, state: flushed.state }
    }

    if (headerText.toLowerCase().startsWith(CONCLUSION_KEYWORD)) {
        return {
            document: flushed.document,
            state: { currentHeading: CONCLUSION_LABEL, bodyLines: [], inConclusion: true },
        }
    }

    return {
        document: flushed.document,
        state: { currentHeading: headerText, bodyLines: [], inConclusion: false },
    }
}

export function parseArticle(rawText: string): StructuredDocument {
    const lines = rawText
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0)

    const firstMarker = lines.findIndex(isMarkerLine)
    if (firstMarker === -1) {
        return createEmptyDocument()
    }

    let document = createEmptyDocument()
    let state = createInitialState()

    for (const line of lines.slice(firstMarker)) {
        if (isMarkerLine(line)) {
            ({ document, state } = applyHeading(document, state, line))
        } else if (state.currentHeading) {
            state = { ...state, bodyLines: [...state.bodyLines, line] }
        }
    }

    // The last block (usually the conclusion) has no following marker to flush it
    return flushBlock(document, state).document
}
