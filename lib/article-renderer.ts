import fs from 'fs'
import { promisify } from 'util'
import { CONCLUSION_KEYWORD, CONCLUSION_LABEL } from '@/lib/article-parser'
import type { StructuredDocument } from '@/lib/types/article'

const writeFile = promisify(fs.writeFile)

const CONCLUSION_PREFIX = `${CONCLUSION_KEYWORD}:`

const ARTICLE_STYLES = `        body { font-family: 'Segoe UI', sans-serif; line-height: 1.7; max-width: 800px; margin: 40px auto; padding: 20px; background: #f9f9fb; color: #333; }
        h1 { color: #2c3e50; border-bottom: 3px solid #3498db; padding-bottom: 10px; }
        h2 { color: #2980b9; margin-top: 30px; }
        p { margin: 15px 0; text-align: justify; }
        .conclusion { background: #ecf0f1; padding: 20px; border-left: 5px solid #3498db; border-radius: 5px; }`

/**
 * The model often repeats "Вывод:" inside the conclusion paragraph itself.
 * Only a label at the very start is removed. The match ignores case: the
 * model usually writes it capitalised ("Вывод: ..."), and that form must be
 * stripped too.
 */
export function stripConclusionLabel(conclusion: string): string {
    if (conclusion.toLowerCase().startsWith(CONCLUSION_PREFIX)) {
        return conclusion.slice(CONCLUSION_PREFIX.length).trim()
    }
    return conclusion.trim()
}

/**
 * Builds the full HTML page. Model text is embedded verbatim, without escaping.
 */
export function assembleArticleHtml(document: StructuredDocument): string {
    let html = `<!DOCTYPE html>
<html lang="ru">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${document.title}</title>
    <style>
${ARTICLE_STYLES}
    </style>
</head>
<body>
    <h1>${document.title}</h1>
`

    for (const section of document.sections) {
        html += `    <h2>${section.heading}</h2>\n`
        html += `    <p>${section.body}</p>\n`
    }

    if (document.conclusion) {
        html += `    <div class='conclusion'>\n`
        html += `        <h2>${CONCLUSION_LABEL}</h2>\n`
        html += `        <p>${stripConclusionLabel(document.conclusion)}</p>\n`
        html += `    </div>\n`
    }

    html += `
</body>
</html>`

    return html
}

/**
 * Writes the rendered article to `destination` in a single UTF-8 write.
 * Write errors (missing directory, permissions) are left to the caller.
 */
export async function renderArticle(document: StructuredDocument, destination: string): Promise<void> {
    const html = assembleArticleHtml(document)
    await writeFile(destination, html, 'utf8')
    console.log(`[ArticleRenderer] Wrote ${html.length} chars to ${destination}`)
}
