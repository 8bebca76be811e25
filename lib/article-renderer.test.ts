import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { assembleArticleHtml, renderArticle, stripConclusionLabel } from './article-renderer'
import type { StructuredDocument } from './types/article'

const article: StructuredDocument = {
    title: 'Сокровища моря',
    sections: [
        { heading: 'Начало', body: 'Корабль плыл по волнам. Команда искала приключения.' },
        { heading: 'Шторм', body: 'Ветер <b>крепчал</b>.' },
    ],
    conclusion: 'Вывод: Плавание завершилось успехом.',
}

describe('stripConclusionLabel', () => {
    it('removes a leading label and trims', () => {
        expect(stripConclusionLabel('вывод: Итог таков.')).toBe('Итог таков.')
    })

    it('removes a capitalised leading label', () => {
        expect(stripConclusionLabel('Вывод: Плавание завершилось успехом.')).toBe('Плавание завершилось успехом.')
    })

    it('leaves text without the label unchanged', () => {
        expect(stripConclusionLabel('Итог таков.')).toBe('Итог таков.')
    })

    it('only strips the label at the very start', () => {
        expect(stripConclusionLabel('Итог: вывод: очевиден.')).toBe('Итог: вывод: очевиден.')
    })

    it('strips only one occurrence', () => {
        expect(stripConclusionLabel('вывод: вывод: дважды.')).toBe('вывод: дважды.')
    })
})

describe('assembleArticleHtml', () => {
    it('places the title in the page title and the main heading', () => {
        const html = assembleArticleHtml(article)

        expect(html.startsWith('<!DOCTYPE html>\n<html lang="ru">\n<head>\n    <meta charset="UTF-8">')).toBe(true)
        expect(html).toContain('<meta name="viewport" content="width=device-width, initial-scale=1.0">')
        expect(html).toContain('    <title>Сокровища моря</title>\n')
        expect(html).toContain('<body>\n    <h1>Сокровища моря</h1>\n')
        expect(html.endsWith('\n</body>\n</html>')).toBe(true)
    })

    it('embeds the style rules', () => {
        const html = assembleArticleHtml(article)

        expect(html).toContain('        h2 { color: #2980b9; margin-top: 30px; }\n')
        expect(html).toContain('.conclusion { background: #ecf0f1;')
    })

    it('renders sections in order without escaping', () => {
        const html = assembleArticleHtml(article)

        expect(html).toContain(
            '    <h2>Начало</h2>\n' +
            '    <p>Корабль плыл по волнам. Команда искала приключения.</p>\n' +
            '    <h2>Шторм</h2>\n' +
            '    <p>Ветер <b>крепчал</b>.</p>\n'
        )
    })

    it('renders the conclusion block with the label stripped', () => {
        const html = assembleArticleHtml(article)

        expect(html).toContain(
            "    <div class='conclusion'>\n" +
            '        <h2>Вывод</h2>\n' +
            '        <p>Плавание завершилось успехом.</p>\n' +
            '    </div>\n'
        )
    })

    it('omits the conclusion block when there is no conclusion', () => {
        const html = assembleArticleHtml({ ...article, conclusion: '' })

        expect(html).not.toContain("<div class='conclusion'>")
        expect(html).toContain('    <p>Ветер <b>крепчал</b>.</p>\n\n</body>')
    })

    it('renders the exact page for an empty document', () => {
        const html = assembleArticleHtml({ title: '', sections: [], conclusion: '' })

        expect(html).toContain('    <title></title>\n')
        expect(html.endsWith('<body>\n    <h1></h1>\n\n</body>\n</html>')).toBe(true)
    })
})

describe('renderArticle', () => {
    let dir: string

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'article-renderer-'))
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('writes the assembled HTML as UTF-8', async () => {
        const destination = path.join(dir, 'article.html')

        await renderArticle(article, destination)

        expect(await readFile(destination, 'utf8')).toBe(assembleArticleHtml(article))
    })

    it('produces byte-identical output for repeated renders', async () => {
        const first = path.join(dir, 'first.html')
        const second = path.join(dir, 'second.html')

        await renderArticle(article, first)
        await renderArticle(article, second)

        expect((await readFile(first)).equals(await readFile(second))).toBe(true)
    })

    it('rejects when the destination directory does not exist', async () => {
        const destination = path.join(dir, 'missing', 'article.html')

        await expect(renderArticle(article, destination)).rejects.toMatchObject({ code: 'ENOENT' })
    })
})
