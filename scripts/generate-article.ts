/**
 * Generates a Russian article from five topic words and saves it as HTML.
 *
 * Usage:
 *   npm run generate -- --prompt "волна корабль плыть приключение сокровища" --output article.html
 */

import path from 'path'
import { pathToFileURL } from 'url'
import { config } from 'dotenv'
import { env, validateEnv } from '@/lib/env'
import { parseKeywords } from '@/lib/keywords'
import { GeminiTextGenerator } from '@/lib/text-generator'
import { runArticlePipeline } from '@/lib/article-pipeline'

export interface CliArgs {
    prompt: string
    output: string
}

const FLAGS = ['prompt', 'output'] as const
type Flag = (typeof FLAGS)[number]

function isFlag(name: string): name is Flag {
    return (FLAGS as readonly string[]).includes(name)
}

/**
 * Parse `--prompt` and `--output`, accepting `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[], defaultOutput = 'article.html'): CliArgs | { error: string } {
    const values: Partial<Record<Flag, string>> = {}

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i]
        if (!arg.startsWith('--')) {
            return { error: `Unexpected argument: ${arg}` }
        }

        const eq = arg.indexOf('=')
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
        if (!isFlag(name)) {
            return { error: `Unknown option: --${name}` }
        }

        if (eq !== -1) {
            values[name] = arg.slice(eq + 1)
            continue
        }

        const next = argv[i + 1]
        if (next === undefined || next.startsWith('--')) {
            return { error: `Missing value for --${name}` }
        }
        values[name] = next
        i++
    }

    if (values.prompt === undefined) {
        return { error: 'Missing required option: --prompt' }
    }

    return { prompt: values.prompt, output: values.output ?? defaultOutput }
}

/**
 * True when `moduleUrl` belongs to the script node was started with.
 */
export function isDirectRun(moduleUrl: string, scriptPath: string | undefined): boolean {
    if (!scriptPath) return false
    return moduleUrl === pathToFileURL(path.resolve(scriptPath)).href
}

/* v8 ignore start -- CLI entry point uses process.exit */
async function main(): Promise<void> {
    config({ path: path.resolve(process.cwd(), '.env.local') })
    config()

    const parsed = parseCliArgs(process.argv.slice(2), env.ARTICLE_OUTPUT)
    if ('error' in parsed) {
        console.error(parsed.error)
        process.exit(1)
    }

    const { valid, missing } = validateEnv()
    if (!valid) {
        console.error('Missing required environment variables:')
        for (const key of missing) {
            console.error(`  ${key}: MISSING`)
        }
        process.exit(1)
    }

    let keywords: string
    try {
        keywords = parseKeywords(parsed.prompt)
    } catch (error) {
        console.error(error instanceof Error ? error.message : 'Unknown error')
        process.exit(1)
    }

    await runArticlePipeline({
        keywords,
        outputPath: path.resolve(parsed.output),
        generator: new GeminiTextGenerator(env.GEMINI_KEY, env.GEMINI_MODEL),
    })
}

// Only run main when executed directly (not when imported for testing)
if (isDirectRun(import.meta.url, process.argv[1])) {
    main().catch((error: unknown) => {
        console.error('Article generation failed:', error instanceof Error ? error.message : 'Unknown error')
        process.exit(1)
    })
}
/* v8 ignore stop */
