import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_MODEL, DEFAULT_TEMPERATURE } from './summarizer.js';
import { DEFAULT_CRAWL_DELAY_MS } from './robots.js';

export const DEFAULT_URL_LIST = 'urls.txt';
export const DEFAULT_OUTPUT_DIR = 'summaries';
export const DEFAULT_TEXT_INPUT = 'input.txt';

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

const configSchema = z.object({
    mode: z.enum(['web', 'text']).default('web'),
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    prompt: z.string().min(1).optional(),
    model: z.string().min(1).default(DEFAULT_MODEL),
    temperature: numeric.pipe(z.number().min(0).max(2)).default(DEFAULT_TEMPERATURE),
    format: z.enum(['text', 'markdown']).default('text'),
    concurrency: numeric.pipe(z.number().int().min(1).max(16)).default(1),
    onError: z.enum(['skip', 'abort']).default('skip'),
    robots: z.boolean().default(false),
    crawlDelay: numeric.pipe(z.number().int().min(0)).default(DEFAULT_CRAWL_DELAY_MS),
    apiKey: z.string().min(1).optional(),
    baseURL: z.string().url().optional(),
});

export type RawOptions = z.input<typeof configSchema>;

export type Mode = 'web' | 'text';
export type FailurePolicy = 'skip' | 'abort';

export interface AppConfig {
    mode: Mode;
    /** URL list (web mode) or text file (text mode) */
    input: string;
    /** Output directory (web mode) or output file (text mode, undefined = derived) */
    output?: string;
    promptFile?: string;
    format: 'text' | 'markdown';
    concurrency: number;
    onError: FailurePolicy;
    respectRobots: boolean;
    crawlDelayMs: number;
    summarizer: {
        apiKey?: string;
        model: string;
        temperature: number;
        baseURL?: string;
    };
}

/**
 * Merges CLI options over the environment and defaults, validates the result
 * and returns a frozen config. Throws ConfigError listing every bad option.
 */
export function resolveConfig(options: RawOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = configSchema.safeParse({
        ...options,
        model: options.model ?? nonEmpty(env.URL_DIGEST_MODEL),
        apiKey: options.apiKey ?? nonEmpty(env.OPENAI_API_KEY),
        baseURL: options.baseURL ?? nonEmpty(env.OPENAI_BASE_URL),
    });
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${problems}`);
    }

    const o = parsed.data;
    const input = o.input ?? (o.mode === 'web' ? DEFAULT_URL_LIST : DEFAULT_TEXT_INPUT);
    const output = o.output ?? (o.mode === 'web' ? DEFAULT_OUTPUT_DIR : undefined);

    return Object.freeze({
        mode: o.mode,
        input,
        output,
        promptFile: o.prompt,
        format: o.format,
        concurrency: o.concurrency,
        onError: o.onError,
        respectRobots: o.robots,
        crawlDelayMs: o.crawlDelay,
        summarizer: Object.freeze({
            apiKey: o.apiKey,
            model: o.model,
            temperature: o.temperature,
            baseURL: o.baseURL,
        }),
    });
}

function nonEmpty(value: string | undefined): string | undefined {
    return value && value.trim() ? value.trim() : undefined;
}
