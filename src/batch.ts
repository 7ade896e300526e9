import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { extractPage, type ExtractFormat } from './extract.js';
import { fetchPage, type FetchedPage } from './fetcher.js';
import { buildPrompt, DEFAULT_PROMPT_TEMPLATE, SUMMARY_SECTIONS } from './prompt.js';
import { findMissingSections } from './sections.js';
import { summaryFileName } from './slug.js';
import type { Summarizer } from './summarizer.js';
import type { FailurePolicy } from './config.js';
import { BatchAbortedError, EmptyInputError, describeError } from './errors.js';

export type FailureStage = 'fetch' | 'summarize';

export type UrlOutcome =
    | { status: 'written'; url: string; file: string; missingSections: string[] }
    | { status: 'skipped'; url: string; reason: string }
    | { status: 'failed'; url: string; stage: FailureStage; reason: string };

export interface BatchReport {
    /** One outcome per input line, in input order */
    results: UrlOutcome[];
    written: number;
    skipped: number;
    failed: number;
}

export interface RunBatchOptions {
    urlsFile: string;
    outputDir: string;
    summarizer: Summarizer;
    /** Prompt template; the built-in five-section template when omitted */
    template?: string;
    format?: ExtractFormat;
    /** Pages processed at once. 1 keeps the run strictly sequential. */
    concurrency?: number;
    onError?: FailurePolicy;
    respectRobots?: boolean;
    crawlDelayMs?: number;
}

const SAMPLE_URL_LIST = [
    '# Add URLs here, one per line',
    '# Lines starting with # are ignored',
    '# Example:',
    '# https://example.com/blog-post',
    '',
].join('\n');

// ── URL list ───────────────────────────────────────────────────────────────────

/**
 * Reads the URL list: one URL per line, in file order, duplicates kept.
 * Blank lines and lines starting with '#' are skipped.
 */
export async function readUrlList(file: string): Promise<string[]> {
    const text = await fs.readFile(file, 'utf-8');
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Creates a commented sample URL list when the file does not exist yet.
 * Returns true if the sample was written.
 */
export async function ensureUrlList(file: string): Promise<boolean> {
    try {
        await fs.access(file);
        return false;
    } catch {
        await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
        await fs.writeFile(file, SAMPLE_URL_LIST, 'utf-8');
        return true;
    }
}

// ── Output ─────────────────────────────────────────────────────────────────────

export function renderSummaryFile(url: string, summary: string, title?: string): string {
    const heading = title ?? `Summary for: ${url}`;
    return `# ${heading}\n\nSource: ${url}\n\n${summary.trim()}\n`;
}

// ── Batch runner ───────────────────────────────────────────────────────────────

/**
 * Runs every URL of the list through fetch → extract → prompt → summarize and
 * writes one `<slug>.md` per URL into outputDir, overwriting earlier runs.
 *
 * Fetch and summarization failures are per-URL: under the `skip` policy they
 * are logged and recorded in the report, under `abort` the first one stops the
 * batch with a BatchAbortedError. Pages without extractable text are skipped.
 * Errors writing the output are never caught.
 */
export async function runBatch(options: RunBatchOptions): Promise<BatchReport> {
    const {
        urlsFile,
        outputDir,
        summarizer,
        template = DEFAULT_PROMPT_TEMPLATE,
        format = 'text',
        concurrency = 1,
        onError = 'skip',
        respectRobots = false,
        crawlDelayMs,
    } = options;

    const urls = await readUrlList(urlsFile);
    await fs.mkdir(outputDir, { recursive: true });

    // Section check only makes sense for the template that asks for them
    const expectedSections = template === DEFAULT_PROMPT_TEMPLATE ? SUMMARY_SECTIONS : [];

    process.stderr.write(`[batch] ${urls.length} URLs from ${urlsFile} → ${outputDir}\n`);

    const limit = pLimit(concurrency);

    async function processUrl(url: string, position: number): Promise<UrlOutcome> {
        process.stderr.write(`[batch] Processing URL ${position}/${urls.length}: ${url}\n`);

        const fail = (stage: FailureStage, err: unknown): UrlOutcome => {
            if (onError === 'abort') throw new BatchAbortedError(url, err);
            const reason = describeError(err);
            process.stderr.write(`[batch] Failed to ${stage} ${url}: ${reason}\n`);
            return { status: 'failed', url, stage, reason };
        };

        let page: FetchedPage;
        try {
            page = await fetchPage(url, { respectRobots, crawlDelayMs });
        } catch (err) {
            return fail('fetch', err);
        }

        let title: string | undefined;
        let content = '';
        try {
            ({ title, content } = extractPage(page.html, { url: page.finalUrl, format }));
        } catch (err) {
            process.stderr.write(`[batch] Extraction failed for ${url}, treating as empty: ${err}\n`);
        }
        if (!content.trim()) {
            process.stderr.write(`[batch] Skipping ${url}: no content extracted\n`);
            return { status: 'skipped', url, reason: 'no content extracted' };
        }

        let summary: string;
        try {
            summary = await summarizer.summarize(buildPrompt(content, template));
        } catch (err) {
            return fail('summarize', err);
        }

        const file = path.join(outputDir, summaryFileName(url));
        await fs.writeFile(file, renderSummaryFile(url, summary, title), 'utf-8');

        const missingSections = findMissingSections(summary, expectedSections);
        if (missingSections.length > 0) {
            process.stderr.write(`[batch] ${url}: summary is missing ${missingSections.join(', ')}\n`);
        }
        process.stderr.write(`[batch] ✓ ${url} → ${file}\n`);
        return { status: 'written', url, file, missingSections };
    }

    const results = await Promise.all(
        urls.map((url, i) =>
            limit(async () => {
                try {
                    return await processUrl(url, i + 1);
                } catch (err) {
                    // Drop pending URLs; in-flight ones finish on their own
                    limit.clearQueue();
                    throw err;
                }
            })
        )
    );

    const report: BatchReport = {
        results,
        written: results.filter(r => r.status === 'written').length,
        skipped: results.filter(r => r.status === 'skipped').length,
        failed: results.filter(r => r.status === 'failed').length,
    };
    process.stderr.write(
        `[batch] Done: ${report.written} written, ${report.skipped} skipped, ${report.failed} failed\n`
    );
    return report;
}

// ── Single text file ───────────────────────────────────────────────────────────

export interface SummarizeTextFileOptions {
    input: string;
    /** Defaults to `<input without extension>_summary.md` */
    output?: string;
    summarizer: Summarizer;
    template?: string;
}

export interface TextFileResult {
    output: string;
    missingSections: string[];
}

/**
 * Summarizes one local text file. Unlike the batch runner, every failure
 * propagates: there is nothing else to continue with.
 */
export async function summarizeTextFile(options: SummarizeTextFileOptions): Promise<TextFileResult> {
    const { input, summarizer, template = DEFAULT_PROMPT_TEMPLATE } = options;
    const output = options.output ?? defaultTextOutput(input);

    process.stderr.write(`[text] Processing text file: ${input}\n`);
    const content = (await fs.readFile(input, 'utf-8')).trim();
    if (!content) throw new EmptyInputError(input);

    const summary = await summarizer.summarize(buildPrompt(content, template));
    await fs.writeFile(output, `# Summary for: ${input}\n\n${summary.trim()}\n`, 'utf-8');

    const expectedSections = template === DEFAULT_PROMPT_TEMPLATE ? SUMMARY_SECTIONS : [];
    const missingSections = findMissingSections(summary, expectedSections);
    if (missingSections.length > 0) {
        process.stderr.write(`[text] Summary is missing ${missingSections.join(', ')}\n`);
    }
    process.stderr.write(`[text] ✓ Saved summary to ${output}\n`);
    return { output, missingSections };
}

export function defaultTextOutput(input: string): string {
    const ext = path.extname(input);
    const base = ext ? input.slice(0, -ext.length) : input;
    return `${base}_summary.md`;
}
