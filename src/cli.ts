import { Command, CommanderError, Option } from 'commander';
import { ensureUrlList, runBatch, summarizeTextFile } from './batch.js';
import { DEFAULT_OUTPUT_DIR, resolveConfig, type AppConfig, type RawOptions } from './config.js';
import { loadPromptTemplate } from './prompt.js';
import { createSummarizer, type Summarizer, type SummarizerConfig } from './summarizer.js';

export interface CliDeps {
    createSummarizer?: (config: SummarizerConfig) => Summarizer;
    /** Receives the JSON report; stdout by default */
    print?: (text: string) => void;
}

export function createProgram(): Command {
    return new Command()
        .name('url-digest')
        .description('Summarize web articles or text files into structured Markdown with an LLM')
        .version('1.0.0')
        .addOption(new Option('-m, --mode <mode>', 'web: URL list, text: a single text file').choices(['web', 'text']).default('web'))
        .option('-i, --input <file>', 'URL list for web mode (urls.txt), text file for text mode (input.txt)')
        .option('-o, --output <path>', 'Directory for web mode (summaries), file for text mode')
        .option('-p, --prompt <file>', 'Custom prompt template, placed before the page content')
        .option('--model <id>', 'Model identifier (env URL_DIGEST_MODEL, default gpt-4o)')
        .option('--temperature <n>', 'Sampling temperature', '0.5')
        .addOption(new Option('-f, --format <format>', 'Page content sent to the model').choices(['text', 'markdown']).default('text'))
        .option('-c, --concurrency <n>', 'Pages processed at once', '1')
        .addOption(new Option('--on-error <policy>', 'What a failed URL does to the batch').choices(['skip', 'abort']).default('skip'))
        .option('--robots', 'Honor robots.txt and keep a per-host crawl delay')
        .option('--crawl-delay <ms>', 'Minimum delay between requests to one host with --robots', '500');
}

async function runWeb(config: AppConfig, template: string, deps: Required<CliDeps>): Promise<void> {
    if (await ensureUrlList(config.input)) {
        process.stderr.write(`[cli] Created sample ${config.input}. Add URLs to it and run again.\n`);
        return;
    }

    const report = await runBatch({
        urlsFile: config.input,
        outputDir: config.output ?? DEFAULT_OUTPUT_DIR,
        summarizer: deps.createSummarizer(config.summarizer),
        template,
        format: config.format,
        concurrency: config.concurrency,
        onError: config.onError,
        respectRobots: config.respectRobots,
        crawlDelayMs: config.crawlDelayMs,
    });

    deps.print(JSON.stringify({
        written: report.written,
        skipped: report.skipped,
        failed: report.failed,
        results: report.results,
    }, null, 2));
}

async function runText(config: AppConfig, template: string, deps: Required<CliDeps>): Promise<void> {
    const result = await summarizeTextFile({
        input: config.input,
        output: config.output,
        summarizer: deps.createSummarizer(config.summarizer),
        template,
    });
    deps.print(JSON.stringify(result, null, 2));
}

/**
 * Parses the arguments (without the node and script entries), runs the chosen
 * mode and returns the process exit code. Errors are printed, not thrown.
 */
export async function runCli(argv: string[], deps: CliDeps = {}, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const resolved: Required<CliDeps> = {
        createSummarizer: deps.createSummarizer ?? createSummarizer,
        print: deps.print ?? (text => console.log(text)),
    };

    try {
        const program = createProgram().exitOverride();
        program.parse(argv, { from: 'user' });
        const config = resolveConfig(program.opts<RawOptions>(), env);
        const template = await loadPromptTemplate(config.promptFile);

        if (config.mode === 'web') {
            await runWeb(config, template, resolved);
        } else {
            await runText(config, template, resolved);
        }
        return 0;
    } catch (error: unknown) {
        // Commander has already printed its own message (or help/version)
        if (error instanceof CommanderError) return error.exitCode;
        const message = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Error: ${message}\n`);
        return 1;
    }
}
