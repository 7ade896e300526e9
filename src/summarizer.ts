import OpenAI, {
    APIConnectionError,
    APIError,
    AuthenticationError,
    PermissionDeniedError,
    RateLimitError,
} from 'openai';
import {
    SummarizerApiError,
    SummarizerAuthError,
    SummarizerConnectionError,
    SummarizerError,
    SummarizerRateLimitError,
} from './errors.js';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_TEMPERATURE = 0.5;
export const DEFAULT_SUMMARIZER_TIMEOUT_MS = 120_000;

export interface Summarizer {
    /** Sends one prompt and resolves with the generated text. */
    summarize(prompt: string): Promise<string>;
}

/** Read-only settings, resolved once at start-up. */
export interface SummarizerConfig {
    /** Falls back to OPENAI_API_KEY inside the SDK when omitted */
    apiKey?: string;
    model: string;
    temperature: number;
    /** OpenAI-compatible endpoint; the SDK default when omitted */
    baseURL?: string;
    timeoutMs?: number;
    /** Custom fetch implementation handed to the SDK */
    fetch?: typeof fetch;
}

/**
 * Chat-completions summarizer over the official OpenAI SDK.
 * The SDK's own retries are turned off: every call is exactly one request.
 */
export class OpenAISummarizer implements Summarizer {
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly temperature: number;

    constructor(config: SummarizerConfig) {
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            maxRetries: 0,
            timeout: config.timeoutMs ?? DEFAULT_SUMMARIZER_TIMEOUT_MS,
            fetch: config.fetch,
        });
        this.model = config.model;
        this.temperature = config.temperature;
    }

    async summarize(prompt: string): Promise<string> {
        let content: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create({
                model: this.model,
                temperature: this.temperature,
                messages: [{ role: 'user', content: prompt }],
            });
            content = completion.choices[0]?.message?.content;
        } catch (err) {
            throw toSummarizerError(err);
        }

        if (!content?.trim()) {
            throw new SummarizerApiError(`Model ${this.model} returned an empty completion`);
        }
        return content;
    }
}

/**
 * Maps SDK failures onto the summarizer error taxonomy. Connection errors are
 * checked first: the SDK derives them from APIError.
 */
export function toSummarizerError(err: unknown): SummarizerError {
    if (err instanceof SummarizerError) return err;
    if (err instanceof APIConnectionError) {
        return new SummarizerConnectionError(`Could not reach the model API: ${err.message}`, { cause: err });
    }
    if (err instanceof RateLimitError) {
        return new SummarizerRateLimitError(`Rate limited by the model API: ${err.message}`, { cause: err });
    }
    if (err instanceof AuthenticationError || err instanceof PermissionDeniedError) {
        return new SummarizerAuthError(`Model API rejected the credentials: ${err.message}`, {
            status: err.status,
            cause: err,
        });
    }
    if (err instanceof APIError) {
        return new SummarizerApiError(`Model API error: ${err.message}`, {
            status: typeof err.status === 'number' ? err.status : undefined,
            cause: err,
        });
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new SummarizerError(`Summarization failed: ${reason}`, { cause: err });
}

export function createSummarizer(config: SummarizerConfig): Summarizer {
    return new OpenAISummarizer(config);
}
