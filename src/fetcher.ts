import { PageFetchError } from './errors.js';
import { enforceCrawlDelay, isAllowed } from './robots.js';

export const FETCH_TIMEOUT_MS = 10_000;

const USER_AGENT = 'Mozilla/5.0 (compatible; url-digest/1.0)';

export interface FetchedPage {
    /** URL as given in the input list */
    url: string;
    /** URL after redirects */
    finalUrl: string;
    html: string;
}

export interface FetchPageOptions {
    /** Check robots.txt and keep the per-host crawl delay. Off by default. */
    respectRobots?: boolean;
    /** Lower bound for the per-host crawl delay in ms */
    crawlDelayMs?: number;
    timeoutMs?: number;
}

/**
 * Fetches one page. Any failure (invalid URL, robots.txt refusal, network
 * error, timeout, non-2xx status) is raised as a PageFetchError.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
    const { respectRobots = false, crawlDelayMs, timeoutMs = FETCH_TIMEOUT_MS } = options;

    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (err) {
        throw new PageFetchError(url, `Invalid URL: ${url}`, { cause: err });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new PageFetchError(url, `Unsupported URL scheme: ${parsed.protocol}`);
    }

    if (respectRobots) {
        if (!(await isAllowed(parsed.href))) {
            throw new PageFetchError(url, `Disallowed by robots.txt: ${url}`);
        }
        await enforceCrawlDelay(parsed.href, crawlDelayMs);
    }

    let res: Response;
    try {
        res = await fetch(parsed.href, {
            redirect: 'follow',
            headers: {
                'User-Agent': USER_AGENT,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            },
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new PageFetchError(url, `Failed to fetch ${url}: ${reason}`, { cause: err });
    }

    if (!res.ok) {
        throw new PageFetchError(url, `Failed to fetch ${url} (${res.status})`, { status: res.status });
    }

    let html: string;
    try {
        html = await res.text();
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new PageFetchError(url, `Failed to read body of ${url}: ${reason}`, { cause: err });
    }

    return { url, finalUrl: res.url || parsed.href, html };
}
