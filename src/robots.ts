/**
 * robots.txt compliance helper.
 *
 * Fetches and caches robots.txt for each host (one fetch per host per
 * process). Uses the `robots-parser` package to evaluate allow/disallow rules
 * and crawl-delay directives.
 */

// Local type for the parsed robots instance (mirrors robots-parser's Robot interface)
interface RobotsInstance {
    isAllowed(url: string, ua?: string): boolean | undefined;
    getCrawlDelay(ua?: string): number | undefined;
}

import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const robotsParser: (url: string, content: string) => RobotsInstance = require('robots-parser');

export const ROBOTS_USER_AGENT = 'url-digest';
export const DEFAULT_CRAWL_DELAY_MS = 500;

// In-memory cache: hostname → parsed robots instance (null = fetch failed / robots.txt missing)
const robotsCache = new Map<string, RobotsInstance | null>();
// Crawl delay requested by robots.txt per hostname (ms)
const delayCache = new Map<string, number>();
// Time of the last claimed request slot per hostname (for rate limiting)
const lastRequestTime = new Map<string, number>();

/**
 * Fetches and parses robots.txt for the given URL's hostname.
 * Caches the result so each host is only fetched once per process lifetime.
 */
async function getRobots(url: string): Promise<RobotsInstance | null> {
    const { hostname, origin } = new URL(url);

    if (robotsCache.has(hostname)) {
        return robotsCache.get(hostname) ?? null;
    }

    const robotsUrl = `${origin}/robots.txt`;
    try {
        const res = await fetch(robotsUrl, {
            headers: { 'User-Agent': ROBOTS_USER_AGENT },
            signal: AbortSignal.timeout(5000),
        });
        if (!res.ok) {
            robotsCache.set(hostname, null);
            return null;
        }
        const text = await res.text();
        const robots = robotsParser(robotsUrl, text);
        robotsCache.set(hostname, robots);

        const crawlDelay = robots.getCrawlDelay(ROBOTS_USER_AGENT) ?? robots.getCrawlDelay('*');
        if (crawlDelay !== undefined) {
            delayCache.set(hostname, crawlDelay * 1000);
        }
        return robots;
    } catch (err) {
        // If robots.txt is unreachable, treat as "allow all"
        process.stderr.write(`[robots] Could not read ${robotsUrl}: ${err}\n`);
        robotsCache.set(hostname, null);
        return null;
    }
}

/**
 * Returns true if the given URL may be fetched according to robots.txt.
 * If robots.txt cannot be fetched, defaults to allowing the URL.
 */
export async function isAllowed(url: string): Promise<boolean> {
    const robots = await getRobots(url);
    if (!robots) return true;
    return robots.isAllowed(url, ROBOTS_USER_AGENT) !== false;
}

/**
 * Returns the delay to keep between two requests to the URL's host:
 * the robots.txt Crawl-delay, but never less than minDelayMs.
 */
export async function getCrawlDelay(url: string, minDelayMs: number = DEFAULT_CRAWL_DELAY_MS): Promise<number> {
    await getRobots(url);
    const requested = delayCache.get(new URL(url).hostname) ?? 0;
    return Math.max(requested, minDelayMs);
}

/**
 * Enforces the per-host crawl delay by sleeping until the host's next free
 * slot. The slot is claimed before sleeping, so concurrent callers for one
 * host are released one delay apart.
 */
export async function enforceCrawlDelay(url: string, minDelayMs: number = DEFAULT_CRAWL_DELAY_MS): Promise<void> {
    const { hostname } = new URL(url);
    const delay = await getCrawlDelay(url, minDelayMs);
    const now = Date.now();
    const last = lastRequestTime.get(hostname);
    const slot = last === undefined ? now : Math.max(now, last + delay);
    lastRequestTime.set(hostname, slot);
    if (slot > now) {
        await sleep(slot - now);
    }
}

/**
 * Clears the in-memory robots cache. Useful for tests.
 */
export function clearRobotsCache(): void {
    robotsCache.clear();
    delayCache.clear();
    lastRequestTime.clear();
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
