import { createHash } from 'crypto';

const MAX_SLUG_LENGTH = 80;

/**
 * Turns a URL into a filesystem-safe, deterministic file stem.
 *
 *   https://www.example.com/blog/My-Post?id=7  →  example-com-blog-my-post-id-7-9588dd04
 *
 * The scheme, a leading "www." and the fragment are ignored, so URLs differing
 * only in those share a stem. The readable part is lower-cased and folds every
 * run of punctuation into "-", then cut at 80 characters; the trailing 8 hex
 * characters of the SHA-1 of the case-preserved host, path and query keep
 * distinct URLs on distinct stems.
 */
export function slugifyUrl(url: string): string {
    let source: string;
    try {
        const u = new URL(url);
        source = u.hostname.replace(/^www\./, '') + u.pathname + u.search;
    } catch {
        source = url;
    }

    const slug = source
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, MAX_SLUG_LENGTH)
        .replace(/-+$/, '');

    const hash = createHash('sha1').update(source).digest('hex').slice(0, 8);
    return `${slug || 'page'}-${hash}`;
}

/** File name for a URL's summary. */
export function summaryFileName(url: string): string {
    return `${slugifyUrl(url)}.md`;
}
