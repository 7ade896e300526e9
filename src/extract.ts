import { JSDOM } from 'jsdom';
import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';
import { getProfile, type SiteProfile } from './profiles.js';

export type ExtractFormat = 'text' | 'markdown';

export interface ExtractedPage {
    /** Cleaned document title, if the page has one */
    title?: string;
    /** Plain text or Markdown, depending on the requested format */
    content: string;
}

const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
});

// Enable GitHub Flavored Markdown (tables, strikethrough, task lists)
turndownService.use(gfm);

// ── Code block language detection ──────────────────────────────────────────────
// Intercept <pre><code> blocks and extract the language from CSS class names.
turndownService.addRule('fencedCodeBlock', {
    filter(node) {
        return (
            node.nodeName === 'PRE' &&
            node.firstChild != null &&
            node.firstChild.nodeName === 'CODE'
        );
    },
    replacement(content, node) {
        const codeEl = node.querySelector('code');
        if (!codeEl) return content;

        const lang = detectLanguage(codeEl.className);
        const code = codeEl.textContent ?? '';
        return `\n\`\`\`${lang}\n${code.replace(/\n$/, '')}\n\`\`\`\n`;
    },
});

const LANGUAGE_ALIASES: Record<string, string> = {
    js: 'javascript',
    ts: 'typescript',
    py: 'python',
    rb: 'ruby',
    sh: 'bash',
    yml: 'yaml',
    md: 'markdown',
};

/**
 * Detects the programming language from a CSS class string.
 * Supports: language-*, lang-*, prism-*, hljs-*, syntax-*
 */
export function detectLanguage(className: string): string {
    const patterns = [
        /\blanguage-(\w[\w.-]*)/i,
        /\blang-(\w[\w.-]*)/i,
        /\bprism-(\w[\w.-]*)/i,
        /\bhljs-(\w[\w.-]*)/i,
        /\bsyntax-(\w[\w.-]*)/i,
    ];
    for (const re of patterns) {
        const m = className.match(re);
        if (m) {
            const lang = m[1].toLowerCase();
            return LANGUAGE_ALIASES[lang] ?? lang;
        }
    }
    return '';
}

// ── Generic selectors (used after the profile's own) ───────────────────────────

/**
 * Ordered list of CSS selectors to find the main content container.
 * Tried top-to-bottom; stops at the first match with sufficient text.
 */
const GENERIC_CONTENT_SELECTORS = [
    'main',
    '[role="main"]',
    'article',
    '.post-content',
    '.entry-content',
    '.article-content',
    '.article',
    '.content',
    '.main-content',
    '.markdown-body',
    '.prose',
    '#content',
    '#main-content',
    '#main',
    '[class*="content"]',
    '[class*="article"]',
];

/**
 * CSS selectors for elements to remove before extraction.
 */
const GENERIC_NOISE_SELECTORS = [
    'script', 'style', 'noscript', 'template', 'iframe', 'svg',
    'header', 'nav', 'footer', 'aside',
    '[role="navigation"]', '[role="banner"]', '[role="contentinfo"]',
    '.sidebar', '.side-nav', '.toc', '.table-of-contents',
    '#sidebar', '#toc',
    '.nav', '.navigation', '.navbar', '.breadcrumb', '.breadcrumbs',
    '.cookie-banner', '.cookie-consent', '#onetrust-consent-sdk',
    '[class*="cookie"]', '[id*="cookie"]',
    '.newsletter', '.share', '.social-share', '.related-posts',
    '.ads', '.advertisement', '.ad-banner',
    '[aria-hidden="true"]', '[hidden]',
    '.skip-nav', '.skip-link',
];

/** Elements whose text is emitted as one line each, in document order. */
const READABLE_BLOCKS = 'h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, figcaption, dt, dd, td, th';

const MIN_CONTAINER_TEXT = 100;

/** Any tag, comment or doctype opener. */
const MARKUP_PATTERN = /<[a-z!/?]/i;

// ── Shared DOM preparation ─────────────────────────────────────────────────────

/**
 * Parses the HTML, strips noise and returns the best content container
 * (or <body> when nothing matches) together with the document title.
 */
function prepareContent(html: string, url?: string, profile?: SiteProfile): { root: Element; title?: string } {
    const dom = url ? new JSDOM(html, { url }) : new JSDOM(html);
    const document = dom.window.document;
    const title = cleanTitle(document.title);

    const noiseSelectors = [
        ...(profile?.noise_selectors ?? []),
        ...GENERIC_NOISE_SELECTORS,
    ];
    for (const selector of noiseSelectors) {
        try {
            document.querySelectorAll(selector).forEach(el => el.remove());
        } catch { /* jsdom may reject some selectors */ }
    }

    const contentSelectors = [
        ...(profile?.content_selectors ?? []),
        ...GENERIC_CONTENT_SELECTORS,
    ];
    for (const selector of contentSelectors) {
        try {
            const el = document.querySelector(selector);
            if (el && (el.textContent?.trim().length ?? 0) > MIN_CONTAINER_TEXT) {
                return { root: el, title };
            }
        } catch { /* invalid selector */ }
    }

    return { root: document.body, title };
}

function hasBlockAncestor(el: Element, root: Element): boolean {
    for (let parent = el.parentElement; parent && parent !== root; parent = parent.parentElement) {
        if (parent.matches(READABLE_BLOCKS)) return true;
    }
    return false;
}

function collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

// ── Renderers ──────────────────────────────────────────────────────────────────

function renderText(root: Element): string {
    const lines: string[] = [];
    root.querySelectorAll(READABLE_BLOCKS).forEach(el => {
        if (hasBlockAncestor(el, root)) return;
        const raw = el.textContent ?? '';
        const text = el.nodeName === 'PRE'
            ? raw.replace(/^\n+/, '').trimEnd()
            : collapse(raw);
        if (text) lines.push(text);
    });

    if (lines.length === 0) return collapse(root.textContent ?? '');
    return lines.join('\n');
}

function renderMarkdown(root: Element): string {
    if (!root.innerHTML.trim()) return '';
    return turndownService.turndown(root.innerHTML).trim();
}

// ── Public extractors ──────────────────────────────────────────────────────────

/**
 * Extracts the readable text of a page as plain lines.
 *
 * Noise is stripped and the main container chosen as in extractMarkdown; then
 * each readable block (headings, paragraphs, list items, code, quotes, table
 * cells) becomes one line. Blocks nested inside another block are covered by
 * their ancestor. Whitespace is collapsed except inside <pre>.
 *
 * A container without readable blocks falls back to its whole text. Input
 * with no markup at all yields an empty string.
 */
export function extractText(html: string, url?: string, profile?: SiteProfile): string {
    if (!MARKUP_PATTERN.test(html)) return '';
    return renderText(prepareContent(html, url, profile).root);
}

/**
 * Extracts the main content of a page and converts it to Markdown.
 *
 * Strategy:
 * 1. Remove all noise elements (profile-specific selectors + generic fallback).
 * 2. Find the best content container (profile selectors first, then generic list).
 * 3. Fall back to <body> if no container matches.
 * 4. Convert to Markdown via Turndown + GFM + language-detected code blocks.
 */
export function extractMarkdown(html: string, url?: string, profile?: SiteProfile): string {
    if (!MARKUP_PATTERN.test(html)) return '';
    return renderMarkdown(prepareContent(html, url, profile).root);
}

/**
 * Runs the extractor for the requested format, choosing the site profile from
 * the URL, and returns the content together with the page title.
 */
export function extractPage(html: string, options: { url?: string; format?: ExtractFormat } = {}): ExtractedPage {
    const { url, format = 'text' } = options;
    if (!MARKUP_PATTERN.test(html)) return { content: '' };
    const { root, title } = prepareContent(html, url, url ? getProfile(url) : undefined);
    const content = format === 'markdown' ? renderMarkdown(root) : renderText(root);
    return { title, content };
}

/**
 * Drops the site-name suffix most pages append to <title>
 * ("Post title | Blog", "Post title - Site").
 */
export function cleanTitle(title: string): string | undefined {
    const trimmed = title.replace(/\s+/g, ' ').trim();
    if (!trimmed) return undefined;
    const parts = trimmed.split(' | ');
    if (parts.length > 1) return parts[0].trim();
    const dashParts = trimmed.split(' - ');
    if (dashParts.length > 1) return dashParts[0].trim();
    return trimmed;
}
