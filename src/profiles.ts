/**
 * Site Profiles
 *
 * Per-platform content and noise selectors for the places developer articles
 * and discussion threads usually live. When a URL matches a profile's
 * url_pattern, its selectors are tried before the generic lists in extract.ts.
 */

export interface SiteProfile {
    /** Human-readable name of the profile */
    name: string;
    /** Regex pattern matched against the full URL (protocol + hostname + path) */
    url_pattern: RegExp;
    /** Ordered list of CSS selectors to find the main content container */
    content_selectors: string[];
    /** CSS selectors for noise elements to remove before extraction */
    noise_selectors: string[];
}

export const SITE_PROFILES: SiteProfile[] = [
    // ── GitHub issues, discussions, READMEs ─────────────────────────────────────
    {
        name: 'GitHub',
        url_pattern: /^https?:\/\/(www\.)?github\.com\//i,
        content_selectors: [
            '.js-discussion',
            '.markdown-body',
            'main',
        ],
        noise_selectors: [
            '.js-header-wrapper', '.Layout-sidebar',
            '.discussion-timeline-actions', '.js-comment-edit-history',
            '.reaction-summary-item', 'footer',
        ],
    },

    // ── Stack Overflow / Stack Exchange ─────────────────────────────────────────
    {
        name: 'Stack Exchange',
        url_pattern: /stackoverflow\.com|stackexchange\.com|superuser\.com|serverfault\.com/i,
        content_selectors: ['#mainbar', '#question', '.question'],
        noise_selectors: [
            '#sidebar', '.js-post-menu', '.js-vote-count',
            '.bottom-notice', '#post-form', 'footer',
        ],
    },

    // ── DEV Community ───────────────────────────────────────────────────────────
    {
        name: 'DEV',
        url_pattern: /^https?:\/\/dev\.to\//i,
        content_selectors: ['#article-body', '.crayons-article__main', 'article'],
        noise_selectors: [
            '.crayons-article__aside', '.crayons-article-actions',
            '#sidebar-wrapper-left', '#sidebar-wrapper-right', 'footer',
        ],
    },

    // ── Medium (and custom-domain Medium publications) ──────────────────────────
    {
        name: 'Medium',
        url_pattern: /medium\.com/i,
        content_selectors: ['article', 'main'],
        noise_selectors: [
            '[data-testid="headerSocialShareButton"]', '[aria-label="responses"]',
            '.pw-multi-vote-icon', 'footer',
        ],
    },

    // ── Substack ────────────────────────────────────────────────────────────────
    {
        name: 'Substack',
        url_pattern: /substack\.com/i,
        content_selectors: ['.available-content', '.body.markup', 'article'],
        noise_selectors: [
            '.subscription-widget-wrap', '.post-footer',
            '.subscribe-footer', '.share-dialog', 'footer',
        ],
    },

    // ── Hacker News ─────────────────────────────────────────────────────────────
    {
        name: 'Hacker News',
        url_pattern: /news\.ycombinator\.com/i,
        content_selectors: ['#hnmain'],
        noise_selectors: ['.pagetop', '.yclinks', 'form', '.reply', '.navs'],
    },

    // ── Generic fallback (matches everything) ───────────────────────────────────
    {
        name: 'Generic',
        url_pattern: /.*/,
        content_selectors: [],   // extract.ts will use GENERIC_CONTENT_SELECTORS
        noise_selectors: [],     // extract.ts will use GENERIC_NOISE_SELECTORS
    },
];

const GENERIC_PROFILE: SiteProfile = SITE_PROFILES[SITE_PROFILES.length - 1];

/**
 * Returns the most specific matching profile for the given URL,
 * or the Generic fallback if none match.
 */
export function getProfile(url: string): SiteProfile {
    for (const profile of SITE_PROFILES) {
        if (profile.url_pattern.test(url)) {
            return profile;
        }
    }
    return GENERIC_PROFILE;
}
