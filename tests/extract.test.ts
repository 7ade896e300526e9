/**
 * Test: HTML → readable text / Markdown extraction
 *
 * Verifies noise stripping, reading order, container selection and the
 * empty-input contract of extract.ts.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { cleanTitle, detectLanguage, extractMarkdown, extractPage, extractText } from '../src/extract.js';

const LONG = 'word '.repeat(30).trim();

// ── Plain text ───────────────────────────────────────────────────────────────

test('drops script and style content', () => {
    const html = `<html><head><style>.x { color: red }</style><script>var secret = 1;</script></head>
<body><p>Hello <b>world</b></p><script>alert("boo")</script><noscript>Enable JS</noscript></body></html>`;
    const text = extractText(html);
    assert.equal(text, 'Hello world');
});

test('keeps reading order and drops navigation and footer', () => {
    const html = `<body>
<nav><ul><li>Home</li><li>About</li></ul></nav>
<article><h1>Title</h1><p>First para.</p><ul><li>One</li><li>Two <p>nested</p></li></ul></article>
<footer><p>Copyright</p></footer>
</body>`;
    assert.equal(extractText(html), 'Title\nFirst para.\nOne\nTwo nested');
});

test('preserves whitespace inside pre blocks', () => {
    const html = '<body><p>Intro</p><pre><code>const a = 1;\n  return a;\n</code></pre></body>';
    assert.equal(extractText(html), 'Intro\nconst a = 1;\n  return a;');
});

test('collapses whitespace inside paragraphs', () => {
    const html = '<body><p>  spread\n\n   over   lines </p></body>';
    assert.equal(extractText(html), 'spread over lines');
});

test('prefers a main container with enough text', () => {
    const html = `<body><div class="promo"><p>Buy now</p></div><main><p>${LONG}</p></main></body>`;
    assert.equal(extractText(html), LONG);
});

test('falls back to the whole container when there are no readable blocks', () => {
    assert.equal(extractText('<div><span>Loose</span>   text</div>'), 'Loose text');
});

test('keeps loose text that sits directly in the container', () => {
    assert.equal(extractText(`<html><body><main>${LONG}</main></body></html>`), LONG);
    assert.equal(extractText(`<html><body>${LONG}</body></html>`), LONG);
    assert.equal(extractText('<html><body>Short note</body></html>'), 'Short note');
});

test('returns an empty string for empty or markup-free input', () => {
    assert.equal(extractText(''), '');
    assert.equal(extractText('   \n  '), '');
    assert.equal(extractText('just some words'), '');
    assert.equal(extractMarkdown('just some words'), '');
    assert.equal(extractText('<html><body><script>run()</script></body></html>'), '');
});

test('tolerates malformed markup', () => {
    assert.equal(extractText('<body><p>Unclosed <b>bold<p>Second'), 'Unclosed bold\nSecond');
});

// ── Markdown ─────────────────────────────────────────────────────────────────

test('converts headings and code blocks with a detected language', () => {
    const html = '<body><h2>Setup</h2><pre><code class="language-ts">const x = 1;</code></pre></body>';
    const md = extractMarkdown(html);
    assert.ok(md.startsWith('## Setup'), `unexpected markdown: ${md}`);
    assert.ok(md.includes('```typescript\nconst x = 1;\n```'), `unexpected markdown: ${md}`);
});

test('returns an empty string when nothing is left to convert', () => {
    assert.equal(extractMarkdown('<html><body><nav>Menu</nav></body></html>'), '');
});

// ── extractPage ──────────────────────────────────────────────────────────────

test('returns the cleaned title with the content', () => {
    const html = '<html><head><title>My Post | Some Blog</title></head><body><h2>Heading</h2><p>Text</p></body></html>';
    assert.deepEqual(extractPage(html), { title: 'My Post', content: 'Heading\nText' });
    assert.deepEqual(
        extractPage(html, { url: 'https://example.com/post', format: 'markdown' }),
        { title: 'My Post', content: '## Heading\n\nText' },
    );
});

test('title is undefined when the page has none', () => {
    assert.equal(extractPage('<body><p>Text</p></body>').title, undefined);
});

// ── Helpers ──────────────────────────────────────────────────────────────────

test('cleanTitle drops site suffixes', () => {
    assert.equal(cleanTitle('My Post | Blog'), 'My Post');
    assert.equal(cleanTitle('Another Post - Site Name'), 'Another Post');
    assert.equal(cleanTitle('  Plain   title '), 'Plain title');
    assert.equal(cleanTitle('   '), undefined);
});

test('detectLanguage reads common highlighter classes', () => {
    assert.equal(detectLanguage('hljs language-py'), 'python');
    assert.equal(detectLanguage('lang-rust'), 'rust');
    assert.equal(detectLanguage('prism-sh'), 'bash');
    assert.equal(detectLanguage('plain'), '');
});
