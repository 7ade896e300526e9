import { test } from 'node:test';
import assert from 'node:assert/strict';
import { getProfile, SITE_PROFILES } from '../src/profiles.js';
import { extractText } from '../src/extract.js';

test('matches known platforms by URL', () => {
    assert.equal(getProfile('https://github.com/acme/widgets/issues/12').name, 'GitHub');
    assert.equal(getProfile('https://stackoverflow.com/questions/1/how-to').name, 'Stack Exchange');
    assert.equal(getProfile('https://dev.to/someone/a-post-1abc').name, 'DEV');
    assert.equal(getProfile('https://news.ycombinator.com/item?id=1').name, 'Hacker News');
});

test('falls back to the generic profile', () => {
    const profile = getProfile('https://example.com/blog/post');
    assert.equal(profile.name, 'Generic');
    assert.equal(profile, SITE_PROFILES[SITE_PROFILES.length - 1]);
});

test('profile content selectors win over generic ones', () => {
    const url = 'https://github.com/acme/widgets/issues/12';
    const first = 'alpha '.repeat(25).trim();
    const second = 'beta '.repeat(25).trim();
    const html = `<body><main><p>${first}</p><div class="js-discussion"><p>${second}</p></div></main></body>`;

    assert.equal(extractText(html, url, getProfile(url)), second);
    // Without the profile the generic <main> container is used
    assert.equal(extractText(html, url), `${first}\n${second}`);
});
