import { test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    buildPrompt,
    DEFAULT_PROMPT_TEMPLATE,
    loadPromptTemplate,
    PROMPT_SEPARATOR,
    SUMMARY_SECTIONS,
} from '../src/prompt.js';

test('template comes first, content last', () => {
    const content = 'Line one of the article.\nLine two.';
    const prompt = buildPrompt(content);
    assert.ok(prompt.startsWith(DEFAULT_PROMPT_TEMPLATE));
    assert.ok(prompt.endsWith(content));
    assert.equal(prompt, DEFAULT_PROMPT_TEMPLATE + PROMPT_SEPARATOR + content);
});

test('default template asks for all five sections', () => {
    for (const section of SUMMARY_SECTIONS) {
        assert.ok(DEFAULT_PROMPT_TEMPLATE.includes(`## ${section}`), `missing ${section}`);
    }
});

test('custom template trailing whitespace is trimmed before the separator', () => {
    assert.equal(buildPrompt('body', 'Summarize this:\n\n  '), 'Summarize this:\n\n---\n\nbody');
});

test('empty content still produces the template and separator', () => {
    assert.equal(buildPrompt('', 'T'), 'T\n\n---\n\n');
});

test('loadPromptTemplate returns the default without a file', async () => {
    assert.equal(await loadPromptTemplate(), DEFAULT_PROMPT_TEMPLATE);
});

test('loadPromptTemplate reads a template file and rejects an empty one', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'url-digest-prompt-'));
    try {
        const file = path.join(dir, 'prompt.txt');
        fs.writeFileSync(file, 'Give me three bullets.\n');
        assert.equal(await loadPromptTemplate(file), 'Give me three bullets.\n');

        const empty = path.join(dir, 'empty.txt');
        fs.writeFileSync(empty, '  \n');
        await assert.rejects(loadPromptTemplate(empty), /is empty/);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
