import { test } from 'node:test';
import assert from 'node:assert/strict';
import { resolveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

test('defaults describe a sequential web run', () => {
    const config = resolveConfig({}, {});
    assert.deepEqual(config, {
        mode: 'web',
        input: 'urls.txt',
        output: 'summaries',
        promptFile: undefined,
        format: 'text',
        concurrency: 1,
        onError: 'skip',
        respectRobots: false,
        crawlDelayMs: 500,
        summarizer: {
            apiKey: undefined,
            model: 'gpt-4o',
            temperature: 0.5,
            baseURL: undefined,
        },
    });
    assert.ok(Object.isFrozen(config));
    assert.ok(Object.isFrozen(config.summarizer));
});

test('text mode defaults to input.txt and a derived output', () => {
    const config = resolveConfig({ mode: 'text' }, {});
    assert.equal(config.input, 'input.txt');
    assert.equal(config.output, undefined);
});

test('numeric CLI strings are coerced', () => {
    const config = resolveConfig({ temperature: '0.2', concurrency: '3', crawlDelay: '0' }, {});
    assert.equal(config.summarizer.temperature, 0.2);
    assert.equal(config.concurrency, 3);
    assert.equal(config.crawlDelayMs, 0);
});

test('environment fills in what the options leave out', () => {
    const env = {
        URL_DIGEST_MODEL: 'gpt-4o-mini',
        OPENAI_API_KEY: 'test-key',
        OPENAI_BASE_URL: 'http://localhost:8080/v1',
    };
    const fromEnv = resolveConfig({}, env);
    assert.deepEqual(fromEnv.summarizer, {
        apiKey: 'test-key',
        model: 'gpt-4o-mini',
        temperature: 0.5,
        baseURL: 'http://localhost:8080/v1',
    });

    const overridden = resolveConfig({ model: 'gpt-4.1' }, env);
    assert.equal(overridden.summarizer.model, 'gpt-4.1');
});

test('blank environment values are ignored', () => {
    const config = resolveConfig({}, { URL_DIGEST_MODEL: '  ', OPENAI_API_KEY: '' });
    assert.equal(config.summarizer.model, 'gpt-4o');
    assert.equal(config.summarizer.apiKey, undefined);
});

test('invalid options raise ConfigError naming the option', () => {
    assert.throws(
        () => resolveConfig({ concurrency: '0' }, {}),
        (err: unknown) => err instanceof ConfigError && err.message.includes('concurrency'),
    );
    assert.throws(
        () => resolveConfig({ temperature: 'warm' }, {}),
        (err: unknown) => err instanceof ConfigError && err.message.includes('temperature'),
    );
    assert.throws(() => resolveConfig({ baseURL: 'not a url' }, {}), ConfigError);
});
