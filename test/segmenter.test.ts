import test from 'node:test';
import assert from 'node:assert/strict';
import * as cheerio from 'cheerio';
import { segment, type SegmentOptions } from '../src/core/Segmenter.js';
import { EMPTY_CONTEXT } from '../src/core/Chunk.js';
import type { PageStamp } from '../src/types.js';

const page: PageStamp = {
    sourceUrl: 'https://site.test/rules',
    documentTitle: 'Rules',
    organization: 'Example Org',
    documentType: 'governance_policy',
    extractedAt: '2024-03-01T09:00:00.000Z',
};

const defaults: SegmentOptions = {
    minChunkLength: 20,
    includeContainers: false,
    tableOrder: 'after-content',
};

function run(body: string, options: Partial<SegmentOptions> = {}) {
    const $ = cheerio.load(`<html><body>${body}</body></html>`);
    return segment($, page, { ...defaults, ...options });
}

test('attributes paragraphs to the most recent article heading', () => {
    const { chunks } = run(`
        <h2>Article 5</h2>
        <p>First paragraph of article five.</p>
        <p>Second paragraph of article five.</p>
        <h2>Article 6</h2>
        <p>Only paragraph of article six here.</p>
    `);

    assert.equal(chunks.length, 3);
    assert.deepEqual(chunks.map((c) => c.article), ['Article 5', 'Article 5', 'Article 6']);
    assert.deepEqual(chunks.map((c) => c.sectionLevel), [2, 2, 2]);
    assert.equal(chunks[0].chapter, null);
});

test('drops text below the minimum length', () => {
    const { chunks } = run('<p>Short text</p><p>This sentence is 25 chars</p>');

    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].text, 'This sentence is 25 chars');
    assert.equal(chunks[0].charCount, 25);
});

test('respects a custom threshold', () => {
    const { chunks } = run('<p>This sentence is 25 chars</p>', { minChunkLength: 30 });
    assert.equal(chunks.length, 0);
});

test('hierarchy fields stay null before the first heading', () => {
    const { chunks } = run('<p>Intro paragraph before any heading.</p><h1>Overview</h1>');

    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].sectionTitle, null);
    assert.equal(chunks[0].sectionLevel, null);
    assert.equal(chunks[0].chapter, null);
    assert.equal(chunks[0].article, null);
});

test('chapter persists under later headings of any rank', () => {
    const { chunks, context } = run(`
        <h1>CHAPTER II General Provisions</h1>
        <h2>Article 1</h2>
        <p>Scope of the rules in this chapter.</p>
        <h3>Notes on scope</h3>
        <li>Applies to all subsidiaries as well.</li>
    `);

    assert.equal(chunks.length, 2);
    assert.deepEqual(
        { section: chunks[1].sectionTitle, level: chunks[1].sectionLevel, chapter: chunks[1].chapter, article: chunks[1].article },
        { section: 'Notes on scope', level: 3, chapter: 'CHAPTER II General Provisions', article: 'Article 1' }
    );
    assert.equal(chunks[1].contentType, 'li');
    assert.deepEqual(context, {
        sectionTitle: 'Notes on scope',
        sectionLevel: 3,
        chapter: 'CHAPTER II General Provisions',
        article: 'Article 1',
    });
});

test('headings never produce chunks', () => {
    const { chunks } = run('<h1>A heading that is definitely longer than twenty characters</h1>');
    assert.equal(chunks.length, 0);
});

test('normalizes whitespace and joins inline text with single spaces', () => {
    const { chunks } = run('<p>  Hello   <b>bold</b>\n   world, this is long  </p>');

    assert.equal(chunks[0].text, 'Hello bold world, this is long');
});

test('div and span are only segmented when containers are enabled', () => {
    const body = '<div>This div holds a long enough text.</div>';

    assert.equal(run(body).chunks.length, 0);

    const { chunks } = run(body, { includeContainers: true });
    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].contentType, 'div');
});

test('stamps chunks with page provenance', () => {
    const { chunks } = run('<dd>Definition body that is long enough.</dd>');

    assert.equal(chunks[0].sourceUrl, 'https://site.test/rules');
    assert.equal(chunks[0].documentTitle, 'Rules');
    assert.equal(chunks[0].organization, 'Example Org');
    assert.equal(chunks[0].documentType, 'governance_policy');
    assert.equal(chunks[0].extractedAt, '2024-03-01T09:00:00.000Z');
    assert.equal(chunks[0].contentType, 'dd');
});

test('starts from the given context and does not mutate it', () => {
    const start = { sectionTitle: 'Earlier', sectionLevel: 1 as const, chapter: 'Chapter 9', article: null };
    const $ = cheerio.load('<p>Continues under the earlier section.</p><h2>Article 3</h2>');
    const { chunks, context } = segment($, page, defaults, start);

    assert.equal(chunks[0].chapter, 'Chapter 9');
    assert.equal(context.article, 'Article 3');
    assert.equal(start.article, null);
    assert.equal(EMPTY_CONTEXT.sectionTitle, null);
});

test('document table order emits tables inline with the current context', () => {
    const { chunks } = run(`
        <h2>Section One</h2>
        <table><tr><th>Name</th><th>Role</th></tr><tr><td>Ann</td><td>Chair</td></tr></table>
        <h2>Section Two</h2>
    `, { tableOrder: 'document' });

    assert.equal(chunks.length, 1);
    assert.equal(chunks[0].contentType, 'table');
    assert.equal(chunks[0].text, 'Name | Role\nAnn | Chair');
    assert.equal(chunks[0].sectionTitle, 'Section One');
});
