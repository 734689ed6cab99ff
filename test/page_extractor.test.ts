import test from 'node:test';
import assert from 'node:assert/strict';
import { extractPage, UNKNOWN_TITLE } from '../src/core/PageExtractor.js';

const now = () => new Date('2024-05-06T07:08:09.000Z');

test('uses the title element or falls back to Unknown', () => {
    const titled = extractPage('<html><head><title> Corporate  Governance </title></head><body></body></html>', 'https://site.test/');
    const untitled = extractPage('<html><body><p>No title on this page at all.</p></body></html>', 'https://site.test/');

    assert.equal(titled.title, 'Corporate Governance');
    assert.equal(untitled.title, UNKNOWN_TITLE);
    assert.equal(untitled.chunks[0].documentTitle, 'Unknown');
});

test('stamps chunks with configured document type, organization and clock', () => {
    const page = extractPage(
        '<title>Policy</title><p>Directors are elected annually.</p>',
        'https://site.test/policy',
        { documentType: 'governance_policy', organization: 'Example Org', now }
    );

    assert.equal(page.organization, 'Example Org');
    assert.equal(page.chunks.length, 1);
    assert.equal(page.chunks[0].documentType, 'governance_policy');
    assert.equal(page.chunks[0].organization, 'Example Org');
    assert.equal(page.chunks[0].extractedAt, '2024-05-06T07:08:09.000Z');
    assert.equal(page.chunks[0].sourceUrl, 'https://site.test/policy');
});

test('organization is null without a strategy', () => {
    const page = extractPage('<p>Directors are elected annually.</p>', 'https://site.test/');
    assert.equal(page.chunks[0].organization, null);
    assert.equal(page.chunks[0].documentType, 'web_page');
});

test('collects resolved, de-duplicated links without fragments or noise', () => {
    const page = extractPage(`
        <a href="/ir">IR</a>
        <a href="/ir#top">IR top</a>
        <a href="policy/board.html">Board</a>
        <a href="https://other.test/x">Other</a>
        <a href="mailto:ir@site.test">Mail</a>
        <a href="javascript:void(0)">JS</a>
        <noscript><a href="/hidden">Hidden</a></noscript>`,
        'https://site.test/governance/index.html'
    );

    assert.deepEqual(page.links, [
        'https://site.test/ir',
        'https://site.test/governance/policy/board.html',
        'https://other.test/x',
    ]);
});

test('resolves links against the link base when given', () => {
    const page = extractPage('<a href="next">Next</a>', 'https://site.test/old', {}, 'https://site.test/new/');
    assert.deepEqual(page.links, ['https://site.test/new/next']);
});

test('tables default to the last heading context of the page', () => {
    const html = `
        <h2>Section One</h2>
        <table><tr><th>A</th><th>B</th></tr><tr><td>1</td><td>2</td></tr></table>
        <h2>Section Two</h2>
        <p>Paragraph under the second section.</p>`;

    const page = extractPage(html, 'https://site.test/');

    assert.deepEqual(page.chunks.map((c) => [c.contentType, c.sectionTitle]), [
        ['p', 'Section Two'],
        ['table', 'Section Two'],
    ]);
    assert.equal(page.chunks[1].text, 'A | B\n1 | 2');
});

test('document table order keeps tables at their position', () => {
    const html = `
        <h2>Section One</h2>
        <table><tr><th>A</th><th>B</th></tr><tr><td>1</td><td>2</td></tr></table>
        <h2>Section Two</h2>
        <p>Paragraph under the second section.</p>`;

    const page = extractPage(html, 'https://site.test/', { tableOrder: 'document' });

    assert.deepEqual(page.chunks.map((c) => [c.contentType, c.sectionTitle]), [
        ['table', 'Section One'],
        ['p', 'Section Two'],
    ]);
});

test('a non-finite minimum length falls back to the default', () => {
    const page = extractPage(
        '<p>Too short here</p><p>Long enough to pass the default.</p>',
        'https://site.test/',
        { minChunkLength: Number.NaN }
    );

    assert.deepEqual(page.chunks.map((c) => c.text), ['Long enough to pass the default.']);
});
