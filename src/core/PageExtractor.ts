import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { removeNoise } from '../cleaners/NoiseFilter.js';
import type { Chunk, ExtractConfig, OrganizationExtractor, PageStamp } from '../types.js';
import { DEFAULT_MIN_CHUNK_LENGTH, segment, type SegmentOptions } from './Segmenter.js';
import { flattenTables } from './TableFlattener.js';
import { toOrganizationExtractor } from './Organization.js';
import { visibleText } from './TextUtils.js';
import { resolveLink } from './UrlUtils.js';

export const UNKNOWN_TITLE = 'Unknown';
export const DEFAULT_DOCUMENT_TYPE = 'web_page';

export interface NormalizedExtractConfig extends SegmentOptions {
    documentType: string;
    organization: OrganizationExtractor | null;
    now: () => Date;
}

export interface ExtractedPage {
    title: string;
    organization: string | null;
    chunks: Chunk[];
    links: string[];
}

function finiteOr(value: number | undefined, fallback: number): number {
    return value !== undefined && Number.isFinite(value) ? value : fallback;
}

export function normalizeExtractConfig(config: ExtractConfig = {}): NormalizedExtractConfig {
    return {
        minChunkLength: Math.max(1, finiteOr(config.minChunkLength, DEFAULT_MIN_CHUNK_LENGTH)),
        includeContainers: config.includeContainers ?? false,
        tableOrder: config.tableOrder ?? 'after-content',
        documentType: config.documentType ?? DEFAULT_DOCUMENT_TYPE,
        organization: toOrganizationExtractor(config.organization),
        now: config.now ?? (() => new Date()),
    };
}

export function extractTitle($: CheerioAPI): string {
    const title = $('title').first();
    if (title.length === 0) return UNKNOWN_TITLE;
    return visibleText(title[0]) || UNKNOWN_TITLE;
}

/**
 * Absolute http(s) links of the page in document order, fragments removed,
 * each listed once.
 */
export function extractLinks($: CheerioAPI, baseUrl: string): string[] {
    const links = new Set<string>();
    $('a[href]').each((_, elem) => {
        const href = $(elem).attr('href');
        if (!href) return;
        const resolved = resolveLink(href, baseUrl);
        if (resolved) links.add(resolved);
    });
    return Array.from(links);
}

/**
 * Runs the whole per-page pipeline on already fetched HTML: noise removal,
 * title and organization lookup, segmentation, table flattening and link
 * discovery. The hierarchy context starts empty for every page.
 *
 * @param linkBase URL that relative links resolve against, when it differs
 *   from `url` (for example a `<base href>` the caller has read)
 */
export function extractPage(
    html: string,
    url: string,
    config: ExtractConfig = {},
    linkBase: string = url
): ExtractedPage {
    const options = normalizeExtractConfig(config);
    const $ = cheerio.load(html);
    removeNoise($);

    const title = extractTitle($);
    const organization = options.organization?.($, url) ?? null;
    const page: PageStamp = {
        sourceUrl: url,
        documentTitle: title,
        organization,
        documentType: options.documentType,
        extractedAt: options.now().toISOString(),
    };

    const segmented = segment($, page, options);
    const chunks = options.tableOrder === 'document'
        ? segmented.chunks
        : [...segmented.chunks, ...flattenTables($, page, segmented.context)];

    return {
        title,
        organization,
        chunks,
        links: extractLinks($, linkBase),
    };
}
