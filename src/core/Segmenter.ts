import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { Chunk, HeadingLevel, HierarchyContext, PageStamp, SegmentTag, TableOrder } from '../types.js';
import { createChunk, EMPTY_CONTEXT } from './Chunk.js';
import { flattenTable } from './TableFlattener.js';
import { visibleText } from './TextUtils.js';

export const DEFAULT_MIN_CHUNK_LENGTH = 20;

const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4'];
const TEXT_TAGS: readonly SegmentTag[] = ['p', 'li', 'td', 'dd'];
const CONTAINER_TAGS: readonly SegmentTag[] = ['div', 'span'];

export interface SegmentOptions {
    minChunkLength: number;
    includeContainers: boolean;
    tableOrder: TableOrder;
}

export interface SegmentResult {
    chunks: Chunk[];
    /** Hierarchy context after the last element of the page. */
    context: HierarchyContext;
}

function headingLevel(tag: string): HeadingLevel | null {
    switch (tag) {
        case 'h1': return 1;
        case 'h2': return 2;
        case 'h3': return 3;
        case 'h4': return 4;
        default: return null;
    }
}

/**
 * Context after visiting a heading. Any rank replaces the section; chapter and
 * article labels only change when the heading text starts with that word.
 */
export function enterHeading(context: HierarchyContext, level: HeadingLevel, text: string): HierarchyContext {
    const lower = text.toLowerCase();
    return {
        sectionTitle: text,
        sectionLevel: level,
        chapter: lower.startsWith('chapter') ? text : context.chapter,
        article: lower.startsWith('article') ? text : context.article,
    };
}

/**
 * Walks the page in document order and emits a chunk for every text element
 * long enough to keep, stamped with the hierarchy context current at that point.
 *
 * Tables are only emitted here when `tableOrder` is "document"; otherwise the
 * caller flattens them after this pass with the returned context.
 */
export function segment(
    $: CheerioAPI,
    page: PageStamp,
    options: SegmentOptions,
    context: HierarchyContext = EMPTY_CONTEXT
): SegmentResult {
    const textTags: readonly SegmentTag[] = options.includeContainers
        ? [...TEXT_TAGS, ...CONTAINER_TAGS]
        : TEXT_TAGS;
    const tablesInline = options.tableOrder === 'document';
    const selector = [...HEADING_TAGS, ...textTags, ...(tablesInline ? ['table'] : [])].join(', ');

    const chunks: Chunk[] = [];
    let current = context;

    for (const element of $(selector).toArray()) {
        if (!isTag(element)) continue;
        const tag = element.name.toLowerCase();

        const level = headingLevel(tag);
        if (level !== null) {
            const text = visibleText(element);
            if (text) current = enterHeading(current, level, text);
            continue;
        }

        if (tag === 'table') {
            const text = flattenTable($, element);
            if (text) chunks.push(createChunk(page, current, 'table', text));
            continue;
        }

        const contentType = textTags.find((t) => t === tag);
        if (!contentType) continue;

        const text = visibleText(element);
        if (text.length < options.minChunkLength) continue;

        chunks.push(createChunk(page, current, contentType, text));
    }

    return { chunks, context: current };
}
