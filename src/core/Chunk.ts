import type { Chunk, ContentType, HierarchyContext, PageStamp } from '../types.js';
import { identify } from './ChunkId.js';

export const EMPTY_CONTEXT: HierarchyContext = Object.freeze({
    sectionTitle: null,
    sectionLevel: null,
    chapter: null,
    article: null,
});

export function createChunk(
    page: PageStamp,
    context: HierarchyContext,
    contentType: ContentType,
    text: string
): Chunk {
    return Object.freeze({
        sourceUrl: page.sourceUrl,
        documentTitle: page.documentTitle,
        organization: page.organization,
        documentType: page.documentType,
        sectionTitle: context.sectionTitle,
        sectionLevel: context.sectionLevel,
        chapter: context.chapter,
        article: context.article,
        contentType,
        text,
        charCount: text.length,
        chunkId: identify(text),
        extractedAt: page.extractedAt,
    });
}
