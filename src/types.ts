import type { CheerioAPI } from 'cheerio';

export interface FetchOptions {
    headers?: Record<string, string>;
    timeout?: number; // ms, default: 15000
    userAgent?: string;
}

export interface FetchResult {
    url: string;
    finalUrl?: string;
    html: string;
    status: number;
    headers: Record<string, string>;
    ok: boolean;
    error?: string;
}

export interface PageFetcher {
    fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

export type CrawlLogger = Pick<Console, 'log' | 'warn'>;

export type HeadingLevel = 1 | 2 | 3 | 4;

export type SegmentTag = 'p' | 'li' | 'td' | 'dd' | 'div' | 'span';

export type ContentType = SegmentTag | 'table';

/**
 * Structural position inside a page: the most recent heading and the most
 * recent "Chapter ..." / "Article ..." headings seen before the current element.
 */
export interface HierarchyContext {
    readonly sectionTitle: string | null;
    readonly sectionLevel: HeadingLevel | null;
    readonly chapter: string | null;
    readonly article: string | null;
}

export interface Chunk {
    readonly sourceUrl: string;
    readonly documentTitle: string;
    readonly organization: string | null;
    readonly documentType: string;
    readonly sectionTitle: string | null;
    readonly sectionLevel: HeadingLevel | null;
    readonly chapter: string | null;
    readonly article: string | null;
    readonly contentType: ContentType;
    readonly text: string;
    readonly charCount: number;
    readonly chunkId: string;
    readonly extractedAt: string;
}

/** Page-level provenance shared by every chunk of one page. */
export interface PageStamp {
    sourceUrl: string;
    documentTitle: string;
    organization: string | null;
    documentType: string;
    extractedAt: string;
}

export type OrganizationExtractor = ($: CheerioAPI, url: string) => string | null;

export type DomainPolicy = 'exact' | 'subdomains';

export type TableOrder = 'after-content' | 'document';

export interface FrontierEntry {
    url: string;
    depth: number;
}

export interface LinkPolicyConfig {
    domainPolicy?: DomainPolicy;
    blockedExtensions?: string[]; // "pdf" or ".pdf"
    allowedPathKeywords?: string[];
}

export interface ExtractConfig {
    minChunkLength?: number; // default: 20
    includeContainers?: boolean; // also segment div/span
    tableOrder?: TableOrder; // default: "after-content"
    documentType?: string; // default: "web_page"
    organization?: string | OrganizationExtractor;
    now?: () => Date;
}

export interface CrawlConfig extends ExtractConfig, LinkPolicyConfig {
    maxDepth?: number; // default: 1
    maxPages?: number; // optional page cap
    timeoutMs?: number; // default: 15000
    userAgent?: string;
    fetcher?: PageFetcher;
    logger?: CrawlLogger;
}

export interface CrawlError {
    url: string;
    error: string;
    status: number;
}

export interface CrawlResult {
    chunks: Chunk[];
    visited: string[];
    pagesFetched: number;
    maxDepthReached: number;
    errors: CrawlError[];
}
