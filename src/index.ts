export { SiteChunker } from './SiteChunker.js';
export { CrawlSession } from './core/CrawlSession.js';
export type { CrawlSessionOptions } from './core/CrawlSession.js';
export { SmartFetcher, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './core/SmartFetcher.js';
export { LinkPolicy, DEFAULT_BLOCKED_EXTENSIONS } from './core/LinkPolicy.js';
export { removeNoise, NOISE_SELECTOR } from './cleaners/NoiseFilter.js';
export { segment, enterHeading, DEFAULT_MIN_CHUNK_LENGTH } from './core/Segmenter.js';
export type { SegmentOptions, SegmentResult } from './core/Segmenter.js';
export { flattenTable, flattenTables } from './core/TableFlattener.js';
export { identify } from './core/ChunkId.js';
export { EMPTY_CONTEXT, createChunk } from './core/Chunk.js';
export { extractPage, extractTitle, extractLinks, normalizeExtractConfig, UNKNOWN_TITLE } from './core/PageExtractor.js';
export type { ExtractedPage, NormalizedExtractConfig } from './core/PageExtractor.js';
export { staticOrganization, scanOrganization } from './core/Organization.js';
export type { OrganizationScanOptions } from './core/Organization.js';
export { formatTextReport, formatJsonLines, writeReport } from './output/TextReport.js';
export type { ReportFormat } from './output/TextReport.js';
export { CrawlOptionsSchema, CliOptionsSchema } from './schemas.js';
export type { CrawlOptions, CliOptions } from './schemas.js';
export * from './types.js';
