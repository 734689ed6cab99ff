import { z } from 'zod';
import { DEFAULT_BLOCKED_EXTENSIONS } from './core/LinkPolicy.js';
import { DEFAULT_DOCUMENT_TYPE } from './core/PageExtractor.js';
import { DEFAULT_MIN_CHUNK_LENGTH } from './core/Segmenter.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './core/SmartFetcher.js';

const CrawlOptionsShape = z.object({
    url: z.string().url(),
    maxDepth: z.number().int().min(0).default(1).describe('Link hops followed from the seed page'),
    maxPages: z.number().int().min(1).optional().describe('Upper bound on fetched pages'),
    blockedExtensions: z.array(z.string().min(1)).default(() => [...DEFAULT_BLOCKED_EXTENSIONS])
        .describe('Path suffixes never fetched ("pdf" or ".pdf")'),
    allowedPathKeywords: z.array(z.string().min(1)).default(() => [])
        .describe('When non-empty, a link path must contain one of these'),
    minChunkLength: z.number().int().min(1).default(DEFAULT_MIN_CHUNK_LENGTH),
    includeContainers: z.boolean().default(false).describe('Also segment div and span elements'),
    domainPolicy: z.enum(['exact', 'subdomains']).default('exact'),
    tableOrder: z.enum(['after-content', 'document']).default('after-content'),
    timeoutMs: z.number().int().min(1).default(DEFAULT_TIMEOUT_MS),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    documentType: z.string().min(1).default(DEFAULT_DOCUMENT_TYPE),
    organization: z.string().min(1).optional().describe('Static organization label for every chunk'),
    organizationScan: z.string().min(1).optional()
        .describe('Take the organization from the first footer/address/p containing this text'),
});

function singleOrganizationSource(options: { organization?: string; organizationScan?: string }): boolean {
    return options.organization === undefined || options.organizationScan === undefined;
}

const ORGANIZATION_CONFLICT = {
    message: 'organization and organizationScan cannot be combined',
    path: ['organizationScan'],
};

export const CrawlOptionsSchema = CrawlOptionsShape.refine(singleOrganizationSource, ORGANIZATION_CONFLICT);

export const CliOptionsSchema = CrawlOptionsShape.extend({
    out: z.string().min(1).default('output/extracted.txt'),
    format: z.enum(['text', 'jsonl']).default('text'),
}).refine(singleOrganizationSource, ORGANIZATION_CONFLICT);

export type CrawlOptions = z.infer<typeof CrawlOptionsSchema>;
export type CliOptions = z.infer<typeof CliOptionsSchema>;
