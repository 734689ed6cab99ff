import { CrawlSession, type CrawlSessionOptions } from './core/CrawlSession.js';
import { LinkPolicy } from './core/LinkPolicy.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, SmartFetcher } from './core/SmartFetcher.js';
import { safeHttpUrl } from './core/UrlUtils.js';
import type { CrawlConfig, CrawlResult } from './types.js';

export const DEFAULT_MAX_DEPTH = 1;

function finiteOr(value: number | undefined, fallback: number): number {
    return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Entry point of the library.
 * Normalizes crawl configuration and runs one isolated crawl session per call.
 */
export class SiteChunker {
    private static fetcher = new SmartFetcher();

    private static normalizeCrawlConfig(config: CrawlConfig): CrawlSessionOptions {
        // Non-finite page caps mean no cap; a non-finite depth falls back to the default.
        const maxPages = config.maxPages !== undefined && Number.isFinite(config.maxPages)
            ? Math.max(1, Math.floor(config.maxPages))
            : undefined;
        return {
            maxDepth: Math.max(0, Math.floor(finiteOr(config.maxDepth, DEFAULT_MAX_DEPTH))),
            maxPages,
            timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
            fetcher: config.fetcher ?? this.fetcher,
            logger: config.logger ?? console,
            extract: config,
        };
    }

    /**
     * Crawl a website breadth-first from `seedUrl` and return its chunks in
     * visiting order. Failed pages are skipped and reported in `errors`.
     */
    static async crawl(seedUrl: string, config: CrawlConfig = {}): Promise<CrawlResult> {
        if (!safeHttpUrl(seedUrl)) {
            return {
                chunks: [],
                visited: [],
                pagesFetched: 0,
                maxDepthReached: 0,
                errors: [{ url: seedUrl, error: 'Invalid start URL', status: 0 }],
            };
        }

        const policy = new LinkPolicy(seedUrl, config);
        const session = new CrawlSession(seedUrl, policy, this.normalizeCrawlConfig(config));
        return session.run();
    }
}
