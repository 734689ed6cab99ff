import type { Chunk, CrawlConfig, CrawlError, CrawlLogger, CrawlResult, FrontierEntry, PageFetcher } from '../types.js';
import { LinkPolicy } from './LinkPolicy.js';
import { extractPage } from './PageExtractor.js';
import { stripFragment } from './UrlUtils.js';

export interface CrawlSessionOptions {
    maxDepth: number;
    maxPages?: number;
    timeoutMs: number;
    userAgent: string;
    fetcher: PageFetcher;
    logger: CrawlLogger;
    /** Forwarded to page extraction (threshold, tables, organization, clock). */
    extract: CrawlConfig;
}

/**
 * State of one crawl invocation: the visited set, the FIFO frontier and the
 * ordered chunk list. Entries are processed one at a time, fetch to enqueue,
 * so the traversal order is breadth-first and deterministic.
 */
export class CrawlSession {
    private readonly visited = new Set<string>();
    private readonly queued = new Set<string>();
    private readonly frontier: FrontierEntry[] = [];
    private readonly chunks: Chunk[] = [];
    private readonly errors: CrawlError[] = [];
    private pagesFetched = 0;
    private maxDepthReached = 0;

    constructor(
        private readonly seedUrl: string,
        private readonly policy: LinkPolicy,
        private readonly options: CrawlSessionOptions
    ) {}

    private enqueue(url: string, depth: number): void {
        if (this.visited.has(url) || this.queued.has(url)) return;
        this.frontier.push({ url, depth });
        this.queued.add(url);
    }

    private budgetExhausted(): boolean {
        const { maxPages } = this.options;
        return maxPages !== undefined && this.pagesFetched >= maxPages;
    }

    private async visit({ url, depth }: FrontierEntry): Promise<void> {
        const { fetcher, logger, maxDepth, timeoutMs, userAgent } = this.options;

        logger.log(`Scraping: ${url} (depth ${depth})`);
        this.visited.add(url);
        this.pagesFetched++;

        const result = await fetcher.fetch(url, { timeout: timeoutMs, userAgent });
        if (!result.ok) {
            const error = result.error ?? `HTTP ${result.status}`;
            logger.warn(`Skipped (error): ${url} -> ${error}`);
            this.errors.push({ url, error, status: result.status });
            return;
        }

        // Links resolve against the requested URL so a redirected seed keeps its host.
        const page = extractPage(result.html, url, this.options.extract);
        this.chunks.push(...page.chunks);
        this.maxDepthReached = Math.max(this.maxDepthReached, depth);

        if (depth >= maxDepth) return;
        for (const link of page.links) {
            if (this.policy.admits(link)) this.enqueue(link, depth + 1);
        }
    }

    async run(): Promise<CrawlResult> {
        const seed = stripFragment(this.seedUrl);
        const seedPath = new URL(seed).pathname;
        if (this.policy.isBlockedPath(seedPath)) {
            this.errors.push({ url: seed, error: 'Blocked file extension', status: 0 });
        } else {
            this.enqueue(seed, 0);
        }

        while (this.frontier.length > 0 && !this.budgetExhausted()) {
            const entry = this.frontier.shift();
            if (!entry) break;
            this.queued.delete(entry.url);

            if (this.visited.has(entry.url) || entry.depth > this.options.maxDepth) {
                continue;
            }

            await this.visit(entry);
        }

        return {
            chunks: [...this.chunks],
            visited: Array.from(this.visited),
            pagesFetched: this.pagesFetched,
            maxDepthReached: this.maxDepthReached,
            errors: [...this.errors],
        };
    }
}
