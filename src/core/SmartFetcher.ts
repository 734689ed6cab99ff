import type { FetchOptions, FetchResult, PageFetcher } from '../types.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; site-chunker/1.0)';
export const DEFAULT_TIMEOUT_MS = 15_000;

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Static HTTP fetcher for crawl pages.
 * One GET per URL with a fixed timeout; every failure comes back as a result
 * with `ok: false` so the crawl can skip the URL and keep going.
 */
export class SmartFetcher implements PageFetcher {
    constructor(
        private readonly fetchImpl: typeof fetch = (input, init) => fetch(input, init)
    ) {}

    private getErrorMessage(error: unknown): string {
        if (error instanceof Error) {
            if (error.name === 'AbortError') {
                return 'Request timed out';
            }
            return error.message;
        }
        return 'Unknown fetch error';
    }

    private isHtml(contentType: string | undefined): boolean {
        if (!contentType) return true;
        const lower = contentType.toLowerCase();
        return HTML_CONTENT_TYPES.some((type) => lower.includes(type));
    }

    async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
        const { timeout = DEFAULT_TIMEOUT_MS, userAgent = DEFAULT_USER_AGENT } = options;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await this.fetchImpl(url, {
                method: 'GET',
                headers: {
                    'User-Agent': userAgent,
                    'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.9',
                    ...options.headers,
                },
                redirect: 'follow',
                signal: controller.signal,
            });

            const headers = Object.fromEntries(response.headers.entries());
            const finalUrl = response.url || url;

            if (!response.ok) {
                return {
                    url,
                    finalUrl,
                    html: '',
                    status: response.status,
                    headers,
                    ok: false,
                    error: `HTTP ${response.status}`,
                };
            }

            const contentType = headers['content-type'];
            if (!this.isHtml(contentType)) {
                return {
                    url,
                    finalUrl,
                    html: '',
                    status: response.status,
                    headers,
                    ok: false,
                    error: `Unsupported content type: ${contentType}`,
                };
            }

            const html = await response.text();
            return {
                url,
                finalUrl,
                html,
                status: response.status,
                headers,
                ok: true,
            };
        } catch (error) {
            return {
                url,
                html: '',
                status: 0,
                headers: {},
                ok: false,
                error: this.getErrorMessage(error),
            };
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
