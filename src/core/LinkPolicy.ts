import type { DomainPolicy, LinkPolicyConfig } from '../types.js';
import { normalizeExtension, safeHttpUrl } from './UrlUtils.js';

export const DEFAULT_BLOCKED_EXTENSIONS = [
    'pdf', 'jpg', 'jpeg', 'png', 'gif',
    'zip', 'doc', 'docx', 'xls', 'xlsx',
];

/**
 * Decides which discovered links may enter the frontier.
 *
 * A link is admitted when it is http(s), lives on the seed's host (or one of
 * its subdomains under the "subdomains" policy), its lower-cased path does not
 * end with a blocked extension, and, when keywords are configured, its path
 * contains at least one of them.
 */
export class LinkPolicy {
    private readonly baseHost: string;
    private readonly domainPolicy: DomainPolicy;
    private readonly blockedExtensions: string[];
    private readonly allowedPathKeywords: string[];

    constructor(seedUrl: string, config: LinkPolicyConfig = {}) {
        const seed = safeHttpUrl(seedUrl);
        if (!seed) {
            throw new TypeError(`Invalid seed URL: ${seedUrl}`);
        }
        this.baseHost = seed.host;
        this.domainPolicy = config.domainPolicy ?? 'exact';
        this.blockedExtensions = (config.blockedExtensions ?? DEFAULT_BLOCKED_EXTENSIONS).map(normalizeExtension);
        this.allowedPathKeywords = (config.allowedPathKeywords ?? [])
            .map((k) => k.trim().toLowerCase())
            .filter(Boolean);
    }

    get host(): string {
        return this.baseHost;
    }

    isSameDomain(host: string): boolean {
        if (host === this.baseHost) return true;
        return this.domainPolicy === 'subdomains' && host.endsWith(`.${this.baseHost}`);
    }

    isBlockedPath(pathname: string): boolean {
        const path = pathname.toLowerCase();
        return this.blockedExtensions.some((ext) => path.endsWith(ext));
    }

    matchesKeywords(pathname: string): boolean {
        if (this.allowedPathKeywords.length === 0) return true;
        const path = pathname.toLowerCase();
        return this.allowedPathKeywords.some((k) => path.includes(k));
    }

    admits(url: string): boolean {
        const u = safeHttpUrl(url);
        if (!u) return false;
        if (!this.isSameDomain(u.host)) return false;
        if (this.isBlockedPath(u.pathname)) return false;
        return this.matchesKeywords(u.pathname);
    }
}
