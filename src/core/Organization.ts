import type { CheerioAPI } from 'cheerio';
import type { OrganizationExtractor } from '../types.js';
import { visibleText } from './TextUtils.js';

export interface OrganizationScanOptions {
    needle?: string; // default: "Co., Ltd"
    selectors?: string[]; // default: footer, address, p
}

export function staticOrganization(label: string): OrganizationExtractor {
    return () => label;
}

/**
 * Finds the organization line by scanning footer-like elements for a legal
 * suffix such as "Co., Ltd". The first match in document order wins.
 */
export function scanOrganization(options: OrganizationScanOptions = {}): OrganizationExtractor {
    const needle = options.needle ?? 'Co., Ltd';
    const selector = (options.selectors ?? ['footer', 'address', 'p']).join(', ');

    return ($: CheerioAPI) => {
        for (const element of $(selector).toArray()) {
            const text = visibleText(element);
            if (text.includes(needle)) return text;
        }
        return null;
    };
}

export function toOrganizationExtractor(
    organization: string | OrganizationExtractor | undefined
): OrganizationExtractor | null {
    if (organization === undefined) return null;
    if (typeof organization === 'string') return staticOrganization(organization);
    return organization;
}
