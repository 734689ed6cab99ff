export function safeHttpUrl(input: string, base?: string): URL | null {
    try {
        const u = new URL(input, base);
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
        return u;
    } catch {
        return null;
    }
}

/**
 * Canonical form used for the visited set and the frontier: the parsed href
 * without its `#fragment`.
 */
export function stripFragment(input: string): string {
    const u = safeHttpUrl(input);
    if (!u) return input.split('#')[0];
    u.hash = '';
    return u.href;
}

/** Resolves an href against the page it was found on. */
export function resolveLink(href: string, pageUrl: string): string | null {
    const u = safeHttpUrl(href.trim(), pageUrl);
    if (!u) return null;
    u.hash = '';
    return u.href;
}

export function normalizeExtension(ext: string): string {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
}
