import type { CheerioAPI } from 'cheerio';

export const NOISE_SELECTOR = 'script, style, noscript, iframe, frame, svg';

/**
 * Strips nodes that never render as page text (scripts, styles, noscript
 * fallbacks, embedded frames, inline vector graphics). Runs before segmentation
 * and link discovery; a second call finds nothing left to remove.
 *
 * @returns the number of nodes removed
 */
export function removeNoise($: CheerioAPI): number {
    const noise = $(NOISE_SELECTOR);
    const count = noise.length;
    noise.remove();
    return count;
}
