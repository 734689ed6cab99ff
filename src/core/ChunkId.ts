import { createHash } from 'node:crypto';

export const CHUNK_ID_LENGTH = 16;

/**
 * Content-addressed chunk id: the first 16 hex characters of the SHA-256 of
 * the text. Boilerplate repeated across pages collapses to one id.
 */
export function identify(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, CHUNK_ID_LENGTH);
}
