import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Chunk } from '../types.js';

export type ReportFormat = 'text' | 'jsonl';

const RULE = '='.repeat(80);

type ChunkRecord = Record<string, string | number | null>;

/** Metadata fields in report order, keyed the way downstream indexers expect. */
function toRecord(chunk: Chunk): ChunkRecord {
    return {
        source_url: chunk.sourceUrl,
        document_title: chunk.documentTitle,
        organization: chunk.organization,
        document_type: chunk.documentType,
        section_title: chunk.sectionTitle,
        section_level: chunk.sectionLevel,
        chapter: chunk.chapter,
        article: chunk.article,
        content_type: chunk.contentType,
        char_count: chunk.charCount,
        chunk_id: chunk.chunkId,
        extracted_at: chunk.extractedAt,
    };
}

export function formatTextReport(chunks: readonly Chunk[]): string {
    let out = '';
    chunks.forEach((chunk, i) => {
        out += `\n${RULE}\n`;
        out += `CHUNK ${i + 1}\n`;
        out += `${RULE}\n`;
        for (const [key, value] of Object.entries(toRecord(chunk))) {
            out += `${key}: ${value === null ? 'null' : value}\n`;
        }
        out += '\nCONTENT:\n';
        out += chunk.text;
        out += '\n';
    });
    return out;
}

export function formatJsonLines(chunks: readonly Chunk[]): string {
    return chunks.map((chunk) => `${JSON.stringify({ ...toRecord(chunk), text: chunk.text })}\n`).join('');
}

/**
 * Writes the report, creating parent directories as needed.
 * @returns the absolute path written
 */
export async function writeReport(
    chunks: readonly Chunk[],
    filePath: string,
    format: ReportFormat = 'text'
): Promise<string> {
    const absolute = path.resolve(filePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    const body = format === 'jsonl' ? formatJsonLines(chunks) : formatTextReport(chunks);
    await fs.writeFile(absolute, body, 'utf-8');
    return absolute;
}
