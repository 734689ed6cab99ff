import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Chunk, HierarchyContext, PageStamp } from '../types.js';
import { createChunk } from './Chunk.js';
import { visibleText } from './TextUtils.js';

export const CELL_SEPARATOR = ' | ';

/**
 * Linearizes one table: a line per row, header and data cells in column
 * order joined by " | ". Rows without any cell text are skipped. Rows of
 * nested tables belong to their own table and are not listed here.
 */
export function flattenTable($: CheerioAPI, table: Element): string {
    const lines: string[] = [];
    const rows = $(table).find('tr').filter((_, row) => $(row).closest('table').is(table));
    rows.each((_, row) => {
        const cells = $(row)
            .children('th, td')
            .toArray()
            .map((cell) => visibleText(cell));
        if (cells.every((cell) => !cell)) return;
        lines.push(cells.join(CELL_SEPARATOR));
    });
    return lines.join('\n').trim();
}

/**
 * Emits one "table" chunk per non-empty table, all stamped with `context`.
 * Called after the linear pass this is the last heading context of the page,
 * so a table under an earlier section is attributed to the final one.
 */
export function flattenTables($: CheerioAPI, page: PageStamp, context: HierarchyContext): Chunk[] {
    const chunks: Chunk[] = [];
    $('table').each((_, table) => {
        const text = flattenTable($, table);
        if (text) chunks.push(createChunk(page, context, 'table', text));
    });
    return chunks;
}
