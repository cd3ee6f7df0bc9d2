// src/utils/csv-reader.ts

import { Readable } from 'stream';
import csvParser from 'csv-parser';

export interface CsvReadResult {
    headers: string[];
    rows: Record<string, string>[];
}

/**
 * Lower-cases a header and joins its words with underscores, so that
 * "Invoice Date" and "invoice-date" both become "invoice_date".
 */
export function normalizeHeader(header: string): string {
    return header
        .replace(/^\uFEFF/, '')
        .trim()
        .toLowerCase()
        .replace(/[\s-]+/g, '_');
}

/**
 * Removes lines holding nothing but whitespace. Lines inside a quoted value
 * are left alone: a quote count that is odd so far means the value is still open.
 */
export function dropBlankLines(text: string): string {
    let inQuotes = false;
    const kept: string[] = [];
    for (const line of text.split(/(?<=\n)/)) {
        if (inQuotes || line.trim() !== '') kept.push(line);
        if ((line.match(/"/g)?.length ?? 0) % 2 === 1) inQuotes = !inQuotes;
    }
    return kept.join('');
}

/**
 * Parses CSV bytes with a header row. Blank lines are skipped; any other row
 * whose length differs from the header is rejected (csv-parser strict mode).
 */
export function readCsv(content: Buffer): Promise<CsvReadResult> {
    return new Promise((resolve, reject) => {
        const rows: Record<string, string>[] = [];
        let headers: string[] = [];

        Readable.from([Buffer.from(dropBlankLines(content.toString('utf-8')), 'utf-8')])
            .pipe(
                csvParser({
                    strict: true,
                    mapHeaders: ({ header }) => normalizeHeader(header),
                    mapValues: ({ value }) => (typeof value === 'string' ? value.trim() : value),
                }),
            )
            .on('headers', (parsed: string[]) => {
                headers = parsed;
            })
            .on('data', (row: Record<string, string>) => rows.push(row))
            .on('end', () => resolve({ headers, rows }))
            .on('error', reject);
    });
}
