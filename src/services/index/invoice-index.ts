// src/services/index/invoice-index.ts

import { InvoiceRecord } from '../../models/invoice.model';
import { formatMinor } from '../../utils/money';
import { Embedder } from '../embedding/embedder.types';
import { AggregateResult, matchesFilters, RecordFilters, runAggregate, StructuredQuery } from './structured-query';

export interface ScoredRecord {
    record: InvoiceRecord;
    score: number;
}

export interface SearchOptions {
    filters?: RecordFilters;
    /** Only records scoring strictly above this are returned. */
    minScore?: number;
    signal?: AbortSignal;
}

/**
 * Per-session retrieval capability: similarity search over record text plus
 * structured aggregates computed directly over the records.
 */
export interface InvoiceIndex {
    readonly size: number;
    readonly embedderName: string;
    search(query: string, k: number, options?: SearchOptions): Promise<ScoredRecord[]>;
    aggregate(query: StructuredQuery): AggregateResult;
    records(): readonly InvoiceRecord[];
    vendors(): string[];
    fieldNames(): string[];
}

function describeValue(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/** The text that gets embedded for a record. */
export function recordToText(record: InvoiceRecord): string {
    const head =
        `Invoice ${record.id} from ${record.vendor} dated ${record.issueDate} ` +
        `for ${formatMinor(record.amountMinor, record.currency)} ${record.currency}.`;
    const extras = Object.entries(record.fields)
        .map(([key, value]) => `${key.replace(/_/g, ' ')}: ${describeValue(value)}`)
        .join('; ');
    return extras ? `${head} ${extras}` : head;
}

export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryInvoiceIndex implements InvoiceIndex {
    private readonly entries: ReadonlyArray<{ record: InvoiceRecord; vector: number[] }>;

    constructor(
        records: readonly InvoiceRecord[],
        vectors: number[][],
        private readonly embedder: Embedder,
    ) {
        if (records.length !== vectors.length) {
            throw new Error(`Expected ${records.length} vectors, got ${vectors.length}`);
        }
        this.entries = Object.freeze(records.map((record, i) => ({ record, vector: vectors[i] })));
    }

    get size(): number {
        return this.entries.length;
    }

    get embedderName(): string {
        return this.embedder.name;
    }

    async search(query: string, k: number, options: SearchOptions = {}): Promise<ScoredRecord[]> {
        const { filters, minScore = 0, signal } = options;
        const candidates = filters ? this.entries.filter((entry) => matchesFilters(entry.record, filters)) : this.entries;
        if (candidates.length === 0 || k <= 0) return [];

        const [queryVector] = await this.embedder.embed([query], signal);
        if (!queryVector) {
            throw new Error('Embedder returned no vector for the query');
        }

        return candidates
            .map((entry, position) => ({ record: entry.record, score: cosineSimilarity(queryVector, entry.vector), position }))
            .filter((scored) => scored.score > minScore)
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, k)
            .map(({ record, score }) => ({ record, score }));
    }

    aggregate(query: StructuredQuery): AggregateResult {
        return runAggregate(this.records(), query);
    }

    records(): readonly InvoiceRecord[] {
        return this.entries.map((entry) => entry.record);
    }

    vendors(): string[] {
        return [...new Set(this.entries.map((entry) => entry.record.vendor))];
    }

    fieldNames(): string[] {
        const names = new Set<string>();
        for (const entry of this.entries) {
            Object.keys(entry.record.fields).forEach((key) => names.add(key));
        }
        return [...names];
    }
}
