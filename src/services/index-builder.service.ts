// src/services/index-builder.service.ts

import { InvoiceRecord } from '../models/invoice.model';
import { withTimeout } from '../utils/retry';
import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import { Embedder } from './embedding/embedder.types';
import { IndexBuildError } from './errors';
import { InMemoryInvoiceIndex, InvoiceIndex, recordToText } from './index/invoice-index';

export interface IndexBuilderConfig extends ServiceConfig {
    embedder: Embedder;
    timeoutMs: number;
}

export class IndexBuilderService extends BaseService {
    private readonly embedder: Embedder;
    private readonly timeoutMs: number;

    constructor(config: IndexBuilderConfig) {
        super(config);
        this.embedder = config.embedder;
        this.timeoutMs = config.timeoutMs;
    }

    /**
     * Embeds the records and returns a fresh index over them. Any embedding
     * failure becomes an IndexBuildError so that no session is created.
     */
    public async build(records: readonly InvoiceRecord[], signal?: AbortSignal): Promise<InvoiceIndex> {
        const startedAt = Date.now();
        const texts = records.map(recordToText);

        let vectors: number[][];
        try {
            vectors = await withTimeout((timeoutSignal) => this.embedder.embed(texts, timeoutSignal), this.timeoutMs, signal);
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'Unknown error';
            this.logger.error('Embedding failed while building index', { embedder: this.embedder.name, reason });
            throw new IndexBuildError(`Could not build the search index: ${reason}`, { cause: error });
        }

        this.assertVectors(vectors, records.length);

        this.logger.info('Index built', {
            embedder: this.embedder.name,
            records: records.length,
            durationMs: Date.now() - startedAt,
        });
        return new InMemoryInvoiceIndex(records, vectors, this.embedder);
    }

    private assertVectors(vectors: number[][], expected: number): void {
        if (vectors.length !== expected) {
            throw new IndexBuildError(`Embedding service returned ${vectors.length} vectors for ${expected} records`);
        }
        const dimension = vectors[0]?.length ?? 0;
        const malformed = vectors.some(
            (vector) => vector.length !== dimension || dimension === 0 || vector.some((v) => !Number.isFinite(v)),
        );
        if (malformed) {
            throw new IndexBuildError('Embedding service returned malformed vectors');
        }
    }
}
