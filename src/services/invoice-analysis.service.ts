// src/services/invoice-analysis.service.ts

import { AnalysisConfig } from '../config/analysis';
import { AnswerResult, UploadResult } from '../models/answer.model';
import { UploadedFile } from '../models/invoice.model';
import { BaseService } from './base/BaseService';
import { ServiceConfig } from './base/types';
import { Embedder } from './embedding/embedder.types';
import { IndexBuildError, ValidationError } from './errors';
import { IndexBuilderService } from './index-builder.service';
import { QueryOrchestrator } from './query/query-orchestrator';
import { Reasoner } from './reasoning/reasoner.types';
import { RecordNormalizerService } from './record-normalizer.service';
import { renderAnswer } from './renderer/response-renderer';
import { SessionStore } from './session-store.service';

export interface InvoiceAnalysisServiceConfig extends ServiceConfig {
    config: AnalysisConfig;
    embedder: Embedder;
    reasoner: Reasoner;
    now?: () => number;
}

export interface HealthStatus {
    status: 'healthy';
    version: string;
    activeSessions: number;
    embedder: string;
    reasoner: string;
}

// Appends rebuild from the latest records when another upload won the race.
const MAX_APPEND_ATTEMPTS = 3;

/**
 * Entry point of the analysis core: upload files into a session, then ask
 * questions about them. Owns the session store and wires the pipeline stages.
 */
export class InvoiceAnalysisService extends BaseService {
    private readonly normalizer: RecordNormalizerService;
    private readonly indexBuilder: IndexBuilderService;
    private readonly orchestrator: QueryOrchestrator;
    private readonly embedderName: string;
    private readonly reasonerName: string;
    readonly store: SessionStore;

    constructor(private readonly options: InvoiceAnalysisServiceConfig) {
        super(options);
        const { config, logger } = options;
        this.normalizer = new RecordNormalizerService(config.upload);
        this.indexBuilder = new IndexBuilderService({
            logger,
            embedder: options.embedder,
            timeoutMs: config.embedding.timeoutMs,
        });
        this.store = new SessionStore({
            logger,
            timeoutMs: config.session.timeoutMs,
            sweepIntervalMs: config.session.sweepIntervalMs,
            slidingExpiration: config.session.slidingExpiration,
            now: options.now,
        });
        this.orchestrator = new QueryOrchestrator({
            logger,
            reasoner: options.reasoner,
            retrieval: config.retrieval,
            reasoning: config.reasoning,
        });
        this.embedderName = options.embedder.name;
        this.reasonerName = options.reasoner.name;
    }

    /**
     * Normalizes and indexes the files. Without a session id a new session is
     * created; with one, the records are appended to that session. On any
     * failure no session is created or changed.
     */
    public async upload(
        files: UploadedFile[],
        options: { sessionId?: string; signal?: AbortSignal } = {},
    ): Promise<UploadResult> {
        const normalized = await this.normalizer.normalize(files);
        const summary = {
            filesProcessed: normalized.filesProcessed,
            droppedRecords: normalized.droppedRecords,
            warnings: normalized.warnings,
        };
        if (normalized.droppedRecords > 0) {
            this.logger.warn('Some records were dropped during normalization', {
                dropped: normalized.droppedRecords,
                firstWarning: normalized.warnings[0],
            });
        }

        if (!options.sessionId) {
            const index = await this.indexBuilder.build(normalized.records, options.signal);
            const sessionId = this.store.create(normalized.records, index, normalized.filesProcessed);
            return { sessionId, recordsIndexed: normalized.records.length, ...summary };
        }

        const sessionId = options.sessionId;
        for (let attempt = 1; attempt <= MAX_APPEND_ATTEMPTS; attempt++) {
            const current = this.store.get(sessionId);
            const combined = [...current.records, ...normalized.records];
            const index = await this.indexBuilder.build(combined, options.signal);
            if (this.store.replaceContents(sessionId, current.revision, combined, index, normalized.filesProcessed)) {
                return { sessionId, recordsIndexed: combined.length, ...summary };
            }
            this.logger.warn('Session changed while appending; rebuilding', { sessionId, attempt });
        }
        throw new IndexBuildError(`Session ${sessionId} kept changing during the upload. Please retry.`);
    }

    public async analyze(sessionId: string, question: string, options: { signal?: AbortSignal } = {}): Promise<AnswerResult> {
        const trimmed = question.trim();
        if (!trimmed) {
            throw new ValidationError('Question must not be empty');
        }

        const session = this.store.get(sessionId);
        const output = await this.orchestrator.run(trimmed, { sessionId, index: session.index }, options);
        return renderAnswer(output, sessionId);
    }

    public deleteSession(sessionId: string): boolean {
        return this.store.delete(sessionId);
    }

    public activeSessionCount(): number {
        return this.store.count();
    }

    public health(): HealthStatus {
        return {
            status: 'healthy',
            version: this.options.config.version,
            activeSessions: this.store.count(),
            embedder: this.embedderName,
            reasoner: this.reasonerName,
        };
    }

    public start(): void {
        this.store.start();
    }

    /** Stops the sweeper and drops every session. */
    public shutdown(): void {
        this.store.stop();
        this.store.clear();
    }
}
