// src/services/query/query-orchestrator.ts

import { ChartSpec, TableData } from '../../models/answer.model';
import { CancelledError, executeWithRetry, withTimeout } from '../../utils/retry';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { AnalysisError, InternalInvariantError, ReasoningError } from '../errors';
import { InvoiceIndex } from '../index/invoice-index';
import { hasFilters } from '../index/structured-query';
import { Evidence, EvidenceRecord } from '../reasoning/evidence-formatter';
import { Reasoner } from '../reasoning/reasoner.types';
import { aggregateTable, buildChartSpec, recordsTable } from './answer-shaper';
import { Classification, classifyQuestion } from './question-classifier';

export type OrchestratorState = 'start' | 'classify' | 'retrieve' | 'reason' | 'format' | 'done' | 'error';
export type OrchestratorEvent = 'BEGIN' | 'CLASSIFIED' | 'RETRIEVED' | 'REASONED' | 'FORMATTED' | 'FAIL';

/** Pure transition function; events that do not apply leave the state unchanged. */
export function nextState(current: OrchestratorState, event: OrchestratorEvent): OrchestratorState {
    switch (current) {
        case 'start':
            if (event === 'BEGIN') return 'classify';
            return event === 'FAIL' ? 'error' : current;
        case 'classify':
            if (event === 'CLASSIFIED') return 'retrieve';
            return event === 'FAIL' ? 'error' : current;
        case 'retrieve':
            if (event === 'RETRIEVED') return 'reason';
            return event === 'FAIL' ? 'error' : current;
        case 'reason':
            if (event === 'REASONED') return 'format';
            return event === 'FAIL' ? 'error' : current;
        case 'format':
            if (event === 'FORMATTED') return 'done';
            return event === 'FAIL' ? 'error' : current;
        case 'done':
        case 'error':
        default:
            return current;
    }
}

export interface QueryOrchestratorConfig extends ServiceConfig {
    reasoner: Reasoner;
    retrieval: { topK: number; minScore: number };
    reasoning: { timeoutMs: number; retries: number; backoffMs: number };
}

export interface QueryTarget {
    sessionId: string;
    index: InvoiceIndex;
}

export interface OrchestratorOutput {
    answer: string;
    table?: TableData;
    chart?: ChartSpec;
    classification: Classification;
    /** Every state visited, from 'start' to 'done'. */
    states: OrchestratorState[];
}

// Listing questions hand the reasoner more than topK records.
const LIST_EVIDENCE_LIMIT = 25;

/**
 * Runs one question through Classify, Retrieve, Reason and Format. Each run
 * owns its own state; nothing is shared between concurrent questions.
 */
export class QueryOrchestrator extends BaseService {
    private readonly reasoner: Reasoner;
    private readonly retrieval: QueryOrchestratorConfig['retrieval'];
    private readonly reasoning: QueryOrchestratorConfig['reasoning'];

    constructor(config: QueryOrchestratorConfig) {
        super(config);
        this.reasoner = config.reasoner;
        this.retrieval = config.retrieval;
        this.reasoning = config.reasoning;
    }

    async run(question: string, target: QueryTarget, options: { signal?: AbortSignal } = {}): Promise<OrchestratorOutput> {
        const { sessionId, index } = target;
        const machine: { state: OrchestratorState; visited: OrchestratorState[] } = { state: 'start', visited: ['start'] };
        const advance = (event: OrchestratorEvent) => {
            const next = nextState(machine.state, event);
            this.logger.debug('Orchestrator transition', { sessionId, from: machine.state, to: next, event });
            machine.state = next;
            machine.visited.push(next);
        };

        let classification: Classification | undefined;
        let evidence: Evidence | undefined;
        let answer = '';
        let table: TableData | undefined;
        let chart: ChartSpec | undefined;

        try {
            advance('BEGIN');
            while (machine.state !== 'done') {
                switch (machine.state) {
                    case 'classify':
                        classification = classifyQuestion(question, { vendors: index.vendors(), fieldNames: index.fieldNames() });
                        this.logger.info('Question classified', {
                            sessionId,
                            intent: classification.intent,
                            metric: classification.query.metric,
                            groupBy: classification.query.groupBy,
                            wantsTable: classification.wantsTable,
                            wantsChart: classification.wantsChart,
                        });
                        advance('CLASSIFIED');
                        break;
                    case 'retrieve':
                        evidence = await this.retrieve(question, index, this.require(classification), options.signal);
                        advance('RETRIEVED');
                        break;
                    case 'reason':
                        answer = await this.reason(question, this.require(evidence), options.signal);
                        advance('REASONED');
                        break;
                    case 'format':
                        ({ table, chart } = this.format(this.require(classification), this.require(evidence), sessionId));
                        advance('FORMATTED');
                        break;
                    default:
                        throw new InternalInvariantError(`Orchestrator stuck in state ${machine.state}`);
                }
            }
        } catch (error) {
            const failedIn = machine.state;
            advance('FAIL');
            const mapped =
                error instanceof AnalysisError
                    ? error
                    : new InternalInvariantError(`Question processing failed during ${failedIn}`, { cause: error });
            this.logger.warn('Question failed', { sessionId, state: failedIn, code: mapped.code, reason: mapped.message });
            throw mapped;
        }

        return { answer, table, chart, classification: this.require(classification), states: machine.visited };
    }

    private require<T>(value: T | undefined): T {
        if (value === undefined) {
            throw new InternalInvariantError('Orchestrator step ran before its input was ready');
        }
        return value;
    }

    private async retrieve(
        question: string,
        index: InvoiceIndex,
        classification: Classification,
        signal?: AbortSignal,
    ): Promise<Evidence> {
        const { query, intent } = classification;
        const { topK, minScore } = this.retrieval;

        if (intent === 'retrieval') {
            const filters = hasFilters(query.filters) ? query.filters : undefined;
            const records = await this.callModel(
                'query embedding',
                (attemptSignal) => index.search(question, topK, { filters, minScore, signal: attemptSignal }),
                signal,
            );
            return { totalRecords: index.size, records };
        }

        const aggregate = index.aggregate(query);
        let sample = [...aggregate.matched];
        if (query.metric === 'max' && !query.field) sample.sort((a, b) => b.amountMinor - a.amountMinor);
        if (query.metric === 'min' && !query.field) sample.sort((a, b) => a.amountMinor - b.amountMinor);
        sample = sample.slice(0, query.metric === 'list' ? LIST_EVIDENCE_LIMIT : topK);

        const records: EvidenceRecord[] = sample.map((record) => ({ record }));
        return { totalRecords: index.size, records, aggregate };
    }

    private reason(question: string, evidence: Evidence, signal?: AbortSignal): Promise<string> {
        return this.callModel('answer', (attemptSignal) => this.reasoner.reason(question, evidence, { signal: attemptSignal }), signal);
    }

    /** Bounded timeout plus retries with backoff; every failure ends as a ReasoningError. */
    private async callModel<T>(
        label: string,
        operation: (signal: AbortSignal) => Promise<T>,
        signal?: AbortSignal,
    ): Promise<T> {
        const { timeoutMs, retries, backoffMs } = this.reasoning;
        try {
            return await executeWithRetry(() => withTimeout(operation, timeoutMs, signal), {
                attempts: retries + 1,
                baseDelayMs: backoffMs,
                shouldRetry: (error) => !(error instanceof CancelledError),
                onRetry: (error, attempt, delayMs) =>
                    this.logger.warn(`Retrying ${label}`, {
                        attempt,
                        delayMs,
                        reason: error instanceof Error ? error.message : 'Unknown error',
                    }),
            });
        } catch (error) {
            if (error instanceof CancelledError) {
                throw new ReasoningError('The question was cancelled before an answer was ready.', { cause: error });
            }
            const reason = error instanceof Error ? error.message : 'Unknown error';
            this.logger.error(`Model call failed: ${label}`, { reason, attempts: retries + 1 });
            throw new ReasoningError(`Could not get an answer right now (${reason}). Please try again.`, { cause: error });
        }
    }

    private format(
        classification: Classification,
        evidence: Evidence,
        sessionId: string,
    ): { table?: TableData; chart?: ChartSpec } {
        let table: TableData | undefined;
        if (classification.wantsTable) {
            table = evidence.aggregate
                ? aggregateTable(evidence.aggregate)
                : recordsTable(evidence.records.map(({ record }) => record));
        }

        let chart: ChartSpec | undefined;
        if (classification.wantsChart) {
            chart = buildChartSpec(evidence.aggregate, classification.chartType) ?? undefined;
            if (!chart) {
                this.logger.info('Chart requested but data is not chartable; answering without it', {
                    sessionId,
                    field: classification.query.field,
                });
            }
        }
        return { table, chart };
    }
}
