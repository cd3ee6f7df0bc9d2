// src/services/reasoning/evidence-formatter.ts

import { InvoiceRecord } from '../../models/invoice.model';
import { recordToText } from '../index/invoice-index';
import { AggregateGroup, AggregateMetric, AggregateResult, formatGroupValue, RecordFilters } from '../index/structured-query';

/** Prefix the reasoner sees when nothing in the session matched. */
export const NO_MATCHING_RECORDS = '[NO MATCHING RECORDS]';

export interface EvidenceRecord {
    record: InvoiceRecord;
    /** Similarity score, present for records found by semantic search. */
    score?: number;
}

export interface Evidence {
    totalRecords: number;
    records: EvidenceRecord[];
    aggregate?: AggregateResult;
}

const METRIC_WORDS: Record<Exclude<AggregateMetric, 'list'>, string> = {
    count: 'count',
    sum: 'total',
    average: 'average',
    min: 'minimum',
    max: 'maximum',
};

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function hasNoMatches(evidence: Evidence): boolean {
    return evidence.aggregate ? evidence.aggregate.matched.length === 0 : evidence.records.length === 0;
}

export function describeFilters(filters: RecordFilters): string {
    const parts: string[] = [];
    if (filters.vendor) parts.push(`vendor is ${filters.vendor}`);
    if (filters.currency) parts.push(`currency is ${filters.currency}`);
    if (filters.amountGreaterThan !== undefined) parts.push(`amount above ${filters.amountGreaterThan}`);
    if (filters.amountLessThan !== undefined) parts.push(`amount below ${filters.amountLessThan}`);
    if (filters.dateFrom) parts.push(`dated on or after ${filters.dateFrom}`);
    if (filters.dateTo) parts.push(`dated on or before ${filters.dateTo}`);
    return parts.join(', ');
}

function describeAggregate(result: AggregateResult): string {
    const { metric, field, groupBy, filters } = result.query;
    let subject: string;
    if (metric === 'list') subject = 'matching invoices';
    else if (metric === 'count') subject = 'invoice count';
    else subject = `${METRIC_WORDS[metric]} of ${field ?? 'invoice amounts'}`;
    const grouping = groupBy ? ` grouped by ${groupBy}` : '';
    const where = describeFilters(filters);
    return `${subject}${grouping}${where ? ` where ${where}` : ''}`;
}

function describeGroup(group: AggregateGroup, result: AggregateResult): string {
    const label = group.currency ? `${group.key} (${group.currency})` : group.key;
    const invoices = plural(group.count, 'invoice');
    const metric = result.query.metric;
    if (group.value === undefined || metric === 'count' || metric === 'list') {
        return `- ${label}: ${invoices}`;
    }
    return `- ${label}: ${METRIC_WORDS[metric]} ${formatGroupValue(group, result)} across ${invoices}`;
}

/** Renders evidence as the plain-text block handed to the reasoner. */
export function formatEvidence(evidence: Evidence): string {
    const total = plural(evidence.totalRecords, 'invoice record');

    if (hasNoMatches(evidence)) {
        const where = evidence.aggregate ? describeFilters(evidence.aggregate.query.filters) : '';
        return `${NO_MATCHING_RECORDS} None of the ${total} uploaded match this question${where ? ` (${where})` : ''}.`;
    }

    const lines = [`The session holds ${total}.`];

    const aggregate = evidence.aggregate;
    if (aggregate) {
        lines.push('', `Computed ${describeAggregate(aggregate)} over ${plural(aggregate.matched.length, 'matching record')}:`);
        if (!aggregate.numeric) {
            lines.push(`The field "${aggregate.query.field ?? ''}" does not hold numeric values, so only invoice counts are available.`);
        }
        aggregate.groups.forEach((group) => lines.push(describeGroup(group, aggregate)));
    }

    if (evidence.records.length > 0) {
        lines.push('', 'Relevant invoice records:');
        evidence.records.forEach(({ record, score }, i) => {
            const relevance = score === undefined ? '' : ` (relevance ${score.toFixed(2)})`;
            lines.push(`${i + 1}. ${recordToText(record)}${relevance}`);
        });
    }

    return lines.join('\n');
}
