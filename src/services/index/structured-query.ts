// src/services/index/structured-query.ts

import { InvoiceRecord } from '../../models/invoice.model';
import { toMonthKey } from '../../utils/date';
import { formatMinor, minorUnitDigits } from '../../utils/money';

export type AggregateMetric = 'count' | 'sum' | 'average' | 'min' | 'max' | 'list';
export type GroupByDimension = 'vendor' | 'month' | 'currency';

export interface RecordFilters {
    /** Case-insensitive exact vendor name. */
    vendor?: string;
    currency?: string;
    /** Strict bounds, in major units (dollars, euros...). */
    amountGreaterThan?: number;
    amountLessThan?: number;
    /** Inclusive yyyy-MM-dd bounds. */
    dateFrom?: string;
    dateTo?: string;
}

export interface StructuredQuery {
    metric: AggregateMetric;
    filters: RecordFilters;
    groupBy?: GroupByDimension;
    /** Aggregate this extra field instead of the invoice amount. */
    field?: string;
}

export interface AggregateGroup {
    key: string;
    /** Set for amount aggregates; amounts in different currencies never share a group. */
    currency?: string;
    count: number;
    /** Minor units for amount aggregates, the plain number for field aggregates. */
    value?: number;
}

export interface AggregateResult {
    query: StructuredQuery;
    matched: InvoiceRecord[];
    groups: AggregateGroup[];
    /** False when the aggregated field holds values that are not numbers. */
    numeric: boolean;
}

export function hasFilters(filters: RecordFilters): boolean {
    return Object.values(filters).some((value) => value !== undefined);
}

function majorAmount(record: InvoiceRecord): number {
    return record.amountMinor / 10 ** minorUnitDigits(record.currency);
}

export function matchesFilters(record: InvoiceRecord, filters: RecordFilters): boolean {
    if (filters.vendor && record.vendor.toLowerCase() !== filters.vendor.toLowerCase()) return false;
    if (filters.currency && record.currency !== filters.currency.toUpperCase()) return false;
    if (filters.amountGreaterThan !== undefined && !(majorAmount(record) > filters.amountGreaterThan)) return false;
    if (filters.amountLessThan !== undefined && !(majorAmount(record) < filters.amountLessThan)) return false;
    if (filters.dateFrom && record.issueDate < filters.dateFrom) return false;
    if (filters.dateTo && record.issueDate > filters.dateTo) return false;
    return true;
}

function groupKey(record: InvoiceRecord, groupBy: GroupByDimension | undefined): string {
    switch (groupBy) {
        case 'vendor':
            return record.vendor;
        case 'month':
            return toMonthKey(record.issueDate);
        case 'currency':
            return record.currency;
        default:
            return 'all';
    }
}

export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string') {
        const cleaned = value.trim().replace(/,/g, '');
        if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
        return Number(cleaned);
    }
    return null;
}

function reduceValues(metric: AggregateMetric, values: number[], integer: boolean): number {
    switch (metric) {
        case 'count':
            return values.length;
        case 'sum':
            return values.reduce((total, v) => total + v, 0);
        case 'average': {
            const mean = values.reduce((total, v) => total + v, 0) / values.length;
            return integer ? Math.round(mean) : mean;
        }
        // Reduce, not spread: a session can hold more values than a call takes arguments.
        case 'min':
            return values.reduce((low, v) => (v < low ? v : low), values[0]);
        case 'max':
            return values.reduce((high, v) => (v > high ? v : high), values[0]);
        default:
            throw new Error(`Metric ${metric} has no single value`);
    }
}

/**
 * Evaluates a structured query straight over the records. Amount sums are
 * exact because they add integer minor units.
 */
export function runAggregate(records: readonly InvoiceRecord[], query: StructuredQuery): AggregateResult {
    const matched = records.filter((record) => matchesFilters(record, query.filters));
    if (query.metric === 'list') {
        return { query, matched, groups: [], numeric: true };
    }

    const field = query.field;
    const byAmount = field === undefined && query.metric !== 'count';

    let numeric = true;
    const buckets = new Map<string, { key: string; currency?: string; values: number[]; count: number }>();
    for (const record of matched) {
        let value: number;
        if (field !== undefined) {
            const raw = record.fields[field];
            if (raw === undefined || raw === null || raw === '') continue;
            const parsed = toNumber(raw);
            if (parsed === null) {
                // Counting still works over text values; every other metric needs numbers.
                if (query.metric !== 'count') numeric = false;
                value = 0;
            } else {
                value = parsed;
            }
        } else {
            value = record.amountMinor;
        }

        const key = groupKey(record, query.groupBy);
        const currency = byAmount ? record.currency : undefined;
        const bucketId = currency ? `${key}\u0000${currency}` : key;
        const bucket = buckets.get(bucketId) ?? { key, currency, values: [], count: 0 };
        bucket.values.push(value);
        bucket.count += 1;
        buckets.set(bucketId, bucket);
    }

    if (field !== undefined && buckets.size === 0 && query.metric !== 'count') numeric = false;

    let groups: AggregateGroup[] = [...buckets.values()].map((bucket) => ({
        key: bucket.key,
        currency: bucket.currency,
        count: bucket.count,
        value: numeric ? reduceValues(query.metric, bucket.values, byAmount) : undefined,
    }));
    if (query.groupBy === 'month') {
        groups = groups.sort((a, b) => a.key.localeCompare(b.key));
    }

    return { query, matched, groups, numeric };
}

/** Human-readable value of one group: "600.00" for money, "3" for counts. */
export function formatGroupValue(group: AggregateGroup, result: AggregateResult): string {
    if (group.value === undefined) return String(group.count);
    if (group.currency) return formatMinor(group.value, group.currency);
    if (result.query.metric === 'count') return String(group.value);
    return String(Math.round(group.value * 100) / 100);
}

/** Numeric value of one group for charting, in major units for money. */
export function chartValue(group: AggregateGroup): number | null {
    if (group.value === undefined) return null;
    if (group.currency) return group.value / 10 ** minorUnitDigits(group.currency);
    return group.value;
}
