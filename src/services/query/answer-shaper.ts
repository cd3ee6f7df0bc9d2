// src/services/query/answer-shaper.ts

import { ChartSpec, ChartType, TableCell, TableData } from '../../models/answer.model';
import { InvoiceRecord } from '../../models/invoice.model';
import { formatMinor } from '../../utils/money';
import { AggregateMetric, AggregateResult, chartValue, formatGroupValue } from '../index/structured-query';

const RECORD_COLUMNS = ['invoice_id', 'vendor', 'date', 'amount', 'currency'];

const VALUE_PREFIX: Record<Exclude<AggregateMetric, 'list' | 'count'>, string> = {
    sum: 'total',
    average: 'average',
    min: 'minimum',
    max: 'maximum',
};

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

export function recordsTable(records: readonly InvoiceRecord[]): TableData | undefined {
    if (records.length === 0) return undefined;
    return {
        columns: RECORD_COLUMNS,
        rows: records.map((record) => ({
            invoice_id: record.id,
            vendor: record.vendor,
            date: record.issueDate,
            amount: formatMinor(record.amountMinor, record.currency),
            currency: record.currency,
        })),
    };
}

/** One row per aggregate group; money values stay exact decimal strings. */
export function aggregateTable(result: AggregateResult): TableData | undefined {
    const { metric, groupBy, field } = result.query;
    if (metric === 'list') return recordsTable(result.matched);
    if (result.groups.length === 0) return undefined;

    const withCurrency = result.groups.some((group) => group.currency !== undefined);
    const valueColumn =
        result.numeric && metric !== 'count' ? `${VALUE_PREFIX[metric]}_${field ?? 'amount'}` : undefined;

    const columns: string[] = [];
    if (groupBy) columns.push(groupBy);
    if (withCurrency) columns.push('currency');
    columns.push('invoice_count');
    if (valueColumn) columns.push(valueColumn);

    const rows = result.groups.map((group) => {
        const row: Record<string, TableCell> = {};
        if (groupBy) row[groupBy] = group.key;
        if (withCurrency) row.currency = group.currency ?? null;
        row.invoice_count = group.count;
        if (valueColumn) row[valueColumn] = formatGroupValue(group, result);
        return row;
    });
    return { columns, rows };
}

/**
 * Chart data for a numeric aggregate, or null when the values cannot be
 * plotted and the answer should go out without a chart.
 */
export function buildChartSpec(result: AggregateResult | undefined, type: ChartType): ChartSpec | null {
    if (!result || !result.numeric || result.query.metric === 'list' || result.groups.length === 0) {
        return null;
    }

    const values: number[] = [];
    for (const group of result.groups) {
        const value = chartValue(group);
        if (value === null || !Number.isFinite(value)) return null;
        values.push(value);
    }
    if (type === 'pie' && (values.some((value) => value < 0) || values.every((value) => value === 0))) {
        return null;
    }

    const { metric, groupBy, field } = result.query;
    const currencies = [...new Set(result.groups.map((group) => group.currency).filter((c): c is string => !!c))];
    // Pie slices are shares of one total, and amounts in different currencies never share a total.
    if (type === 'pie' && currencies.length > 1) return null;
    const labels = result.groups.map((group) => {
        const key = groupBy ? group.key : 'All invoices';
        return currencies.length > 1 && group.currency ? `${key} (${group.currency})` : key;
    });

    const measure = metric === 'count' ? 'Invoice count' : `${capitalize(VALUE_PREFIX[metric])} ${field ? field.replace(/_/g, ' ') : 'amount'}`;
    const unit = currencies.length === 1 ? ` (${currencies[0]})` : '';

    return {
        type,
        title: groupBy ? `${measure} by ${groupBy}` : measure,
        xLabel: groupBy ? capitalize(groupBy) : '',
        yLabel: `${measure}${unit}`,
        labels,
        values,
    };
}
