// src/services/query/question-classifier.ts

import { addDays, endOfMonth, format as formatDateFn, parseISO, subDays } from 'date-fns';
import { ChartType } from '../../models/answer.model';
import { AggregateMetric, GroupByDimension, RecordFilters, StructuredQuery } from '../index/structured-query';

export type QueryIntent = 'aggregate' | 'retrieval' | 'visualization';

export interface Classification {
    intent: QueryIntent;
    wantsTable: boolean;
    wantsChart: boolean;
    chartType: ChartType;
    /** Filters always apply; metric, grouping and field only matter for aggregate and visualization intents. */
    query: StructuredQuery;
}

export interface ClassifierContext {
    vendors: string[];
    fieldNames: string[];
}

const CHART_PATTERN = /\b(chart|graph|plot|visuali[sz]e|visuali[sz]ation|diagram|histogram|pie)\b/;
const TABLE_PATTERN = /\b(table|tabular|list|breakdown|break down|itemi[sz]e|line items|each|every|per)\b/;

// Checked in order: "total number of invoices" is a count, not a sum.
const METRIC_PATTERNS: Array<[AggregateMetric, RegExp]> = [
    ['count', /\b(how many|count|number of)\b/],
    ['average', /\b(average|avg|mean)\b/],
    ['max', /\b(highest|largest|biggest|maximum|max|most expensive)\b/],
    ['min', /\b(lowest|smallest|minimum|min|cheapest|least expensive)\b/],
    ['sum', /\b(total|sum|spent|spend|spending|how much)\b/],
    ['list', /\b(list|show|display|which invoices|all invoices|every invoice|each invoice)\b/],
];

const GROUP_PATTERNS: Array<[GroupByDimension, RegExp]> = [
    ['vendor', /\b(by|per|for each|each|across)\s+(vendor|supplier|company|merchant)s?\b/],
    ['month', /\b(by|per|each)\s+month\b|\bmonthly\b|\bover time\b|\btrend/],
    ['currency', /\b(by|per|each)\s+currenc(y|ies)\b/],
];

const NUMBER = '(?:[$€£¥₹]\\s*)?(\\d[\\d,]*(?:\\.\\d+)?)';
const GREATER_PATTERN = new RegExp(`\\b(?:over|above|more than|greater than|exceeding|larger than|bigger than)\\s+${NUMBER}`);
const LESS_PATTERN = new RegExp(`\\b(?:under|below|less than|smaller than|cheaper than)\\s+${NUMBER}`);

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DATE_TOKEN =
    '(\\d{4}-\\d{2}-\\d{2}|\\d{4}-\\d{2}|(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?\\s+(?:19|20)\\d{2}|(?:19|20)\\d{2})';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentions(text: string, phrase: string): boolean {
    return new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase.toLowerCase())}($|[^a-z0-9])`).test(text);
}

function toIso(date: Date): string {
    return formatDateFn(date, 'yyyy-MM-dd');
}

/** Resolves a date token to the first or last calendar day it covers. */
export function dateBound(token: string, edge: 'start' | 'end'): string | undefined {
    const value = token.trim().toLowerCase();

    if (/^\d{4}-\d{2}-\d{2}$/.test(value)) return value;

    let year: number;
    let month: number | undefined;
    const isoMonth = value.match(/^(\d{4})-(\d{2})$/);
    const namedMonth = value.match(/^([a-z]+)\.?\s+(\d{4})$/);
    if (isoMonth) {
        year = Number(isoMonth[1]);
        month = Number(isoMonth[2]) - 1;
    } else if (namedMonth) {
        year = Number(namedMonth[2]);
        month = MONTHS.indexOf(namedMonth[1].slice(0, 3));
    } else if (/^\d{4}$/.test(value)) {
        year = Number(value);
    } else {
        return undefined;
    }
    if (month !== undefined && (month < 0 || month > 11)) return undefined;

    if (month === undefined) {
        return edge === 'start' ? `${year}-01-01` : `${year}-12-31`;
    }
    const first = new Date(year, month, 1);
    return toIso(edge === 'start' ? first : endOfMonth(first));
}

function extractDateFilters(text: string): Pick<RecordFilters, 'dateFrom' | 'dateTo'> {
    const between = text.match(new RegExp(`\\bbetween\\s+${DATE_TOKEN}\\s+and\\s+${DATE_TOKEN}`));
    if (between) {
        return { dateFrom: dateBound(between[1], 'start'), dateTo: dateBound(between[2], 'end') };
    }

    const filters: Pick<RecordFilters, 'dateFrom' | 'dateTo'> = {};
    const after = text.match(new RegExp(`\\bafter\\s+${DATE_TOKEN}`));
    const since = text.match(new RegExp(`\\b(?:since|from)\\s+${DATE_TOKEN}`));
    const before = text.match(new RegExp(`\\bbefore\\s+${DATE_TOKEN}`));
    const until = text.match(new RegExp(`\\b(?:until|till|through|up to)\\s+${DATE_TOKEN}`));

    if (after) {
        const end = dateBound(after[1], 'end');
        if (end) filters.dateFrom = toIso(addDays(parseISO(end), 1));
    } else if (since) {
        filters.dateFrom = dateBound(since[1], 'start');
    }
    if (before) {
        const start = dateBound(before[1], 'start');
        if (start) filters.dateTo = toIso(subDays(parseISO(start), 1));
    } else if (until) {
        filters.dateTo = dateBound(until[1], 'end');
    }

    if (!filters.dateFrom && !filters.dateTo) {
        const within = text.match(new RegExp(`\\b(?:in|during|for|of)\\s+${DATE_TOKEN}`));
        if (within) {
            filters.dateFrom = dateBound(within[1], 'start');
            filters.dateTo = dateBound(within[1], 'end');
        }
    }
    return filters;
}

function parseThreshold(match: RegExpMatchArray | null): number | undefined {
    if (!match) return undefined;
    const value = Number(match[1].replace(/,/g, ''));
    return Number.isFinite(value) ? value : undefined;
}

function extractVendor(text: string, vendors: string[]): string | undefined {
    // Longest names first so "Acme Europe" wins over "Acme".
    return [...vendors].sort((a, b) => b.length - a.length).find((vendor) => mentions(text, vendor));
}

function extractField(text: string, fieldNames: string[]): string | undefined {
    return fieldNames.find((field) => mentions(text, field) || mentions(text, field.replace(/_/g, ' ')));
}

/**
 * Decides once, from the wording of the question, which answer channels to
 * attempt and which structured query describes it. Purely heuristic: the
 * language model is never consulted here.
 */
export function classifyQuestion(question: string, context: ClassifierContext): Classification {
    const text = question.toLowerCase();

    const wantsChart = CHART_PATTERN.test(text);
    const chartType: ChartType = /\bpie\b/.test(text)
        ? 'pie'
        : /\bline\b|\btrend|\bover time\b/.test(text)
          ? 'line'
          : 'bar';

    const detected = METRIC_PATTERNS.find(([, pattern]) => pattern.test(text))?.[0];
    let groupBy = GROUP_PATTERNS.find(([, pattern]) => pattern.test(text))?.[0];

    const filters: RecordFilters = {};
    const vendor = extractVendor(text, context.vendors);
    if (vendor) filters.vendor = vendor;
    const above = parseThreshold(text.match(GREATER_PATTERN));
    if (above !== undefined) filters.amountGreaterThan = above;
    const below = parseThreshold(text.match(LESS_PATTERN));
    if (below !== undefined) filters.amountLessThan = below;
    const { dateFrom, dateTo } = extractDateFilters(text);
    if (dateFrom) filters.dateFrom = dateFrom;
    if (dateTo) filters.dateTo = dateTo;

    let intent: QueryIntent;
    let metric: AggregateMetric;
    if (wantsChart) {
        intent = 'visualization';
        metric = detected && detected !== 'list' ? detected : 'sum';
        groupBy = groupBy ?? (chartType === 'line' ? 'month' : 'vendor');
    } else if (detected) {
        intent = 'aggregate';
        metric = detected;
    } else {
        intent = 'retrieval';
        metric = 'list';
    }

    const query: StructuredQuery = { metric, filters };
    if (groupBy && intent !== 'retrieval') query.groupBy = groupBy;
    if (metric !== 'list' && metric !== 'count') {
        const field = extractField(text, context.fieldNames);
        if (field) query.field = field;
    }

    const wantsTable = intent !== 'retrieval' || TABLE_PATTERN.test(text);

    return { intent, wantsTable, wantsChart, chartType, query };
}
