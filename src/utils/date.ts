// src/utils/date.ts

import { format as formatDateFn, isValid, parse as parseDateFns, parseISO } from 'date-fns';

const CALENDAR_FORMATS = [
    'MM/dd/yyyy',
    'M/d/yyyy',
    'dd.MM.yyyy',
    'MMMM d, yyyy',
    'MMM d, yyyy',
    'd MMMM yyyy',
    'd MMM yyyy',
];

// Anchors date-fns parsing; the formats above always carry a full year.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Standardizes an uploaded date value to yyyy-MM-dd, or returns null when it
 * is not a real calendar date.
 */
export function standardizeDate(input: unknown): string | null {
    if (input instanceof Date) {
        return isValid(input) ? formatDateFn(input, 'yyyy-MM-dd') : null;
    }
    if (typeof input !== 'string') return null;

    const value = input.trim();
    if (!value) return null;

    if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        const [year, month, day] = value.split('-').map(Number);
        const d = new Date(Date.UTC(year, month - 1, day));
        const valid = d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
        return valid ? value : null;
    }

    // Full timestamps keep the calendar date as written, not as shifted to local time.
    const timestamp = value.match(/^(\d{4}-\d{2}-\d{2})[T ]/);
    if (timestamp && isValid(parseISO(value))) {
        return standardizeDate(timestamp[1]);
    }

    for (const fmt of CALENDAR_FORMATS) {
        const parsed = parseDateFns(value, fmt, REFERENCE_DATE);
        if (isValid(parsed)) {
            return formatDateFn(parsed, 'yyyy-MM-dd');
        }
    }

    return null;
}

export function toMonthKey(isoDate: string): string {
    return isoDate.slice(0, 7);
}
