// src/utils/money.ts

import currencyTable from '../data/iso-currencies.json';

const MINOR_UNITS: Record<string, number> = currencyTable;

const SYMBOL_CURRENCIES: Record<string, string> = {
    $: 'USD',
    '€': 'EUR',
    '£': 'GBP',
    '¥': 'JPY',
    '₹': 'INR',
};

export function isKnownCurrency(code: string): boolean {
    return Object.prototype.hasOwnProperty.call(MINOR_UNITS, code.toUpperCase());
}

export function minorUnitDigits(currency: string): number {
    return MINOR_UNITS[currency.toUpperCase()] ?? 2;
}

export interface ParsedAmount {
    /** Amount in minor units (cents for USD). Negative when the input was negative. */
    minor: number;
    /** Currency implied by a symbol or code written next to the number, if any. */
    impliedCurrency?: string;
}

/**
 * Converts a decimal string into integer minor units without going through
 * floating point. Digits past the currency exponent are rounded half-up.
 */
export function decimalToMinor(decimal: string, currency: string): number {
    const match = decimal.match(/^(\d+)(?:\.(\d*))?$/);
    if (!match) {
        throw new Error(`Invalid decimal amount: ${decimal}`);
    }
    const [, whole, fractionRaw = ''] = match;
    const digits = minorUnitDigits(currency);
    const kept = fractionRaw.slice(0, digits).padEnd(digits, '0');
    const roundUp = fractionRaw.length > digits && Number(fractionRaw[digits]) >= 5;

    const minor = Number(whole) * 10 ** digits + Number(kept || '0') + (roundUp ? 1 : 0);
    if (!Number.isSafeInteger(minor)) {
        throw new Error(`Amount out of range: ${decimal}`);
    }
    return minor;
}

function tryDecimalToMinor(decimal: string, currency: string): number | null {
    try {
        return decimalToMinor(decimal, currency);
    } catch {
        return null;
    }
}

/**
 * Reads an amount as found in uploaded data: a number, or a string such as
 * "1,234.50", "$100", "100 USD" or "(25.00)". Returns null for anything that
 * is not a monetary value.
 */
export function parseAmount(value: unknown, currencyHint: string): ParsedAmount | null {
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) return null;
        const negative = value < 0;
        const decimal = Math.abs(value).toFixed(minorUnitDigits(currencyHint) + 1);
        const minor = tryDecimalToMinor(decimal, currencyHint);
        return minor === null ? null : { minor: negative ? -minor : minor };
    }
    if (typeof value !== 'string') return null;

    let text = value.trim();
    if (!text) return null;

    let negative = false;
    if (/^\(.*\)$/.test(text)) {
        negative = true;
        text = text.slice(1, -1).trim();
    }
    if (text.startsWith('-')) {
        negative = true;
        text = text.slice(1).trim();
    }

    let impliedCurrency: string | undefined;
    const symbol = text[0];
    if (symbol && SYMBOL_CURRENCIES[symbol]) {
        impliedCurrency = SYMBOL_CURRENCIES[symbol];
        text = text.slice(1).trim();
    }
    const codeMatch = text.match(/^([A-Za-z]{3})\s*(.+)$/) ?? text.match(/^(.+?)\s*([A-Za-z]{3})$/);
    if (codeMatch) {
        const [, first, second] = codeMatch;
        const code = /^[A-Za-z]{3}$/.test(first) ? first : second;
        const rest = code === first ? second : first;
        if (!isKnownCurrency(code)) return null;
        impliedCurrency = code.toUpperCase();
        text = rest.trim();
    }
    if (text.startsWith('-')) {
        negative = true;
        text = text.slice(1).trim();
    }

    text = text.replace(/,/g, '');
    if (!/^\d+(\.\d*)?$/.test(text)) return null;

    const minor = tryDecimalToMinor(text, impliedCurrency ?? currencyHint);
    return minor === null ? null : { minor: negative ? -minor : minor, impliedCurrency };
}

export function formatMinor(minor: number, currency: string): string {
    const digits = minorUnitDigits(currency);
    const negative = minor < 0;
    const absolute = Math.abs(minor);
    if (digits === 0) return `${negative ? '-' : ''}${absolute}`;

    const scale = 10 ** digits;
    const whole = Math.floor(absolute / scale);
    const fraction = String(absolute % scale).padStart(digits, '0');
    return `${negative ? '-' : ''}${whole}.${fraction}`;
}
