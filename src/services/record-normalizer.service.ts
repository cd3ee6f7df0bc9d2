// src/services/record-normalizer.service.ts

import { InvoiceRecord, NormalizationResult, UploadedFile, UploadFormat } from '../models/invoice.model';
import { CsvReadResult, normalizeHeader, readCsv } from '../utils/csv-reader';
import { standardizeDate } from '../utils/date';
import { isKnownCurrency, parseAmount } from '../utils/money';
import { ValidationError } from './errors';

export interface NormalizerOptions {
    maxFileSizeBytes: number;
    allowedFormats: UploadFormat[];
    /** Used when a record names no currency and its amount carries no symbol. */
    defaultCurrency?: string;
}

type RequiredField = 'vendor' | 'amount' | 'currency' | 'date';

const FIELD_ALIASES: Record<RequiredField | 'id', string[]> = {
    id: ['id', 'invoice_id', 'invoice_number', 'invoice_no', 'number'],
    vendor: ['vendor', 'vendor_name', 'supplier', 'supplier_name', 'seller', 'merchant', 'company', 'payee', 'from'],
    amount: ['amount', 'total', 'total_amount', 'amount_due', 'grand_total', 'invoice_total', 'value'],
    currency: ['currency', 'currency_code'],
    date: ['date', 'invoice_date', 'issue_date', 'issued_on', 'issued_at', 'created_at', 'billing_date'],
};

const WRAPPER_KEYS = ['invoices', 'records', 'data', 'items'];

const CONTENT_TYPES: Record<string, UploadFormat> = {
    'application/json': 'json',
    'text/json': 'json',
    'text/csv': 'csv',
    'application/csv': 'csv',
    'application/vnd.ms-excel': 'csv',
};

interface RawRecord {
    /** Null when the entry is not an object at all. */
    values: Record<string, unknown> | null;
    position: number;
}

type Resolution = { record: InvoiceRecord } | { reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class RecordNormalizerService {
    constructor(private readonly options: NormalizerOptions) {}

    /**
     * Parses every uploaded file into invoice records. Files that cannot be
     * read at all fail the whole call; individual records that miss a
     * required field are dropped and reported as warnings.
     */
    public async normalize(files: UploadedFile[]): Promise<NormalizationResult> {
        if (files.length === 0) {
            throw new ValidationError('No files provided');
        }

        const records: InvoiceRecord[] = [];
        const warnings: string[] = [];
        let droppedRecords = 0;

        for (const file of files) {
            const format = this.resolveFormat(file);
            if (file.content.length > this.options.maxFileSizeBytes) {
                throw new ValidationError(
                    `File exceeds maximum size of ${this.options.maxFileSizeBytes} bytes`,
                    file.filename,
                );
            }

            const rawRecords = format === 'json' ? this.readJson(file) : await this.readCsvFile(file);

            for (const raw of rawRecords) {
                const resolution = this.resolveRecord(raw, file.filename);
                if ('record' in resolution) {
                    records.push(resolution.record);
                } else {
                    droppedRecords += 1;
                    warnings.push(`${file.filename} record ${raw.position}: ${resolution.reason}`);
                }
            }
        }

        if (records.length === 0) {
            const detail = warnings.length > 0 ? ` (${warnings.slice(0, 3).join('; ')})` : '';
            throw new ValidationError(`No valid invoice records found in the uploaded files${detail}`);
        }

        return { records, filesProcessed: files.length, droppedRecords, warnings };
    }

    private resolveFormat(file: UploadedFile): UploadFormat {
        const extension = file.filename.split('.').pop()?.toLowerCase();
        const contentType = file.contentType?.split(';')[0].trim().toLowerCase();
        let format: UploadFormat | undefined;

        if (extension === 'json' || extension === 'csv') {
            format = extension;
        } else if (contentType && CONTENT_TYPES[contentType]) {
            format = CONTENT_TYPES[contentType];
        }

        if (!format || !this.options.allowedFormats.includes(format)) {
            throw new ValidationError(
                `Unsupported file format. Allowed: ${this.options.allowedFormats.join(', ')}`,
                file.filename,
            );
        }
        return format;
    }

    private readJson(file: UploadedFile): RawRecord[] {
        let data: unknown;
        try {
            data = JSON.parse(file.content.toString('utf-8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'unknown parse error';
            throw new ValidationError(`Invalid JSON: ${reason}`, file.filename);
        }

        if (isPlainObject(data)) {
            const wrapper = data;
            const wrapperKey = WRAPPER_KEYS.find((key) => Array.isArray(wrapper[key]));
            if (!wrapperKey) {
                return [{ values: this.normalizeKeys(wrapper), position: 1 }];
            }
            data = wrapper[wrapperKey];
        }
        if (!Array.isArray(data)) {
            throw new ValidationError('JSON must contain an invoice object or an array of invoice objects', file.filename);
        }

        return data.map((item: unknown, index) => ({
            values: isPlainObject(item) ? this.normalizeKeys(item) : null,
            position: index + 1,
        }));
    }

    private async readCsvFile(file: UploadedFile): Promise<RawRecord[]> {
        let parsed: CsvReadResult;
        try {
            parsed = await readCsv(file.content);
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'unknown parse error';
            throw new ValidationError(`Malformed CSV: ${reason}`, file.filename);
        }

        if (parsed.headers.length === 0) {
            throw new ValidationError('CSV file is empty or has no header row', file.filename);
        }

        // No currency column is needed when amounts carry a symbol or a default currency is set.
        const required: RequiredField[] = ['vendor', 'amount', 'date'];
        for (const field of required) {
            const hasColumn = FIELD_ALIASES[field].some((alias) => parsed.headers.includes(alias));
            if (!hasColumn) {
                throw new ValidationError(`CSV is missing a column for the invoice ${field}`, file.filename);
            }
        }

        return parsed.rows.map((values, index) => ({ values, position: index + 1 }));
    }

    private normalizeKeys(values: Record<string, unknown>): Record<string, unknown> {
        // fromEntries defines own properties, so a "__proto__" key stays plain data.
        return Object.fromEntries(Object.entries(values).map(([key, value]) => [normalizeHeader(key), value]));
    }

    private pick(values: Record<string, unknown>, field: keyof typeof FIELD_ALIASES): [string, unknown] | undefined {
        for (const alias of FIELD_ALIASES[field]) {
            const value = values[alias];
            if (value !== undefined && value !== null && value !== '') {
                return [alias, value];
            }
        }
        return undefined;
    }

    private resolveRecord(raw: RawRecord, filename: string): Resolution {
        const { values } = raw;
        if (!values) return { reason: 'not a JSON object' };
        const consumed = new Set<string>();

        const vendorEntry = this.pick(values, 'vendor');
        let vendor: string | undefined;
        if (vendorEntry) {
            const [key, value] = vendorEntry;
            if (typeof value === 'string' && value.trim()) {
                vendor = value.trim();
            } else if (isPlainObject(value) && typeof value.name === 'string' && value.name.trim()) {
                vendor = value.name.trim();
            }
            consumed.add(key);
        }
        if (!vendor) return { reason: 'missing vendor' };

        const dateEntry = this.pick(values, 'date');
        const issueDate = dateEntry ? standardizeDate(dateEntry[1]) : null;
        if (!dateEntry) return { reason: 'missing date' };
        if (!issueDate) return { reason: `unrecognized date "${String(dateEntry[1])}"` };
        consumed.add(dateEntry[0]);

        const currencyEntry = this.pick(values, 'currency');
        let currency: string | undefined;
        if (currencyEntry) {
            if (typeof currencyEntry[1] !== 'string' || !isKnownCurrency(currencyEntry[1].trim())) {
                return { reason: `unrecognized currency "${String(currencyEntry[1])}"` };
            }
            currency = currencyEntry[1].trim().toUpperCase();
            consumed.add(currencyEntry[0]);
        }

        const amountEntry = this.pick(values, 'amount');
        if (!amountEntry) return { reason: 'missing amount' };
        const amount = parseAmount(amountEntry[1], currency ?? this.options.defaultCurrency ?? 'USD');
        if (!amount) return { reason: `unrecognized amount "${String(amountEntry[1])}"` };
        if (amount.minor < 0) return { reason: 'negative amount' };
        consumed.add(amountEntry[0]);

        if (currency && amount.impliedCurrency && amount.impliedCurrency !== currency) {
            return { reason: `amount is written in ${amount.impliedCurrency} but currency is ${currency}` };
        }
        currency = currency ?? amount.impliedCurrency ?? this.options.defaultCurrency;
        if (!currency) return { reason: 'missing currency' };

        const idEntry = this.pick(values, 'id');
        if (idEntry) consumed.add(idEntry[0]);
        const id = idEntry ? String(idEntry[1]).trim() : `${filename}#${raw.position}`;

        const fields: Record<string, unknown> = Object.fromEntries(
            Object.entries(values).filter(([key]) => !consumed.has(key)),
        );

        return {
            record: {
                id,
                vendor,
                amountMinor: amount.minor,
                currency,
                issueDate,
                fields,
                source: { file: filename, position: raw.position },
            },
        };
    }
}
