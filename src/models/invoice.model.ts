// src/models/invoice.model.ts

export type UploadFormat = 'json' | 'csv';

export interface UploadedFile {
    filename: string;
    content: Buffer;
    contentType?: string;
}

export interface RecordSource {
    file: string;
    /** 1-based position of the record inside its file. */
    position: number;
}

export interface InvoiceRecord {
    id: string;
    vendor: string;
    /** Non-negative amount in the currency's minor unit. */
    amountMinor: number;
    /** ISO 4217 code, upper case. */
    currency: string;
    /** Calendar date, yyyy-MM-dd. */
    issueDate: string;
    /** Every uploaded field that is not one of the above (line items, tax, status...). */
    fields: Record<string, unknown>;
    source: RecordSource;
}

export interface NormalizationResult {
    records: InvoiceRecord[];
    filesProcessed: number;
    droppedRecords: number;
    warnings: string[];
}
