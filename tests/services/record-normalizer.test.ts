import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ValidationError } from '../../src/services/errors';
import { NormalizerOptions, RecordNormalizerService } from '../../src/services/record-normalizer.service';
import { csvFile, jsonFile } from '../helpers/fakes';

const OPTIONS: NormalizerOptions = { maxFileSizeBytes: 1024 * 1024, allowedFormats: ['json', 'csv'] };

function rejectsWith(message: string) {
    return (error: unknown) => error instanceof ValidationError && error.message === message;
}

describe('RecordNormalizerService', () => {
    const normalizer = new RecordNormalizerService(OPTIONS);

    it('normalizes JSON invoices with aliased fields', async () => {
        const result = await normalizer.normalize([
            jsonFile('invoices.json', [
                { invoice_id: 'INV-1', vendor: 'Acme Corp', amount: 100, currency: 'usd', date: '2024-01-15', tax: 8 },
                { 'Invoice Number': 'INV-2', Supplier: 'Globex', Total: '$250.50', 'Invoice Date': '03/02/2024' },
            ]),
        ]);

        assert.equal(result.filesProcessed, 1);
        assert.equal(result.droppedRecords, 0);
        assert.deepEqual(result.records, [
            {
                id: 'INV-1',
                vendor: 'Acme Corp',
                amountMinor: 10000,
                currency: 'USD',
                issueDate: '2024-01-15',
                fields: { tax: 8 },
                source: { file: 'invoices.json', position: 1 },
            },
            {
                id: 'INV-2',
                vendor: 'Globex',
                amountMinor: 25050,
                currency: 'USD',
                issueDate: '2024-03-02',
                fields: {},
                source: { file: 'invoices.json', position: 2 },
            },
        ]);
    });

    it('unwraps an invoices array and accepts a single object', async () => {
        const result = await normalizer.normalize([
            jsonFile('wrapped.json', { invoices: [{ vendor: 'Acme', amount: 1, currency: 'EUR', date: '2024-05-01' }] }),
            jsonFile('single.json', { vendor: 'Globex', amount: 2, currency: 'EUR', date: '2024-05-02' }),
        ]);

        assert.equal(result.filesProcessed, 2);
        assert.deepEqual(
            result.records.map((record) => [record.id, record.vendor]),
            [
                ['wrapped.json#1', 'Acme'],
                ['single.json#1', 'Globex'],
            ],
        );
    });

    it('reads CSV files and keeps extra columns as fields', async () => {
        const result = await normalizer.normalize([
            csvFile(
                'invoices.csv',
                'Invoice ID,Vendor,Amount,Currency,Date,Status\n' +
                    'INV-10,Acme Corp,"1,200.00",USD,2024-04-01,paid\n' +
                    'INV-11,Initech,300,EUR,2024-04-03,open\n',
            ),
        ]);

        assert.equal(result.records.length, 2);
        assert.equal(result.records[0].amountMinor, 120000);
        assert.deepEqual(result.records[0].fields, { status: 'paid' });
        assert.equal(result.records[1].currency, 'EUR');
        assert.equal(result.records[1].amountMinor, 30000);
    });

    it('skips blank lines in CSV files', async () => {
        const result = await normalizer.normalize([
            csvFile(
                'blank.csv',
                'vendor,amount,currency,date\r\n' +
                    'Acme,100,USD,2024-01-01\r\n' +
                    '\r\n' +
                    'Globex,"note\n\nsplit",USD,2024-01-02\n' +
                    '   \n' +
                    'Initech,50,USD,2024-01-03\n\n',
            ),
        ]);

        assert.deepEqual(
            result.records.map((record) => record.vendor),
            ['Acme', 'Initech'],
        );
        assert.equal(result.droppedRecords, 1);
        assert.deepEqual(result.warnings, ['blank.csv record 2: unrecognized amount "note\n\nsplit"']);
    });

    it('rejects a CSV without an amount column', async () => {
        await assert.rejects(
            normalizer.normalize([csvFile('bad.csv', 'vendor,date\nAcme,2024-01-01\n')]),
            rejectsWith('bad.csv: CSV is missing a column for the invoice amount'),
        );
    });

    it('rejects an empty CSV', async () => {
        await assert.rejects(
            normalizer.normalize([csvFile('empty.csv', '')]),
            rejectsWith('empty.csv: CSV file is empty or has no header row'),
        );
    });

    it('rejects CSV rows that do not match the header', async () => {
        await assert.rejects(
            normalizer.normalize([csvFile('rows.csv', 'vendor,amount,date\nAcme,10\n')]),
            (error: unknown) => error instanceof ValidationError && error.message.startsWith('rows.csv: Malformed CSV: '),
        );
    });

    it('drops invalid records and reports why', async () => {
        const result = await normalizer.normalize([
            jsonFile('mixed.json', [
                { vendor: 'A', amount: 10, currency: 'USD', date: '2024-01-01' },
                { vendor: 'B', amount: 5, currency: 'USD' },
                42,
                { vendor: 'C', amount: -3, currency: 'USD', date: '2024-01-01' },
                { vendor: 'D', amount: '$10', currency: 'EUR', date: '2024-01-01' },
                { vendor: 'E', amount: 10, currency: 'USD', date: 'someday' },
            ]),
        ]);

        assert.equal(result.records.length, 1);
        assert.equal(result.droppedRecords, 5);
        assert.deepEqual(result.warnings, [
            'mixed.json record 2: missing date',
            'mixed.json record 3: not a JSON object',
            'mixed.json record 4: negative amount',
            'mixed.json record 5: amount is written in USD but currency is EUR',
            'mixed.json record 6: unrecognized date "someday"',
        ]);
    });

    it('treats a "__proto__" key as plain data', async () => {
        const text =
            '[{"__proto__": {"vendor": "Shadow", "amount": 5, "currency": "USD", "date": "2024-01-01"}},' +
            ' {"vendor": "Acme", "amount": 10, "currency": "USD", "date": "2024-01-01"}]';
        const result = await normalizer.normalize([
            { filename: 'keys.json', content: Buffer.from(text, 'utf8'), contentType: 'application/json' },
        ]);

        assert.deepEqual(
            result.records.map((record) => record.vendor),
            ['Acme'],
        );
        assert.deepEqual(result.warnings, ['keys.json record 1: missing vendor']);
    });

    it('fails when no record survives', async () => {
        await assert.rejects(
            normalizer.normalize([jsonFile('x.json', [{ amount: 5 }])]),
            rejectsWith('No valid invoice records found in the uploaded files (x.json record 1: missing vendor)'),
        );
    });

    it('needs a currency unless a default is configured', async () => {
        const data = [{ vendor: 'Acme', amount: 10, date: '2024-01-01' }];
        await assert.rejects(
            normalizer.normalize([jsonFile('plain.json', data)]),
            rejectsWith('No valid invoice records found in the uploaded files (plain.json record 1: missing currency)'),
        );

        const withDefault = new RecordNormalizerService({ ...OPTIONS, defaultCurrency: 'EUR' });
        const result = await withDefault.normalize([jsonFile('plain.json', data)]);
        assert.equal(result.records[0].currency, 'EUR');
        assert.equal(result.records[0].amountMinor, 1000);
    });

    it('detects the format from the content type when there is no extension', async () => {
        const result = await normalizer.normalize([
            {
                filename: 'upload',
                content: Buffer.from(JSON.stringify([{ vendor: 'Acme', amount: 1, currency: 'USD', date: '2024-01-01' }])),
                contentType: 'application/json; charset=utf-8',
            },
        ]);
        assert.equal(result.records.length, 1);
    });

    it('rejects unsupported formats, bad JSON, oversized files and empty uploads', async () => {
        await assert.rejects(
            normalizer.normalize([{ filename: 'notes.txt', content: Buffer.from('hello'), contentType: 'text/plain' }]),
            rejectsWith('notes.txt: Unsupported file format. Allowed: json, csv'),
        );
        await assert.rejects(
            normalizer.normalize([{ filename: 'broken.json', content: Buffer.from('{nope') }]),
            (error: unknown) => error instanceof ValidationError && error.message.startsWith('broken.json: Invalid JSON: '),
        );
        await assert.rejects(
            new RecordNormalizerService({ ...OPTIONS, maxFileSizeBytes: 10 }).normalize([jsonFile('big.json', [1, 2, 3, 4, 5, 6])]),
            rejectsWith('big.json: File exceeds maximum size of 10 bytes'),
        );
        await assert.rejects(normalizer.normalize([]), rejectsWith('No files provided'));
    });

    it('honours the allowed formats setting', async () => {
        const jsonOnly = new RecordNormalizerService({ ...OPTIONS, allowedFormats: ['json'] });
        await assert.rejects(
            jsonOnly.normalize([csvFile('a.csv', 'vendor,amount,date\nAcme,1,2024-01-01\n')]),
            rejectsWith('a.csv: Unsupported file format. Allowed: json'),
        );
    });
});
