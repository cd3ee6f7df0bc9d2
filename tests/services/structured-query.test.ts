import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
    chartValue,
    formatGroupValue,
    hasFilters,
    matchesFilters,
    runAggregate,
    toNumber,
} from '../../src/services/index/structured-query';
import { makeRecord } from '../helpers/fakes';

const RECORDS = [
    makeRecord({ id: '1', vendor: 'Acme', amountMinor: 10000, issueDate: '2024-01-10', fields: { tax: '8.50', status: 'paid' } }),
    makeRecord({ id: '2', vendor: 'Acme', amountMinor: 20000, issueDate: '2024-02-05', fields: { tax: 17, status: 'open' } }),
    makeRecord({ id: '3', vendor: 'Globex', amountMinor: 30000, issueDate: '2024-02-20', fields: { status: 'paid' } }),
    makeRecord({ id: '4', vendor: 'Initech', amountMinor: 5000, currency: 'EUR', issueDate: '2024-03-01' }),
];

describe('structured queries', () => {
    it('sums amounts exactly and never mixes currencies', () => {
        const result = runAggregate(RECORDS, { metric: 'sum', filters: {} });

        assert.equal(result.numeric, true);
        assert.equal(result.matched.length, 4);
        assert.deepEqual(result.groups, [
            { key: 'all', currency: 'USD', count: 3, value: 60000 },
            { key: 'all', currency: 'EUR', count: 1, value: 5000 },
        ]);
        assert.equal(formatGroupValue(result.groups[0], result), '600.00');
    });

    it('counts per vendor in order of appearance', () => {
        const result = runAggregate(RECORDS, { metric: 'count', filters: {}, groupBy: 'vendor' });
        assert.deepEqual(
            result.groups.map((group) => [group.key, group.value, group.currency]),
            [
                ['Acme', 2, undefined],
                ['Globex', 1, undefined],
                ['Initech', 1, undefined],
            ],
        );
    });

    it('groups by month in calendar order', () => {
        const result = runAggregate([...RECORDS].reverse(), { metric: 'sum', filters: { currency: 'usd' }, groupBy: 'month' });
        assert.deepEqual(
            result.groups.map((group) => [group.key, group.value]),
            [
                ['2024-01', 10000],
                ['2024-02', 50000],
            ],
        );
    });

    it('averages, minimums and maximums amounts', () => {
        const usd = { currency: 'USD' };
        assert.equal(runAggregate(RECORDS, { metric: 'average', filters: usd }).groups[0].value, 20000);
        assert.equal(runAggregate(RECORDS, { metric: 'min', filters: usd }).groups[0].value, 10000);
        assert.equal(runAggregate(RECORDS, { metric: 'max', filters: usd }).groups[0].value, 30000);
    });

    it('finds minimum and maximum over hundreds of thousands of invoices', () => {
        const many = Array.from({ length: 300_000 }, (_, i) =>
            makeRecord({ id: `N-${i}`, amountMinor: ((i * 7919) % 300_000) + 1 }),
        );
        assert.equal(runAggregate(many, { metric: 'max', filters: {} }).groups[0].value, 300_000);
        assert.equal(runAggregate(many, { metric: 'min', filters: {} }).groups[0].value, 1);
    });

    it('aggregates numeric extra fields', () => {
        const result = runAggregate(RECORDS, { metric: 'sum', filters: {}, field: 'tax' });
        assert.equal(result.numeric, true);
        assert.deepEqual(result.groups, [{ key: 'all', currency: undefined, count: 2, value: 25.5 }]);
        assert.equal(formatGroupValue(result.groups[0], result), '25.5');
    });

    it('flags text fields as non-numeric but can still count them', () => {
        const summed = runAggregate(RECORDS, { metric: 'sum', filters: {}, field: 'status' });
        assert.equal(summed.numeric, false);
        assert.deepEqual(summed.groups, [{ key: 'all', currency: undefined, count: 3, value: undefined }]);

        const counted = runAggregate(RECORDS, { metric: 'count', filters: {}, field: 'status' });
        assert.equal(counted.numeric, true);
        assert.equal(counted.groups[0].value, 3);
    });

    it('treats an aggregate over a missing field as non-numeric', () => {
        const result = runAggregate(RECORDS, { metric: 'sum', filters: {}, field: 'discount' });
        assert.equal(result.numeric, false);
        assert.deepEqual(result.groups, []);
    });

    it('lists matching records without groups', () => {
        const result = runAggregate(RECORDS, { metric: 'list', filters: { vendor: 'acme' } });
        assert.deepEqual(result.groups, []);
        assert.deepEqual(result.matched.map((record) => record.id), ['1', '2']);
    });

    it('filters on amount in major units and inclusive dates', () => {
        assert.deepEqual(
            RECORDS.filter((record) => matchesFilters(record, { amountGreaterThan: 150 })).map((r) => r.id),
            ['2', '3'],
        );
        assert.deepEqual(
            RECORDS.filter((record) => matchesFilters(record, { amountLessThan: 100 })).map((r) => r.id),
            ['4'],
        );
        assert.deepEqual(
            RECORDS.filter((record) => matchesFilters(record, { dateFrom: '2024-02-05', dateTo: '2024-02-20' })).map((r) => r.id),
            ['2', '3'],
        );
    });

    it('helpers', () => {
        assert.equal(hasFilters({}), false);
        assert.equal(hasFilters({ vendor: undefined }), false);
        assert.equal(hasFilters({ dateFrom: '2024-01-01' }), true);
        assert.equal(toNumber('1,250.75'), 1250.75);
        assert.equal(toNumber('paid'), null);
        assert.equal(toNumber(Number.POSITIVE_INFINITY), null);
        assert.equal(chartValue({ key: 'all', currency: 'USD', count: 1, value: 12345 }), 123.45);
        assert.equal(chartValue({ key: 'all', count: 1, value: 7 }), 7);
        assert.equal(chartValue({ key: 'all', count: 1 }), null);
    });
});
