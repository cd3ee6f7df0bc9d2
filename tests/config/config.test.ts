import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildAnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from '../../src/config/analysis';

describe('buildAnalysisConfig', () => {
    it('falls back to defaults when nothing is set', () => {
        const config = buildAnalysisConfig({});
        assert.deepEqual(config.session, DEFAULT_ANALYSIS_CONFIG.session);
        assert.deepEqual(config.retrieval, DEFAULT_ANALYSIS_CONFIG.retrieval);
        assert.deepEqual(config.reasoning, DEFAULT_ANALYSIS_CONFIG.reasoning);
        assert.deepEqual(config.embedding, DEFAULT_ANALYSIS_CONFIG.embedding);
        assert.equal(config.upload.defaultCurrency, undefined);
        assert.equal(config.version, '1.0.0');
    });

    it('treats empty strings as unset', () => {
        const config = buildAnalysisConfig({ SESSION_TIMEOUT_SECONDS: '', EMBEDDING_PROVIDER: '' });
        assert.equal(config.session.timeoutMs, 3_600_000);
        assert.equal(config.embedding.provider, 'local');
    });

    it('reads and converts every setting', () => {
        const config = buildAnalysisConfig({
            SESSION_TIMEOUT_SECONDS: '120',
            SESSION_SWEEP_INTERVAL_SECONDS: '5',
            SLIDING_SESSION_EXPIRY: 'yes',
            MAX_FILE_SIZE_BYTES: '2048',
            ALLOWED_FILE_TYPES: ' CSV ',
            DEFAULT_CURRENCY: 'eur',
            RETRIEVAL_TOP_K: '7',
            MIN_RELEVANCE_SCORE: '0.25',
            REASONING_TIMEOUT_MS: '1500',
            REASONING_RETRIES: '0',
            RETRY_BACKOFF_MS: '10',
            EMBEDDING_PROVIDER: 'openai',
            EMBEDDING_DIMENSIONS: '512',
        });

        assert.deepEqual(config.session, { timeoutMs: 120_000, sweepIntervalMs: 5_000, slidingExpiration: true });
        assert.deepEqual(config.upload, { maxFileSizeBytes: 2048, allowedFormats: ['csv'], defaultCurrency: 'EUR' });
        assert.deepEqual(config.retrieval, { topK: 7, minScore: 0.25 });
        assert.deepEqual(config.reasoning, { timeoutMs: 1500, retries: 0, backoffMs: 10 });
        assert.equal(config.embedding.provider, 'openai');
        assert.equal(config.embedding.dimensions, 512);
    });

    it('rejects malformed values with the setting name', () => {
        assert.throws(
            () => buildAnalysisConfig({ SESSION_TIMEOUT_SECONDS: 'soon' }),
            { message: 'Invalid configuration: SESSION_TIMEOUT_SECONDS: must be a whole number' },
        );
        assert.throws(() => buildAnalysisConfig({ ALLOWED_FILE_TYPES: 'pdf' }), /ALLOWED_FILE_TYPES/);
        assert.throws(
            () => buildAnalysisConfig({ DEFAULT_CURRENCY: 'XYZ' }),
            { message: 'Invalid configuration: DEFAULT_CURRENCY: must be an ISO 4217 currency code' },
        );
        assert.throws(() => buildAnalysisConfig({ REASONING_TIMEOUT_MS: '0' }), /REASONING_TIMEOUT_MS/);
    });
});
