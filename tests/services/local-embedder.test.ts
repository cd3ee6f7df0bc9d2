import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LocalHashingEmbedder, tokenize } from '../../src/services/embedding/local-embedder';
import { cosineSimilarity } from '../../src/services/index/invoice-index';

describe('LocalHashingEmbedder', () => {
    it('tokenizes words and decimal numbers', () => {
        assert.deepEqual(tokenize('Invoice INV-1 from Acme, 1,200.50 USD'), [
            'invoice',
            'inv',
            '1',
            'from',
            'acme',
            '1',
            '200.50',
            'usd',
        ]);
    });

    it('is deterministic and unit length', async () => {
        const embedder = new LocalHashingEmbedder(128);
        const [first, second] = await embedder.embed(['Acme consulting services', 'Acme consulting services']);

        assert.equal(first.length, 128);
        assert.deepEqual(first, second);
        const norm = Math.sqrt(first.reduce((sum, v) => sum + v * v, 0));
        assert.ok(Math.abs(norm - 1) < 1e-9);
    });

    it('returns a zero vector for text without tokens', async () => {
        const [vector] = await new LocalHashingEmbedder(16).embed(['  ,;  ']);
        assert.deepEqual(vector, new Array(16).fill(0));
    });

    it('ranks texts sharing words above unrelated ones', async () => {
        const embedder = new LocalHashingEmbedder(256);
        const [query, related, unrelated] = await embedder.embed([
            'acme consulting',
            'Invoice from Acme Consulting for strategy work',
            'Globex hardware shipment of bolts',
        ]);
        assert.ok(cosineSimilarity(query, related) > cosineSimilarity(query, unrelated));
    });

    it('rejects unusable dimensions', () => {
        assert.throws(() => new LocalHashingEmbedder(4), /at least 8/);
        assert.throws(() => new LocalHashingEmbedder(10.5), /at least 8/);
    });
});
