// src/services/embedding/local-embedder.ts

import { Embedder } from './embedder.types';

const TOKEN_PATTERN = /[a-z0-9]+(?:[.'][a-z0-9]+)*/g;

export function tokenize(text: string): string[] {
    return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

// 32-bit FNV-1a
function fnv1a(value: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * In-process embedder based on feature hashing of word unigrams and bigrams.
 * Deterministic and free of network calls, so an index built from the same
 * records is always identical.
 */
export class LocalHashingEmbedder implements Embedder {
    readonly name = 'local-hashing';

    constructor(private readonly dimensions: number = 256) {
        if (!Number.isInteger(dimensions) || dimensions < 8) {
            throw new Error(`Embedding dimensions must be an integer of at least 8, got ${dimensions}`);
        }
    }

    async embed(texts: string[]): Promise<number[][]> {
        return texts.map((text) => this.embedOne(text));
    }

    private embedOne(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        const tokens = tokenize(text);
        const features = [...tokens];
        for (let i = 0; i + 1 < tokens.length; i++) {
            features.push(`${tokens[i]} ${tokens[i + 1]}`);
        }

        for (const feature of features) {
            const hash = fnv1a(feature);
            const slot = hash % this.dimensions;
            // The top bit picks the sign so collisions tend to cancel out.
            vector[slot] += hash & 0x80000000 ? -1 : 1;
        }

        const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
        return norm === 0 ? vector : vector.map((v) => v / norm);
    }
}
