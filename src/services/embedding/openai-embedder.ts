// src/services/embedding/openai-embedder.ts

import OpenAI from 'openai';
import { Embedder } from './embedder.types';

export interface OpenAIEmbedderOptions {
    apiKey: string;
    model: string;
    batchSize: number;
    client?: OpenAI;
}

export class OpenAIEmbedder implements Embedder {
    readonly name: string;
    private client: OpenAI;

    constructor(private readonly options: OpenAIEmbedderOptions) {
        if (!options.client && !options.apiKey) {
            throw new Error('OPEN_AI_API_KEY is required for OpenAI embeddings');
        }
        this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
        this.name = `openai:${options.model}`;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const vectors: number[][] = [];
        for (let start = 0; start < texts.length; start += this.options.batchSize) {
            const batch = texts.slice(start, start + this.options.batchSize);
            const response = await this.client.embeddings.create(
                { model: this.options.model, input: batch },
                // Retries are the caller's job; the timeout comes from the signal.
                { signal, maxRetries: 0 },
            );
            const ordered = [...response.data].sort((a, b) => a.index - b.index);
            vectors.push(...ordered.map((item) => item.embedding));
        }
        return vectors;
    }
}
