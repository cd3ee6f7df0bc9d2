// src/services/embedding/embedder.types.ts

/**
 * Anything that can turn texts into vectors. Implementations must return one
 * vector per input text, in input order, all of the same dimension.
 */
export interface Embedder {
    readonly name: string;
    embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
