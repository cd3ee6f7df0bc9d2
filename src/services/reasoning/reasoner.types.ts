// src/services/reasoning/reasoner.types.ts

import { Evidence } from './evidence-formatter';

export interface ReasonOptions {
    signal?: AbortSignal;
}

/** Turns a question plus gathered evidence into a natural-language answer. */
export interface Reasoner {
    readonly name: string;
    reason(question: string, evidence: Evidence, options?: ReasonOptions): Promise<string>;
}
