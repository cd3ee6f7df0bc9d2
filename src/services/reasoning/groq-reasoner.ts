// src/services/reasoning/groq-reasoner.ts

import Groq from 'groq-sdk';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { Evidence, formatEvidence, NO_MATCHING_RECORDS } from './evidence-formatter';
import { ANSWER_PROMPT_TEMPLATE, ANSWER_SYSTEM_PROMPT } from './prompts/answerPrompt';
import { Reasoner, ReasonOptions } from './reasoner.types';

interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

/** The slice of the Groq client this reasoner calls; lets tests pass a stub. */
export interface ChatCompletionClient {
    chat: {
        completions: {
            create(
                body: { model: string; messages: ChatMessage[]; temperature: number; max_tokens: number; stream: false },
                options?: { signal?: AbortSignal; maxRetries?: number },
            ): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
        };
    };
}

export interface GroqReasonerConfig extends ServiceConfig {
    apiKey: string;
    model: string;
    maxTokens: number;
    client?: ChatCompletionClient;
}

export function buildAnswerMessages(question: string, evidence: Evidence): ChatMessage[] {
    const system = ANSWER_SYSTEM_PROMPT.replace('{{NO_MATCH_MARKER}}', () => NO_MATCHING_RECORDS).trim();
    const user = ANSWER_PROMPT_TEMPLATE.replace('{{EVIDENCE}}', () => formatEvidence(evidence))
        .replace('{{QUESTION}}', () => question)
        .trim();
    return [
        { role: 'system', content: system },
        { role: 'user', content: user },
    ];
}

export class GroqReasoner extends BaseService implements Reasoner {
    readonly name: string;
    private client: ChatCompletionClient;
    private readonly model: string;
    private readonly maxTokens: number;

    constructor(config: GroqReasonerConfig) {
        super(config);
        if (!config.client && !config.apiKey) {
            throw new Error('GROQ_API_KEY is required for the Groq reasoner');
        }
        this.client = config.client ?? new Groq({ apiKey: config.apiKey });
        this.model = config.model;
        this.maxTokens = config.maxTokens;
        this.name = `groq:${config.model}`;
    }

    async reason(question: string, evidence: Evidence, options: ReasonOptions = {}): Promise<string> {
        const messages = buildAnswerMessages(question, evidence);
        this.logger.debug('Calling Groq for an answer', { model: this.model, promptChars: messages[1].content.length });

        let content: string | null | undefined;
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages,
                    temperature: 0,
                    max_tokens: this.maxTokens,
                    stream: false,
                },
                // Retries are the orchestrator's job.
                { signal: options.signal, maxRetries: 0 },
            );
            content = response.choices[0]?.message?.content;
        } catch (error) {
            const reason = error instanceof Error ? error.message : 'Unknown error';
            throw new Error(`Groq API error: ${reason}`, { cause: error });
        }

        const answer = content?.trim();
        if (!answer) {
            throw new Error('Groq returned an empty answer');
        }
        return answer;
    }
}
