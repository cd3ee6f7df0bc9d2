// src/config/analysis.ts

import { z } from 'zod';
import { UploadFormat } from '../models/invoice.model';
import { isKnownCurrency } from '../utils/money';

export type EmbeddingProvider = 'local' | 'openai';

/**
 * Everything the analysis core needs to know about its environment. Built once
 * at startup and handed to the services; nothing inside the core reads
 * process.env.
 */
export interface AnalysisConfig {
    version: string;
    session: {
        timeoutMs: number;
        sweepIntervalMs: number;
        slidingExpiration: boolean;
    };
    upload: {
        maxFileSizeBytes: number;
        allowedFormats: UploadFormat[];
        defaultCurrency?: string;
    };
    retrieval: {
        topK: number;
        minScore: number;
    };
    reasoning: {
        timeoutMs: number;
        /** Extra attempts after the first failed call. */
        retries: number;
        backoffMs: number;
    };
    embedding: {
        provider: EmbeddingProvider;
        model: string;
        dimensions: number;
        timeoutMs: number;
        batchSize: number;
    };
}

export interface ProviderCredentials {
    groqApiKey: string;
    modelName: string;
    maxTokens: number;
    openAiApiKey?: string;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    version: '1.0.0',
    session: {
        timeoutMs: 3600 * 1000,
        sweepIntervalMs: 60 * 1000,
        slidingExpiration: false,
    },
    upload: {
        maxFileSizeBytes: 10 * 1024 * 1024,
        allowedFormats: ['json', 'csv'],
    },
    retrieval: {
        topK: 3,
        minScore: 0,
    },
    reasoning: {
        timeoutMs: 30_000,
        retries: 1,
        backoffMs: 500,
    },
    embedding: {
        provider: 'local',
        model: 'text-embedding-3-small',
        dimensions: 256,
        timeoutMs: 15_000,
        batchSize: 100,
    },
};

const optionalInt = (min: number) =>
    z
        .string()
        .trim()
        .regex(/^\d+$/, 'must be a whole number')
        .transform(Number)
        .pipe(z.number().int().min(min))
        .optional();

const flag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes')
    .optional();

const analysisEnvSchema = z.object({
    SESSION_TIMEOUT_SECONDS: optionalInt(1),
    SESSION_SWEEP_INTERVAL_SECONDS: optionalInt(1),
    SLIDING_SESSION_EXPIRY: flag,
    MAX_FILE_SIZE_BYTES: optionalInt(1),
    ALLOWED_FILE_TYPES: z
        .string()
        .transform((value) => value.split(',').map((item) => item.trim().toLowerCase()).filter(Boolean))
        .pipe(z.array(z.enum(['json', 'csv'])).min(1))
        .optional(),
    DEFAULT_CURRENCY: z
        .string()
        .trim()
        .toUpperCase()
        .refine(isKnownCurrency, 'must be an ISO 4217 currency code')
        .optional(),
    RETRIEVAL_TOP_K: optionalInt(1),
    MIN_RELEVANCE_SCORE: z.coerce.number().min(-1).max(1).optional(),
    REASONING_TIMEOUT_MS: optionalInt(1),
    REASONING_RETRIES: optionalInt(0),
    RETRY_BACKOFF_MS: optionalInt(0),
    EMBEDDING_PROVIDER: z.enum(['local', 'openai']).optional(),
    EMBEDDING_MODEL: z.string().min(1).optional(),
    EMBEDDING_DIMENSIONS: optionalInt(8),
    EMBEDDING_TIMEOUT_MS: optionalInt(1),
    API_VERSION: z.string().min(1).optional(),
});

export type AnalysisEnv = Partial<Record<keyof z.input<typeof analysisEnvSchema>, string>>;

/**
 * Turns raw string settings (usually environment variables) into an
 * AnalysisConfig. Empty strings count as unset.
 */
export function buildAnalysisConfig(env: AnalysisEnv): AnalysisConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
    );
    const parsed = analysisEnvSchema.safeParse(present);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    const defaults = DEFAULT_ANALYSIS_CONFIG;
    return {
        version: values.API_VERSION ?? defaults.version,
        session: {
            timeoutMs: values.SESSION_TIMEOUT_SECONDS !== undefined
                ? values.SESSION_TIMEOUT_SECONDS * 1000
                : defaults.session.timeoutMs,
            sweepIntervalMs: values.SESSION_SWEEP_INTERVAL_SECONDS !== undefined
                ? values.SESSION_SWEEP_INTERVAL_SECONDS * 1000
                : defaults.session.sweepIntervalMs,
            slidingExpiration: values.SLIDING_SESSION_EXPIRY ?? defaults.session.slidingExpiration,
        },
        upload: {
            maxFileSizeBytes: values.MAX_FILE_SIZE_BYTES ?? defaults.upload.maxFileSizeBytes,
            allowedFormats: values.ALLOWED_FILE_TYPES ?? defaults.upload.allowedFormats,
            defaultCurrency: values.DEFAULT_CURRENCY,
        },
        retrieval: {
            topK: values.RETRIEVAL_TOP_K ?? defaults.retrieval.topK,
            minScore: values.MIN_RELEVANCE_SCORE ?? defaults.retrieval.minScore,
        },
        reasoning: {
            timeoutMs: values.REASONING_TIMEOUT_MS ?? defaults.reasoning.timeoutMs,
            retries: values.REASONING_RETRIES ?? defaults.reasoning.retries,
            backoffMs: values.RETRY_BACKOFF_MS ?? defaults.reasoning.backoffMs,
        },
        embedding: {
            provider: values.EMBEDDING_PROVIDER ?? defaults.embedding.provider,
            model: values.EMBEDDING_MODEL ?? defaults.embedding.model,
            dimensions: values.EMBEDDING_DIMENSIONS ?? defaults.embedding.dimensions,
            timeoutMs: values.EMBEDDING_TIMEOUT_MS ?? defaults.embedding.timeoutMs,
            batchSize: defaults.embedding.batchSize,
        },
    };
}
