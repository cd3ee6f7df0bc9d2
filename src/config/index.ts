// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { AnalysisConfig, buildAnalysisConfig, ProviderCredentials } from './analysis';

// Determine the environment
const nodeEnv = process.env.NODE_ENV || 'development';

console.log(`[config/index.ts] Starting configuration loading. NODE_ENV: ${nodeEnv}`);

// Load the .env file from the project root (two levels up from src/config or dist/config)
const projectRootEnvPath = path.resolve(__dirname, '../../.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error) {
  console.warn(`[config/index.ts] No .env file loaded from ${projectRootEnvPath}: ${dotenvResult.error.message}`);
  if (nodeEnv !== 'development') {
    console.warn('[config/index.ts] In non-development environments, ensure environment variables are set directly.');
  }
} else {
  console.log(`[config/index.ts] .env file loaded successfully from ${projectRootEnvPath}.`);
}

// Helper function to get environment variables with defaults and critical checks
const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (isCritical) {
      const errorMessage = `[config/index.ts] CRITICAL ERROR: Environment variable ${key} is missing or empty and has no default. This is required.`;
      console.error(errorMessage);
      throw new Error(errorMessage); // Stop the application if critical config is missing
    }
    return '';
  }
  return value;
};

export const CONFIG = {
    PORT: parseInt(getEnvVar('PORT', '8000'), 10),
    HOST: getEnvVar('HOST', '0.0.0.0'),
    GROQ_API_KEY: getEnvVar('GROQ_API_KEY', undefined, true), // Mark as critical
    MODEL_NAME: getEnvVar('MODEL_NAME', 'openai/gpt-oss-20b'),
    MAX_TOKENS: parseInt(getEnvVar('MAX_TOKENS', '1000'), 10),
    OPEN_AI_API_KEY: getEnvVar('OPEN_AI_API_KEY'), // Only needed when EMBEDDING_PROVIDER=openai
    NODE_ENV: nodeEnv,
};

export const analysisConfig: AnalysisConfig = buildAnalysisConfig({
    API_VERSION: getEnvVar('API_VERSION'),
    SESSION_TIMEOUT_SECONDS: getEnvVar('SESSION_TIMEOUT_SECONDS'),
    SESSION_SWEEP_INTERVAL_SECONDS: getEnvVar('SESSION_SWEEP_INTERVAL_SECONDS'),
    SLIDING_SESSION_EXPIRY: getEnvVar('SLIDING_SESSION_EXPIRY'),
    MAX_FILE_SIZE_BYTES: getEnvVar('MAX_FILE_SIZE_BYTES'),
    ALLOWED_FILE_TYPES: getEnvVar('ALLOWED_FILE_TYPES'),
    DEFAULT_CURRENCY: getEnvVar('DEFAULT_CURRENCY'),
    RETRIEVAL_TOP_K: getEnvVar('RETRIEVAL_TOP_K'),
    MIN_RELEVANCE_SCORE: getEnvVar('MIN_RELEVANCE_SCORE'),
    REASONING_TIMEOUT_MS: getEnvVar('REASONING_TIMEOUT_MS'),
    REASONING_RETRIES: getEnvVar('REASONING_RETRIES'),
    RETRY_BACKOFF_MS: getEnvVar('RETRY_BACKOFF_MS'),
    EMBEDDING_PROVIDER: getEnvVar('EMBEDDING_PROVIDER'),
    EMBEDDING_MODEL: getEnvVar('EMBEDDING_MODEL'),
    EMBEDDING_DIMENSIONS: getEnvVar('EMBEDDING_DIMENSIONS'),
    EMBEDDING_TIMEOUT_MS: getEnvVar('EMBEDDING_TIMEOUT_MS'),
});

if (analysisConfig.embedding.provider === 'openai' && !CONFIG.OPEN_AI_API_KEY) {
  throw new Error('[config/index.ts] EMBEDDING_PROVIDER=openai requires OPEN_AI_API_KEY to be set.');
}

export const providerCredentials: ProviderCredentials = {
    groqApiKey: CONFIG.GROQ_API_KEY,
    modelName: CONFIG.MODEL_NAME,
    maxTokens: CONFIG.MAX_TOKENS,
    openAiApiKey: CONFIG.OPEN_AI_API_KEY || undefined,
};

console.log(`[config/index.ts] Sessions expire after ${analysisConfig.session.timeoutMs / 1000}s; embeddings: ${analysisConfig.embedding.provider}.`);
