// src/services/embedding/create-embedder.ts

import { AnalysisConfig } from '../../config/analysis';
import { Embedder } from './embedder.types';
import { LocalHashingEmbedder } from './local-embedder';
import { OpenAIEmbedder } from './openai-embedder';

export function createEmbedder(settings: AnalysisConfig['embedding'], openAiApiKey?: string): Embedder {
    switch (settings.provider) {
        case 'openai':
            return new OpenAIEmbedder({
                apiKey: openAiApiKey ?? '',
                model: settings.model,
                batchSize: settings.batchSize,
            });
        case 'local':
        default:
            return new LocalHashingEmbedder(settings.dimensions);
    }
}
