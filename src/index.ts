// src/index.ts

import { analysisConfig, CONFIG, providerCredentials } from './config';
import { createApp } from './app';
import { createEmbedder } from './services/embedding/create-embedder';
import { InvoiceAnalysisService } from './services/invoice-analysis.service';
import { GroqReasoner } from './services/reasoning/groq-reasoner';
import { createServiceLogger } from './utils/logger';

const logger = createServiceLogger('invoice-analysis');

const service = new InvoiceAnalysisService({
    logger,
    config: analysisConfig,
    embedder: createEmbedder(analysisConfig.embedding, providerCredentials.openAiApiKey),
    reasoner: new GroqReasoner({
        logger: createServiceLogger('groq-reasoner'),
        apiKey: providerCredentials.groqApiKey,
        model: providerCredentials.modelName,
        maxTokens: providerCredentials.maxTokens,
    }),
});

const app = createApp({ service, config: analysisConfig, logger: createServiceLogger('http') });

service.start();
const server = app.listen(CONFIG.PORT, CONFIG.HOST, () => {
    logger.info('Server is listening', { host: CONFIG.HOST, port: CONFIG.PORT, env: CONFIG.NODE_ENV });
});

let shuttingDown = false;
const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal, activeSessions: service.activeSessionCount() });
    service.shutdown();
    server.close((error) => {
        if (error) {
            logger.error('Error while closing the HTTP server', { error: error.message });
            process.exit(1);
        }
        process.exit(0);
    });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
