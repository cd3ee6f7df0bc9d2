// src/app.ts

import cors from 'cors';
import express from 'express';
import { AnalysisConfig } from './config/analysis';
import { errorHandler } from './middleware/error-handler';
import { createAnalyzeRouter } from './routes/analyze';
import { createHealthRouter } from './routes/health';
import { createUploadRouter } from './routes/upload';
import { Logger } from './services/base/types';
import { InvoiceAnalysisService } from './services/invoice-analysis.service';

export interface AppDependencies {
    service: InvoiceAnalysisService;
    config: AnalysisConfig;
    logger: Logger;
}

export const API_PREFIX = '/api/v1';

export function createApp({ service, config, logger }: AppDependencies): express.Express {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: config.upload.maxFileSizeBytes }));
    app.use(express.urlencoded({ extended: true }));

    app.get('/', (_req, res) => {
        res.json({
            service: 'Invoice Analysis API',
            version: config.version,
            endpoints: {
                uploadFiles: `POST ${API_PREFIX}/upload/files`,
                uploadJson: `POST ${API_PREFIX}/upload/json`,
                analyze: `POST ${API_PREFIX}/analyze`,
                health: `GET ${API_PREFIX}/health`,
                sessionCount: `GET ${API_PREFIX}/sessions/count`,
                deleteSession: `DELETE ${API_PREFIX}/sessions/:sessionId`,
            },
        });
    });

    app.use(`${API_PREFIX}/upload`, createUploadRouter(service, config));
    app.use(`${API_PREFIX}/analyze`, createAnalyzeRouter(service));
    app.use(API_PREFIX, createHealthRouter(service));

    app.use(errorHandler(logger));
    return app;
}
