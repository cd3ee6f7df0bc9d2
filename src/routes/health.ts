// src/routes/health.ts

import express, { NextFunction, Request, Response } from 'express';
import { SessionNotFoundError } from '../services/errors';
import { InvoiceAnalysisService } from '../services/invoice-analysis.service';

export function createHealthRouter(service: InvoiceAnalysisService): express.Router {
    const router = express.Router();

    router.get('/health', (_req: Request, res: Response) => {
        const health = service.health();
        res.json({
            status: health.status,
            version: health.version,
            active_sessions: health.activeSessions,
            embedder: health.embedder,
            reasoner: health.reasoner,
        });
    });

    router.get('/sessions/count', (_req: Request, res: Response) => {
        res.json({ active_sessions: service.activeSessionCount() });
    });

    router.delete('/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
        const { sessionId } = req.params;
        if (!service.deleteSession(sessionId)) {
            next(new SessionNotFoundError(sessionId));
            return;
        }
        res.json({ deleted: true, session_id: sessionId });
    });

    return router;
}
