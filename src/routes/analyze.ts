// src/routes/analyze.ts

import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { AnswerResult } from '../models/answer.model';
import { InvoiceAnalysisService } from '../services/invoice-analysis.service';
import { abortOnClose } from './upload';

const analyzeSchema = z.object({
    session_id: z.string().trim().min(1, 'session_id is required'),
    question: z.string().trim().min(1, 'question must not be empty'),
});

export function toAnalyzeResponse(result: AnswerResult) {
    return {
        answer: result.answer,
        ...(result.table ? { table: result.table } : {}),
        ...(result.graph ? { graph: result.graph, graph_format: result.graphFormat } : {}),
        session_id: result.sessionId,
    };
}

export function createAnalyzeRouter(service: InvoiceAnalysisService): express.Router {
    const router = express.Router();

    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { session_id: sessionId, question } = analyzeSchema.parse(req.body ?? {});
            const result = await service.analyze(sessionId, question, { signal: abortOnClose(res) });
            res.json(toAnalyzeResponse(result));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
