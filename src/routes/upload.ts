// src/routes/upload.ts

import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { AnalysisConfig } from '../config/analysis';
import { UploadResult } from '../models/answer.model';
import { UploadedFile } from '../models/invoice.model';
import { InvoiceAnalysisService } from '../services/invoice-analysis.service';

const optionalSessionId = z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined);

const uploadFieldsSchema = z.object({ session_id: optionalSessionId });

const jsonUploadSchema = z.object({
    data: z.unknown().refine((value) => value !== undefined, 'data is required'),
    filename: z.string().trim().min(1).optional(),
    session_id: optionalSessionId,
});

export function toUploadResponse(result: UploadResult) {
    const files = `${result.filesProcessed} file${result.filesProcessed === 1 ? '' : 's'}`;
    return {
        session_id: result.sessionId,
        message: `Processed ${files} and indexed ${result.recordsIndexed} invoice records.`,
        files_processed: result.filesProcessed,
        records_indexed: result.recordsIndexed,
        dropped_records: result.droppedRecords,
        warnings: result.warnings,
    };
}

/** Aborts when the client goes away before the response is written. */
export function abortOnClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) controller.abort();
    });
    return controller.signal;
}

export function createUploadRouter(service: InvoiceAnalysisService, config: AnalysisConfig): express.Router {
    const router = express.Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: config.upload.maxFileSizeBytes },
    });

    router.post('/files', upload.array('files'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { session_id: sessionId } = uploadFieldsSchema.parse(req.body ?? {});
            const received = Array.isArray(req.files) ? req.files : [];
            const files: UploadedFile[] = received.map((file) => ({
                filename: file.originalname,
                content: file.buffer,
                contentType: file.mimetype,
            }));

            const result = await service.upload(files, { sessionId, signal: abortOnClose(res) });
            res.json(toUploadResponse(result));
        } catch (error) {
            next(error);
        }
    });

    router.post('/json', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = jsonUploadSchema.parse(req.body ?? {});
            const file: UploadedFile = {
                filename: body.filename ?? 'upload.json',
                content: Buffer.from(JSON.stringify(body.data), 'utf8'),
                contentType: 'application/json',
            };

            const result = await service.upload([file], { sessionId: body.session_id, signal: abortOnClose(res) });
            res.json(toUploadResponse(result));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
