// src/middleware/error-handler.ts

import { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { Logger } from '../services/base/types';
import { AnalysisError, AnalysisErrorCode } from '../services/errors';

interface ErrorBody {
    error: string;
    code: AnalysisErrorCode;
}

const BODY_PARSER_MESSAGES: Record<string, string> = {
    'entity.parse.failed': 'Request body is not valid JSON',
    'entity.too.large': 'Request body is too large',
};

function bodyParserMessage(error: unknown): string | undefined {
    if (error instanceof Error && 'type' in error && typeof error.type === 'string') {
        return BODY_PARSER_MESSAGES[error.type];
    }
    return undefined;
}

export function formatZodError(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/** Maps every error that reaches Express to `{ error, code }` with a matching status. */
export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
    if (error instanceof AnalysisError) {
        return { status: error.httpStatus, body: { error: error.message, code: error.code } };
    }
    if (error instanceof ZodError) {
        return { status: 400, body: { error: formatZodError(error), code: 'VALIDATION_ERROR' } };
    }
    if (error instanceof MulterError) {
        const field = error.field ? ` (${error.field})` : '';
        return { status: 400, body: { error: `Upload rejected: ${error.message}${field}`, code: 'VALIDATION_ERROR' } };
    }
    const parserMessage = bodyParserMessage(error);
    if (parserMessage) {
        return { status: 400, body: { error: parserMessage, code: 'VALIDATION_ERROR' } };
    }
    return { status: 500, body: { error: 'Internal server error', code: 'INTERNAL_ERROR' } };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const { status, body } = toErrorResponse(error);
        if (status >= 500) {
            logger.error('Request failed', {
                method: req.method,
                path: req.originalUrl,
                code: body.code,
                error: error instanceof Error ? error.stack ?? error.message : String(error),
            });
        } else {
            logger.warn('Request rejected', { method: req.method, path: req.originalUrl, status, code: body.code });
        }
        res.status(status).json(body);
    };
}
