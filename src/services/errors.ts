// src/services/errors.ts

export type AnalysisErrorCode =
    | 'VALIDATION_ERROR'
    | 'INDEX_BUILD_ERROR'
    | 'SESSION_NOT_FOUND'
    | 'SESSION_EXPIRED'
    | 'REASONING_ERROR'
    | 'INTERNAL_ERROR';

/**
 * Base class of every error the analysis core raises on purpose. The HTTP
 * layer maps `httpStatus` and `code` straight into the response.
 */
export abstract class AnalysisError extends Error {
    abstract readonly code: AnalysisErrorCode;
    abstract readonly httpStatus: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Bad upload content, format or size, or an invalid request body. */
export class ValidationError extends AnalysisError {
    readonly code = 'VALIDATION_ERROR';
    readonly httpStatus = 400;

    constructor(message: string, public readonly filename?: string) {
        super(filename ? `${filename}: ${message}` : message);
    }
}

export class IndexBuildError extends AnalysisError {
    readonly code = 'INDEX_BUILD_ERROR';
    readonly httpStatus = 502;
}

export class SessionNotFoundError extends AnalysisError {
    readonly code = 'SESSION_NOT_FOUND';
    readonly httpStatus = 404;

    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} not found`);
    }
}

export class SessionExpiredError extends AnalysisError {
    readonly code = 'SESSION_EXPIRED';
    readonly httpStatus = 410;

    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} has expired. Upload the files again to start a new session.`);
    }
}

export class ReasoningError extends AnalysisError {
    readonly code = 'REASONING_ERROR';
    readonly httpStatus = 503;
}

/** Corrupted state that should never happen; surfaces as a 500. */
export class InternalInvariantError extends AnalysisError {
    readonly code = 'INTERNAL_ERROR';
    readonly httpStatus = 500;
}
