import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { PipelineError } from '../../domain/errors/PipelineErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Conflict error (409), e.g. downloading a job that has not finished.
 */
export class ConflictError extends AppError {
    constructor(message: string = 'Conflict') {
        super(409, message);
        this.name = 'ConflictError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

// Synchronous writing routes surface provider failures directly
const PIPELINE_STATUS: Record<PipelineError['kind'], number> = {
    InvalidInputError: 400,
    GenerationError: 502,
    TimeoutError: 504,
    AssemblyError: 500,
};

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const { statusCode, code } = describeError(err);

    if (statusCode < 500) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    const exposeMessage = statusCode < 500 || code !== 'INTERNAL_ERROR' || process.env.NODE_ENV !== 'production';
    const response: ErrorResponse = {
        error: {
            message: exposeMessage ? err.message : 'Internal server error',
            code,
        },
    };
    res.status(statusCode).json(response);
}

function describeError(err: Error): { statusCode: number; code: string } {
    if (err instanceof AppError) {
        return { statusCode: err.statusCode, code: err.name };
    }
    if (err instanceof PipelineError) {
        return { statusCode: PIPELINE_STATUS[err.kind], code: err.kind };
    }
    if (err instanceof multer.MulterError) {
        return err.code === 'LIMIT_FILE_SIZE'
            ? { statusCode: 413, code: 'PayloadTooLarge' }
            : { statusCode: 400, code: 'BadRequestError' };
    }
    if (err instanceof SyntaxError && 'body' in err) {
        // express.json() rejected the body
        return { statusCode: 400, code: 'BadRequestError' };
    }
    return { statusCode: 500, code: 'INTERNAL_ERROR' };
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
