import { ZodError } from 'zod';

/**
 * Error Types
 *
 * Every error the engine raises on purpose extends AppError, so the HTTP
 * layer and the queue worker can map it to a status code without string
 * matching.
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number = 500,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'AppError';
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON() {
        return {
            error: this.message,
            code: this.code,
            ...(this.details !== undefined && { details: this.details })
        };
    }
}

export class InvalidStateTransitionError extends AppError {
    constructor(
        public readonly currentState: string,
        public readonly attempted: string
    ) {
        super(
            `Cannot ${attempted} a session in state "${currentState}"`,
            'INVALID_STATE_TRANSITION',
            409,
            { currentState, attempted }
        );
        this.name = 'InvalidStateTransitionError';
    }
}

export class ExternalServiceUnavailableError extends AppError {
    constructor(
        public readonly service: string,
        message: string
    ) {
        super(`${service} unavailable: ${message}`, 'EXTERNAL_SERVICE_UNAVAILABLE', 503, { service });
        this.name = 'ExternalServiceUnavailableError';
    }
}

export class SessionNotFoundError extends AppError {
    constructor(public readonly sessionId: string) {
        super(`Interview session not found: ${sessionId}`, 'SESSION_NOT_FOUND', 404);
        this.name = 'SessionNotFoundError';
    }
}

export class ValidationError extends AppError {
    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400, details);
        this.name = 'ValidationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Convert anything thrown into an AppError
 */
export function normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
        return error;
    }

    if (error instanceof ZodError) {
        const details = error.errors.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        return new ValidationError('Validation failed', details);
    }

    return new AppError(errorMessage(error), 'INTERNAL_ERROR', 500);
}
