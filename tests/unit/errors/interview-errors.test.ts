import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    AppError,
    ExternalServiceUnavailableError,
    InvalidStateTransitionError,
    SessionNotFoundError,
    ValidationError,
    errorMessage,
    normalizeError
} from '../../../src/errors/interview-errors';

describe('interview errors', () => {
    it('should carry codes and status codes', () => {
        expect(new SessionNotFoundError('s-9')).toMatchObject({
            message: 'Interview session not found: s-9',
            code: 'SESSION_NOT_FOUND',
            statusCode: 404
        });
        expect(new InvalidStateTransitionError('completed', 'pause')).toMatchObject({
            message: 'Cannot pause a session in state "completed"',
            code: 'INVALID_STATE_TRANSITION',
            statusCode: 409
        });
        expect(new ExternalServiceUnavailableError('transcription', 'timeout')).toMatchObject({
            message: 'transcription unavailable: timeout',
            statusCode: 503
        });
    });

    it('should serialize details only when present', () => {
        expect(new ValidationError('bad input').toJSON()).toEqual({
            error: 'bad input',
            code: 'VALIDATION_ERROR'
        });
        expect(new InvalidStateTransitionError('paused', 'submit an answer to').toJSON()).toEqual({
            error: 'Cannot submit an answer to a session in state "paused"',
            code: 'INVALID_STATE_TRANSITION',
            details: { currentState: 'paused', attempted: 'submit an answer to' }
        });
    });

    describe('normalizeError', () => {
        it('should return app errors unchanged', () => {
            const error = new SessionNotFoundError('s-1');

            expect(normalizeError(error)).toBe(error);
        });

        it('should turn zod errors into validation errors', () => {
            const result = z.object({ candidateId: z.string() }).safeParse({ candidateId: 7 });
            const normalized = result.success ? null : normalizeError(result.error);

            expect(normalized).toBeInstanceOf(ValidationError);
            expect(normalized?.toJSON()).toEqual({
                error: 'Validation failed',
                code: 'VALIDATION_ERROR',
                details: [{ path: 'candidateId', message: 'Expected string, received number' }]
            });
        });

        it('should wrap anything else as an internal error', () => {
            const normalized = normalizeError('disk full');

            expect(normalized).toBeInstanceOf(AppError);
            expect(normalized).toMatchObject({ message: 'disk full', code: 'INTERNAL_ERROR', statusCode: 500 });
        });
    });

    it('should read messages from any thrown value', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage(42)).toBe('42');
    });
});
