import { describe, it, expect } from 'vitest';
import { TimeoutError, withTimeout } from '../../../src/utils/timeout.util';

describe('withTimeout', () => {
    it('should resolve with the operation result when it finishes in time', async () => {
        await expect(withTimeout(async () => 'ok', 1000)).resolves.toBe('ok');
    });

    it('should reject with TimeoutError when the operation is too slow', async () => {
        const pending = withTimeout(() => new Promise<string>(() => undefined), 10, 'transcription timed out');

        await expect(pending).rejects.toBeInstanceOf(TimeoutError);
        await expect(pending).rejects.toThrow('transcription timed out');
    });

    it('should pass through operation errors', async () => {
        await expect(withTimeout(async () => {
            throw new Error('upstream failed');
        }, 1000)).rejects.toThrow('upstream failed');
    });
});
