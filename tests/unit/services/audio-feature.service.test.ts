import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExternalServiceUnavailableError } from '../../../src/errors/interview-errors';
import { AudioFeatureService } from '../../../src/services/audio-feature.service';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

const { makeToneWav } = globalThis.testUtils;

const tone = (durationSec: number) => ({ durationSec, frequency: 200, amplitude: 0.5 });
const silence = (durationSec: number) => ({ durationSec, frequency: 0, amplitude: 0 });

describe('AudioFeatureService - Dependency Injection Tests', () => {
    const mockLogger = { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() };
    let service: AudioFeatureService;

    beforeEach(() => {
        vi.clearAllMocks();
        service = new AudioFeatureService(mockLogger);
    });

    it('should read a steady tone as fluent, confident speech', async () => {
        const features = await service.extract(makeToneWav([tone(1)]));

        expect(features.durationSec).toBe(1);
        expect(features.fluency).toBe(1);
        expect(features.pitch).toBeGreaterThan(180);
        expect(features.pitch).toBeLessThan(220);
        expect(features.emotionWeights.confident).toBeCloseTo(1 / 1.2, 5);
        expect(features.emotionWeights.neutral).toBeCloseTo(0.2 / 1.2, 5);
        expect(features.emotionWeights.nervous ?? 0).toBeCloseTo(0, 5);
        expect(mockLogger.debug).toHaveBeenCalledWith(
            { durationSec: 1, fluency: 1, pitch: features.pitch },
            'Audio features extracted'
        );
    });

    it('should count each long silence as a pause', async () => {
        const features = await service.extract(makeToneWav([tone(1.5), silence(0.5), tone(1.5), silence(0.5)]));

        expect(features.durationSec).toBe(4);
        expect(features.fluency).toBe(0.5);
    });

    it('should ignore gaps shorter than the minimum pause', async () => {
        const features = await service.extract(makeToneWav([tone(1), silence(0.2), tone(1)]));

        expect(features.fluency).toBe(1);
    });

    it('should read silence as nervous with no pitch', async () => {
        const features = await service.extract(makeToneWav([silence(1)]));

        expect(features.fluency).toBe(0);
        expect(features.pitch).toBe(0);
        expect(Object.keys(features.emotionWeights)).toEqual(['nervous', 'neutral']);
        expect(features.emotionWeights.nervous).toBeCloseTo(0.5 / 0.7, 10);
        expect(features.emotionWeights.neutral).toBeCloseTo(0.2 / 0.7, 10);
    });

    it('should return neutral defaults for an empty recording', async () => {
        await expect(service.extract(makeToneWav([]))).resolves.toEqual({
            fluency: 0,
            pitch: 0,
            emotionWeights: { neutral: 1 },
            durationSec: 0
        });
    });

    it('should report undecodable audio as unavailable', async () => {
        const error = await service.extract(Buffer.from('not a wav file')).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ExternalServiceUnavailableError);
        expect(error).toMatchObject({
            service: 'audio-features',
            message: 'audio-features unavailable: Audio is not a RIFF/WAVE file'
        });
    });
});
