import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError } from '../../../src/errors/interview-errors';
import { SpeechSynthesisService } from '../../../src/services/speech-synthesis.service';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

describe('SpeechSynthesisService - Dependency Injection Tests', () => {
    const mockOpenAI = {
        generateCompletion: vi.fn(),
        generateStructuredCompletion: vi.fn(),
        transcribeAudio: vi.fn(),
        synthesizeSpeech: vi.fn(),
        testConnection: vi.fn()
    };
    const mockLogger = { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() };
    let service: SpeechSynthesisService;

    beforeEach(() => {
        vi.clearAllMocks();
        service = new SpeechSynthesisService(mockOpenAI, mockLogger);
    });

    it('should synthesize trimmed question text', async () => {
        mockOpenAI.synthesizeSpeech.mockResolvedValue(Buffer.from('mp3-bytes'));

        const audio = await service.synthesize('  Tell me about yourself.  ');

        expect(audio.toString()).toBe('mp3-bytes');
        expect(mockOpenAI.synthesizeSpeech).toHaveBeenCalledWith('Tell me about yourself.');
    });

    it('should reject empty text', async () => {
        await expect(service.synthesize('   ')).rejects.toBeInstanceOf(ValidationError);
        expect(mockOpenAI.synthesizeSpeech).not.toHaveBeenCalled();
    });

    it('should reject text over the input limit', async () => {
        await expect(service.synthesize('a'.repeat(4097))).rejects.toThrow('Text exceeds 4096 characters');
    });

    it('should wrap provider errors', async () => {
        mockOpenAI.synthesizeSpeech.mockRejectedValue(new Error('voice not found'));

        await expect(service.synthesize('Hello')).rejects.toThrow('speech-synthesis unavailable: voice not found');
    });
});
