import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadSettings } from '../../../src/config/settings';

describe('loadSettings', () => {
    it('should fill in defaults for an empty environment', () => {
        const settings = loadSettings({});

        expect(settings).toMatchObject({
            NODE_ENV: 'development',
            PORT: 3000,
            LOG_LEVEL: 'info',
            LLM_MODEL: 'gpt-4o-mini',
            LLM_TEMPERATURE: 0.3,
            TTS_VOICE: 'alloy',
            MAX_QUESTIONS: 20,
            SCORING_TIMEOUT_MS: 30000,
            RESPONSE_MAX_ATTEMPTS: 3,
            SAMPLE_RATE: 16000,
            RECORDING_TIMEOUT_SEC: 120,
            STORAGE_DIR: './storage'
        });
    });

    it('should coerce numeric variables', () => {
        const settings = loadSettings({ PORT: '8080', LLM_TEMPERATURE: '0.7', MAX_QUESTIONS: '12' });

        expect(settings.PORT).toBe(8080);
        expect(settings.LLM_TEMPERATURE).toBe(0.7);
        expect(settings.MAX_QUESTIONS).toBe(12);
    });

    it('should name every invalid variable', () => {
        let caught: unknown;
        try {
            loadSettings({ TTS_VOICE: 'robot', SCORING_TIMEOUT_MS: '-5' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ZodError);
        const paths = caught instanceof ZodError ? caught.errors.map(issue => issue.path.join('.')) : [];
        expect(paths).toEqual(['TTS_VOICE', 'SCORING_TIMEOUT_MS']);
    });
});
