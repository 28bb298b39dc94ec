import { config } from 'dotenv';
import { z } from 'zod';

config();

const settingsSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    DATABASE_URL: z.string().default('postgres://localhost:5432/interviews'),
    REDIS_URL: z.string().default('redis://localhost:6379'),

    OPENAI_API_KEY: z.string().default(''),
    LLM_MODEL: z.string().default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    TRANSCRIPTION_MODEL: z.string().default('whisper-1'),
    TTS_MODEL: z.string().default('tts-1'),
    TTS_VOICE: z.enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']).default('alloy'),

    MAX_QUESTIONS: z.coerce.number().int().positive().default(20),
    SCORING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    RESPONSE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    RESPONSE_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(4),

    SAMPLE_RATE: z.coerce.number().int().positive().default(16000),
    RECORDING_TIMEOUT_SEC: z.coerce.number().int().positive().default(120),
    STORAGE_DIR: z.string().default('./storage')
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Parse settings from an environment map
 *
 * Throws a ZodError naming every invalid key, so a bad deployment fails at boot.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    return settingsSchema.parse(env);
}

let settings: Settings | null = null;

export function getSettings(): Settings {
    if (!settings) {
        settings = loadSettings();
    }
    return settings;
}
