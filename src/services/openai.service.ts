import OpenAI, { toFile } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export type SpeechVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

export type AudioUpload = Awaited<ReturnType<typeof toFile>>;

// Interfaces for better testability
export interface IOpenAIClient {
    chat: {
        completions: {
            create: (params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }) => Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
    audio: {
        transcriptions: {
            create: (params: { model: string; file: AudioUpload }) => Promise<{ text: string }>;
        };
        speech: {
            create: (params: { model: string; voice: SpeechVoice; input: string }) => Promise<{
                arrayBuffer(): Promise<ArrayBuffer>;
            }>;
        };
    };
}

export interface CompletionOptions {
    temperature?: number;
    max_tokens?: number;
    response_format?: { type: 'json_object' };
    maxAttempts?: number;
}

export interface IOpenAIService {
    generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
    generateStructuredCompletion<T>(
        messages: ChatMessage[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options?: CompletionOptions
    ): Promise<T>;
    transcribeAudio(audio: Buffer, filename?: string): Promise<string>;
    synthesizeSpeech(text: string): Promise<Buffer>;
    testConnection(): Promise<boolean>;
}

export interface OpenAIModels {
    llmModel: string;
    temperature: number;
    transcriptionModel: string;
    ttsModel: string;
    ttsVoice: SpeechVoice;
}

const DEFAULT_MODELS: OpenAIModels = {
    llmModel: 'gpt-4o-mini',
    temperature: 0.3,
    transcriptionModel: 'whisper-1',
    ttsModel: 'tts-1',
    ttsVoice: 'alloy'
};

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

/**
 * Narrow the SDK client to the calls this service makes
 */
export function adaptOpenAIClient(client: OpenAI): IOpenAIClient {
    return {
        chat: {
            completions: {
                create: params => client.chat.completions.create({
                    model: params.model,
                    messages: params.messages.map(toMessageParam),
                    temperature: params.temperature,
                    max_tokens: params.max_tokens,
                    response_format: params.response_format,
                    stream: false
                })
            }
        },
        audio: {
            transcriptions: {
                create: params => client.audio.transcriptions.create({ model: params.model, file: params.file })
            },
            speech: {
                create: params => client.audio.speech.create({
                    model: params.model,
                    voice: params.voice,
                    input: params.input,
                    response_format: 'mp3'
                })
            }
        }
    };
}

/**
 * Strip a markdown code fence some models wrap JSON in, even in JSON mode
 */
export function stripCodeFence(content: string): string {
    const trimmed = content.trim();
    const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
    return fenced ? fenced[1] : trimmed;
}

/**
 * OpenAI Service with Dependency Injection
 *
 * Handles OpenAI API calls for chat completions, transcription and speech.
 * Failures surface as ExternalServiceUnavailableError('openai').
 */
export class OpenAIService implements IOpenAIService {
    private readonly models: OpenAIModels;

    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        models: Partial<OpenAIModels> = {}
    ) {
        this.models = { ...DEFAULT_MODELS, ...models };
    }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const settings = getSettings();
        const client = new OpenAI({
            apiKey: settings.OPENAI_API_KEY
        });

        return new OpenAIService(
            adaptOpenAIClient(client),
            RetryUtil,
            logger,
            {
                llmModel: settings.LLM_MODEL,
                temperature: settings.LLM_TEMPERATURE,
                transcriptionModel: settings.TRANSCRIPTION_MODEL,
                ttsModel: settings.TTS_MODEL,
                ttsVoice: settings.TTS_VOICE
            }
        );
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        const temperature = options.temperature ?? this.models.temperature;

        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.info({
                    messagesCount: messages.length,
                    model: this.models.llmModel,
                    temperature
                }, 'Generating OpenAI completion');

                let response;
                try {
                    response = await this.client.chat.completions.create({
                        model: this.models.llmModel,
                        messages,
                        temperature,
                        max_tokens: options.max_tokens ?? 2000,
                        response_format: options.response_format
                    });
                } catch (error) {
                    throw new ExternalServiceUnavailableError('openai', errorMessage(error));
                }

                const content = response.choices[0]?.message.content;
                if (!content) {
                    throw new ExternalServiceUnavailableError('openai', 'no content returned');
                }

                this.logger.info({
                    tokensUsed: response.usage?.total_tokens ?? 0,
                    contentLength: content.length
                }, 'OpenAI completion generated successfully');

                return content;
            },
            {
                maxAttempts: options.maxAttempts ?? 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI completion generation'
            }
        );
    }

    /**
     * Generate structured JSON completion validated against a zod schema
     */
    async generateStructuredCompletion<T>(
        messages: ChatMessage[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options: CompletionOptions = {}
    ): Promise<T> {
        const content = await this.generateCompletion(messages, {
            ...options,
            response_format: { type: 'json_object' }
        });

        let parsed: unknown;
        try {
            parsed = JSON.parse(stripCodeFence(content));
        } catch (error) {
            this.logger.error({ error: errorMessage(error), contentLength: content.length }, 'Structured completion is not valid JSON');
            throw new ExternalServiceUnavailableError('openai', `invalid JSON in structured completion: ${errorMessage(error)}`);
        }

        const result = schema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            this.logger.error({ issues }, 'Structured completion failed schema validation');
            throw new ExternalServiceUnavailableError('openai', `structured completion did not match schema: ${issues.join('; ')}`);
        }

        return result.data;
    }

    /**
     * Transcribe an audio file
     */
    async transcribeAudio(audio: Buffer, filename: string = 'answer.wav'): Promise<string> {
        this.logger.info({
            bytes: audio.length,
            model: this.models.transcriptionModel
        }, 'Transcribing audio');

        try {
            const file = await toFile(audio, filename);
            const response = await this.client.audio.transcriptions.create({
                model: this.models.transcriptionModel,
                file
            });
            return response.text.trim();
        } catch (error) {
            throw new ExternalServiceUnavailableError('transcription', errorMessage(error));
        }
    }

    /**
     * Synthesize speech as MP3
     */
    async synthesizeSpeech(text: string): Promise<Buffer> {
        this.logger.info({
            characters: text.length,
            model: this.models.ttsModel,
            voice: this.models.ttsVoice
        }, 'Synthesizing speech');

        try {
            const response = await this.client.audio.speech.create({
                model: this.models.ttsModel,
                voice: this.models.ttsVoice,
                input: text
            });
            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            throw new ExternalServiceUnavailableError('speech-synthesis', errorMessage(error));
        }
    }

    /**
     * Test OpenAI connection
     */
    async testConnection(): Promise<boolean> {
        try {
            await this.generateCompletion([{ role: 'user', content: 'ping' }], { max_tokens: 1, maxAttempts: 1 });
            this.logger.info({}, 'OpenAI connection test successful');
            return true;
        } catch (error) {
            this.logger.error({ error: errorMessage(error) }, 'OpenAI connection test failed');
            return false;
        }
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
