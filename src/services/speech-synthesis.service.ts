import { logger, ILogger } from '../config/logger';
import { ExternalServiceUnavailableError, ValidationError, errorMessage } from '../errors/interview-errors';
import { ISpeechSynthesizer } from '../types/collaborators';
import { IOpenAIService, getOpenAIService } from './openai.service';

// OpenAI's speech endpoint rejects longer inputs
const MAX_INPUT_CHARACTERS = 4096;

export class SpeechSynthesisService implements ISpeechSynthesizer {
    constructor(
        private openaiService: IOpenAIService,
        private logger: ILogger
    ) { }

    static create(): SpeechSynthesisService {
        return new SpeechSynthesisService(getOpenAIService(), logger);
    }

    /**
     * Render question text as MP3 audio
     */
    async synthesize(text: string): Promise<Buffer> {
        const input = text.trim();
        if (input.length === 0) {
            throw new ValidationError('Cannot synthesize empty text');
        }
        if (input.length > MAX_INPUT_CHARACTERS) {
            throw new ValidationError(`Text exceeds ${MAX_INPUT_CHARACTERS} characters`);
        }

        try {
            const audio = await this.openaiService.synthesizeSpeech(input);
            this.logger.debug({ characters: input.length, bytes: audio.length }, 'Speech synthesized');
            return audio;
        } catch (error) {
            if (error instanceof ExternalServiceUnavailableError) {
                throw error;
            }
            throw new ExternalServiceUnavailableError('speech-synthesis', errorMessage(error));
        }
    }
}

let speechSynthesisService: SpeechSynthesisService | null = null;

export function getSpeechSynthesisService(): SpeechSynthesisService {
    if (!speechSynthesisService) {
        speechSynthesisService = SpeechSynthesisService.create();
    }
    return speechSynthesisService;
}
