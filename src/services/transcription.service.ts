import { logger, ILogger } from '../config/logger';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { ITranscriber } from '../types/collaborators';
import { IOpenAIService, getOpenAIService } from './openai.service';

export class TranscriptionService implements ITranscriber {
    constructor(
        private openaiService: IOpenAIService,
        private logger: ILogger
    ) { }

    static create(): TranscriptionService {
        return new TranscriptionService(getOpenAIService(), logger);
    }

    /**
     * Transcribe a WAV answer. An empty string is a valid result (silence).
     */
    async transcribe(audio: Buffer): Promise<string> {
        if (audio.length === 0) {
            return '';
        }

        try {
            const transcript = await this.openaiService.transcribeAudio(audio, 'answer.wav');
            this.logger.debug({ bytes: audio.length, characters: transcript.length }, 'Audio transcribed');
            return transcript;
        } catch (error) {
            if (error instanceof ExternalServiceUnavailableError) {
                throw error;
            }
            throw new ExternalServiceUnavailableError('transcription', errorMessage(error));
        }
    }
}

let transcriptionService: TranscriptionService | null = null;

export function getTranscriptionService(): TranscriptionService {
    if (!transcriptionService) {
        transcriptionService = TranscriptionService.create();
    }
    return transcriptionService;
}
