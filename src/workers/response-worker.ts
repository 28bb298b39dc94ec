import { DelayedError, Job, UnrecoverableError } from 'bullmq';
import { promises as fsPromises } from 'fs';
import { logger, ILogger } from '../config/logger';
import {
    InvalidStateTransitionError,
    SessionNotFoundError,
    ValidationError,
    errorMessage
} from '../errors/interview-errors';
import { ResponseJobData, ResponseJobResult } from '../queue/queue-config';
import { SessionStatus } from '../types/interview';
import { InterviewOrchestrator, getInterviewOrchestrator } from '../services/interview-orchestrator.service';

// Interfaces for better testability
export interface IFileSystem {
    readFile(path: string): Promise<Buffer>;
    unlink(path: string): Promise<void>;
}

export type ResponseProcessor = Pick<InterviewOrchestrator, 'processResponse'>;

/** The parts of a BullMQ job the worker uses */
export type ResponseJob = Pick<Job<ResponseJobData, ResponseJobResult>, 'id' | 'data' | 'attemptsMade' | 'moveToDelayed'>;

// How long an answer for a paused session waits before it is tried again
const PAUSED_SESSION_DELAY_MS = 30000;

const nodeFileSystem: IFileSystem = {
    readFile: path => fsPromises.readFile(path),
    unlink: path => fsPromises.unlink(path)
};

/**
 * Response Worker with Dependency Injection
 *
 * Scores an uploaded answer through the orchestrator. The audio file is
 * removed once the answer is recorded, or once the session has moved past
 * the question. An answer for a paused session is delayed until the session
 * resumes; any other failure keeps the file so BullMQ can retry.
 */
export class ResponseWorker {
    constructor(
        private orchestrator: ResponseProcessor,
        private logger: ILogger,
        private fileSystem: IFileSystem = nodeFileSystem
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ResponseWorker {
        return new ResponseWorker(getInterviewOrchestrator(), logger);
    }

    async processResponse(job: ResponseJob, token?: string): Promise<ResponseJobResult> {
        const { sessionId, questionId, audioPath } = job.data;

        this.logger.info({
            sessionId,
            questionId,
            workerJobId: job.id,
            attempt: job.attemptsMade + 1
        }, 'Starting response processing');

        const audio = await this.fileSystem.readFile(audioPath);

        try {
            const result = await this.orchestrator.processResponse(sessionId, questionId, audio);
            await this.removeAudio(audioPath);

            return {
                sessionId,
                questionId,
                recorded: true,
                status: result.status,
                technical: result.answer.technical,
                stop: result.decision.stop
            };
        } catch (error) {
            if (error instanceof InvalidStateTransitionError && error.currentState === SessionStatus.Paused) {
                this.logger.info({
                    sessionId,
                    questionId,
                    delayMs: PAUSED_SESSION_DELAY_MS
                }, 'Session is paused, delaying response');
                if (!token) {
                    // without a lock token the job cannot be moved; a plain retry keeps the audio
                    throw error;
                }
                // moving to delayed does not use up an attempt
                await job.moveToDelayed(Date.now() + PAUSED_SESSION_DELAY_MS, token);
                throw new DelayedError();
            }

            if (error instanceof InvalidStateTransitionError || error instanceof ValidationError) {
                // the session finished or the question was already answered; a retry cannot help
                this.logger.warn({
                    sessionId,
                    questionId,
                    error: errorMessage(error)
                }, 'Response no longer applies to the session, discarding');
                await this.removeAudio(audioPath);
                return { sessionId, questionId, recorded: false };
            }

            if (error instanceof SessionNotFoundError) {
                await this.removeAudio(audioPath);
                throw new UnrecoverableError(error.message);
            }

            this.logger.error({
                sessionId,
                questionId,
                error: errorMessage(error)
            }, 'Response processing failed');
            throw error;
        }
    }

    private async removeAudio(audioPath: string): Promise<void> {
        try {
            await this.fileSystem.unlink(audioPath);
        } catch (error) {
            this.logger.warn({ audioPath, error: errorMessage(error) }, 'Could not remove processed audio file');
        }
    }
}

// Export worker function for BullMQ
export async function responseAnalysisProcessor(
    job: Job<ResponseJobData, ResponseJobResult>,
    token?: string
): Promise<ResponseJobResult> {
    const worker = ResponseWorker.create();
    return await worker.processResponse(job, token);
}
