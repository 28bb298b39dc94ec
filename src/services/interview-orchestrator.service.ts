import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import { getSettings } from '../config/settings';
import {
    InvalidStateTransitionError,
    ValidationError,
    errorMessage,
    normalizeError
} from '../errors/interview-errors';
import {
    IAudioFeatureExtractor,
    ILanguageAnalyzer,
    IQuestionGenerator,
    ISessionStore,
    ISpeechSynthesizer,
    ITranscriber,
    JobRequirements
} from '../types/collaborators';
import {
    Answer,
    Difficulty,
    InterviewSession,
    PerformanceMetrics,
    Question,
    ScoreSource,
    SessionStatus,
    StopReason,
    SessionAnalysis,
    TerminationDecision
} from '../types/interview';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { withTimeout } from '../utils/timeout.util';
import { getAudioFeatureService } from './audio-feature.service';
import { BanditSelector } from './bandit-selector.service';
import { PerformanceSummarizer } from './performance-summarizer.service';
import { getQuestionGeneratorService } from './question-generator.service';
import { DEFAULT_QUESTION_BANK } from './question-templates';
import { ScoreAggregator } from './score-aggregator.service';
import { SessionController, isFinished, pendingQuestion } from './session-controller.service';
import { SessionStore } from './session-store.service';
import { getSpeechSynthesisService } from './speech-synthesis.service';
import { TerminationPolicy } from './termination-policy.service';
import { getTextAnalysisService } from './text-analysis.service';
import { getTranscriptionService } from './transcription.service';

export const createSessionSchema = z.object({
    candidateId: z.string().trim().min(1),
    jobTitle: z.string().trim().min(1),
    jobDescription: z.string().trim().min(1),
    keySkills: z.array(z.string().trim().min(1)).optional(),
    experienceLevel: z.nativeEnum(Difficulty).optional()
});

export const DEFAULT_JOB_REQUIREMENTS: JobRequirements = Object.freeze({
    keySkills: ['programming', 'problem-solving'],
    experienceLevel: Difficulty.Intermediate
});

export interface Collaborators {
    transcriber: ITranscriber;
    audioFeatures: IAudioFeatureExtractor;
    languageAnalyzer: ILanguageAnalyzer;
    questionGenerator: IQuestionGenerator;
    store: ISessionStore;
    speech: ISpeechSynthesizer;
}

export interface Engine {
    controller: SessionController;
    selector: BanditSelector;
    aggregator: ScoreAggregator;
    policy: TerminationPolicy;
    summarizer: PerformanceSummarizer;
}

export interface OrchestratorOptions {
    scoringTimeoutMs?: number;
    /** Attempts per external scoring call, first try included */
    scoringAttempts?: number;
    retryBaseDelayMs?: number;
}

export type NextQuestionResult =
    | { done: false; question: Question }
    | { done: true; reason: StopReason | null; metrics: PerformanceMetrics | null };

interface ScoredResponse {
    session: InterviewSession;
    answer: Answer;
    decision: TerminationDecision;
}

export interface ResponseResult {
    answer: Answer;
    decision: TerminationDecision;
    status: SessionStatus;
}

/**
 * Interview Orchestrator
 *
 * Runs the ask, answer, score, select loop on top of the SessionController
 * and owns every call to the outside world: question generation,
 * transcription, scoring, speech and persistence. The controller's lock only
 * covers in-memory transitions; the slow calls happen here, outside it.
 */
export class InterviewOrchestrator {
    private readonly scoringTimeoutMs: number;
    private readonly scoringAttempts: number;
    private readonly retryBaseDelayMs: number;

    private inFlight = new Map<string, Promise<ScoredResponse>>();
    private persistLocks = new KeyedMutex();
    private questionLocks = new KeyedMutex();

    constructor(
        private engine: Engine,
        private collaborators: Collaborators,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        options: OrchestratorOptions = {}
    ) {
        this.scoringTimeoutMs = options.scoringTimeoutMs ?? 30000;
        this.scoringAttempts = options.scoringAttempts ?? 2;
        this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    }

    /**
     * Factory method for production use
     */
    static create(): InterviewOrchestrator {
        const settings = getSettings();
        const selector = BanditSelector.create();

        return new InterviewOrchestrator(
            {
                controller: SessionController.create(selector),
                selector,
                aggregator: new ScoreAggregator(),
                policy: TerminationPolicy.create(),
                summarizer: new PerformanceSummarizer()
            },
            {
                transcriber: getTranscriptionService(),
                audioFeatures: getAudioFeatureService(),
                languageAnalyzer: getTextAnalysisService(),
                questionGenerator: getQuestionGeneratorService(),
                store: SessionStore.create(),
                speech: getSpeechSynthesisService()
            },
            RetryUtil,
            logger,
            { scoringTimeoutMs: settings.SCORING_TIMEOUT_MS }
        );
    }

    /**
     * Validate the job context, derive missing requirements, build the
     * question pool and persist a new session
     */
    async createSession(input: unknown): Promise<InterviewSession> {
        const parsed = createSessionSchema.safeParse(input);
        if (!parsed.success) {
            throw normalizeError(parsed.error);
        }
        const { candidateId, jobTitle, jobDescription, keySkills, experienceLevel } = parsed.data;

        const requirements = keySkills && experienceLevel
            ? { keySkills, experienceLevel }
            : await this.analyzeJob(jobTitle, jobDescription);

        const session = this.engine.controller.create({
            candidateId,
            jobContext: {
                title: jobTitle,
                description: jobDescription,
                keySkills: keySkills ?? requirements.keySkills,
                experienceLevel: experienceLevel ?? requirements.experienceLevel
            },
            questionPool: await this.buildPool(jobTitle, jobDescription)
        });

        await this.persist(session.id);
        return this.engine.controller.get(session.id);
    }

    async startSession(sessionId: string): Promise<InterviewSession> {
        await this.loadActiveSession(sessionId, 'start');
        const session = await this.engine.controller.start(sessionId);
        await this.persist(sessionId);
        return session;
    }

    async pauseSession(sessionId: string): Promise<InterviewSession> {
        await this.loadActiveSession(sessionId, 'pause');
        await this.settleInFlight(sessionId);
        const session = await this.engine.controller.pause(sessionId);
        await this.persist(sessionId);
        return session;
    }

    async resumeSession(sessionId: string): Promise<InterviewSession> {
        await this.loadActiveSession(sessionId, 'resume');
        const session = await this.engine.controller.resume(sessionId);
        await this.persist(sessionId);
        return session;
    }

    /**
     * Cancel after any answer being scored has been recorded
     */
    async cancelSession(sessionId: string): Promise<InterviewSession> {
        await this.loadActiveSession(sessionId, 'cancel');
        await this.settleInFlight(sessionId);
        const session = await this.engine.controller.cancel(sessionId);
        await this.persist(sessionId);
        return session;
    }

    async completeSession(sessionId: string, reason?: StopReason): Promise<InterviewSession> {
        await this.loadActiveSession(sessionId, 'complete');
        await this.settleInFlight(sessionId);
        const session = await this.engine.controller.complete(sessionId, reason);
        await this.persist(sessionId);
        return session;
    }

    /**
     * The pending question, a newly selected one, or the end of the interview
     */
    async nextQuestion(sessionId: string): Promise<NextQuestionResult> {
        return this.questionLocks.runExclusive(sessionId, async (): Promise<NextQuestionResult> => {
            const session = await this.loadSession(sessionId);
            if (session.status === SessionStatus.Completed) {
                return { done: true, reason: session.stopReason ?? null, metrics: session.metrics ?? null };
            }
            if (session.status !== SessionStatus.InProgress) {
                throw new InvalidStateTransitionError(session.status, 'ask the next question in');
            }

            const pending = pendingQuestion(session);
            if (pending) {
                return { done: false, question: pending };
            }

            const decision = this.engine.policy.evaluate(session);
            if (decision.stop) {
                const completed = await this.engine.controller.complete(sessionId, decision.reason ?? undefined);
                await this.persist(sessionId);
                return { done: true, reason: decision.reason, metrics: completed.metrics ?? null };
            }

            const question = await this.engine.selector.next(session);
            await this.engine.controller.recordQuestion(sessionId, question);
            await this.persist(sessionId);

            this.logger.info({
                sessionId,
                questionId: question.id,
                type: question.type,
                difficulty: question.difficulty,
                source: question.source,
                asked: session.questions.length + 1
            }, 'Question asked');

            return { done: false, question };
        });
    }

    /**
     * Score an audio answer to the pending question and record it
     */
    async processResponse(sessionId: string, questionId: string, audio: Buffer): Promise<ResponseResult> {
        const session = await this.loadSession(sessionId);
        if (session.status !== SessionStatus.InProgress) {
            throw new InvalidStateTransitionError(session.status, 'answer a question in');
        }

        const pending = pendingQuestion(session);
        if (!pending || pending.id !== questionId) {
            throw new ValidationError(`Question ${questionId} is not awaiting an answer`, {
                pendingQuestionId: pending?.id ?? null
            });
        }
        if (this.inFlight.has(sessionId)) {
            throw new ValidationError('A response is already being scored for this session');
        }

        const work = this.scoreAndRecord(sessionId, pending, audio);
        this.inFlight.set(sessionId, work);

        let scored: ScoredResponse;
        try {
            scored = await work;
        } finally {
            this.inFlight.delete(sessionId);
        }
        await this.persist(sessionId);

        return { answer: scored.answer, decision: scored.decision, status: scored.session.status };
    }

    /**
     * Spoken version of a question from the session
     */
    async synthesizeQuestion(sessionId: string, questionId: string): Promise<Buffer> {
        const session = await this.loadSession(sessionId);
        const question = session.questions.find(asked => asked.id === questionId)
            ?? session.questionPool.find(candidate => candidate.id === questionId);
        if (!question) {
            throw new ValidationError(`Question ${questionId} does not belong to session ${sessionId}`);
        }
        return this.collaborators.speech.synthesize(question.text);
    }

    getSession(sessionId: string): Promise<InterviewSession> {
        return this.loadSession(sessionId);
    }

    async shouldEnd(sessionId: string): Promise<TerminationDecision> {
        const session = await this.loadSession(sessionId);
        return this.engine.policy.evaluate(session);
    }

    async getAnalysis(sessionId: string): Promise<SessionAnalysis> {
        const session = await this.loadSession(sessionId);
        if (session.status !== SessionStatus.Completed) {
            throw new InvalidStateTransitionError(session.status, 'analyze');
        }
        return this.engine.summarizer.analyze(session);
    }

    private async loadSession(sessionId: string): Promise<InterviewSession> {
        if (this.engine.controller.has(sessionId)) {
            return this.engine.controller.get(sessionId);
        }
        const stored = await this.collaborators.store.load(sessionId);
        // finished sessions are served from the store and not registered again
        return isFinished(stored) ? stored : this.engine.controller.register(stored);
    }

    private async loadActiveSession(sessionId: string, attempted: string): Promise<void> {
        const session = await this.loadSession(sessionId);
        if (isFinished(session)) {
            throw new InvalidStateTransitionError(session.status, attempted);
        }
    }

    /**
     * Writes are serialized per session and always save the latest version.
     * A finished session leaves the registry once its final state is saved.
     */
    private persist(sessionId: string): Promise<void> {
        return this.persistLocks.runExclusive(sessionId, async () => {
            if (!this.engine.controller.has(sessionId)) {
                // evicted: an earlier write already saved the final state
                return;
            }
            const session = this.engine.controller.get(sessionId);
            await this.collaborators.store.persist(session);
            if (isFinished(session)) {
                this.engine.controller.evict(sessionId);
            }
        });
    }

    private async settleInFlight(sessionId: string): Promise<void> {
        const work = this.inFlight.get(sessionId);
        if (work) {
            this.logger.debug({ sessionId }, 'Waiting for in-flight response scoring');
            await Promise.allSettled([work]);
        }
    }

    private async analyzeJob(jobTitle: string, jobDescription: string): Promise<JobRequirements> {
        try {
            return await this.collaborators.questionGenerator.analyzeJobDescription(jobTitle, jobDescription);
        } catch (error) {
            this.logger.warn({
                jobTitle,
                error: errorMessage(error)
            }, 'Job description analysis failed, using default requirements');
            return DEFAULT_JOB_REQUIREMENTS;
        }
    }

    private async buildPool(jobTitle: string, jobDescription: string): Promise<readonly Question[]> {
        try {
            const pool = await this.collaborators.questionGenerator.generateQuestionPool(jobTitle, jobDescription);
            if (pool.length > 0) {
                return pool;
            }
            this.logger.warn({ jobTitle }, 'Generated question pool was empty, using default question bank');
        } catch (error) {
            this.logger.warn({
                jobTitle,
                error: errorMessage(error)
            }, 'Question pool generation failed, using default question bank');
        }
        return DEFAULT_QUESTION_BANK;
    }

    private async scoreAndRecord(
        sessionId: string,
        question: Question,
        audio: Buffer
    ): Promise<ScoredResponse> {
        const { transcriber, audioFeatures, languageAnalyzer } = this.collaborators;

        const transcript = await this.callScoringSource(sessionId, 'transcription', () => transcriber.transcribe(audio)) ?? '';
        const [features, analysis] = await Promise.all([
            this.callScoringSource(sessionId, 'audio', () => audioFeatures.extract(audio)),
            transcript.trim().length > 0
                ? this.callScoringSource(sessionId, 'text', () =>
                    languageAnalyzer.analyzeText(question, transcript, question.expectedKeywords))
                : Promise.resolve(null)
        ]);

        const answer = this.engine.aggregator.score(transcript, features, analysis, question);
        if (answer.degradedSources.length > 0) {
            this.logger.warn({
                sessionId,
                questionId: question.id,
                degradedSources: answer.degradedSources
            }, 'Answer scored with neutral values for unavailable sources');
        }

        let session = await this.engine.controller.recordAnswer(sessionId, question, answer);
        const decision = this.engine.policy.evaluate(session);
        if (decision.stop) {
            session = await this.engine.controller.complete(sessionId, decision.reason ?? undefined);
        }

        this.logger.info({
            sessionId,
            questionId: question.id,
            technical: answer.technical,
            fluency: answer.fluency,
            stop: decision.stop,
            reason: decision.reason
        }, 'Response processed');

        return { session, answer, decision };
    }

    /**
     * One external scoring call with a timeout and a retry. A source that
     * still fails yields null and the aggregator scores it as neutral.
     */
    private async callScoringSource<T>(
        sessionId: string,
        source: ScoreSource,
        call: () => Promise<T>
    ): Promise<T | null> {
        try {
            return await this.retryUtil.executeWithRetry(
                () => withTimeout(call, this.scoringTimeoutMs, `${source} scoring timed out after ${this.scoringTimeoutMs}ms`),
                {
                    maxAttempts: this.scoringAttempts,
                    baseDelay: this.retryBaseDelayMs,
                    operationName: `${source} scoring`
                }
            );
        } catch (error) {
            this.logger.warn({
                sessionId,
                source,
                error: errorMessage(error)
            }, 'Scoring source unavailable');
            return null;
        }
    }
}

// Singleton instance
let interviewOrchestrator: InterviewOrchestrator | null = null;

export function getInterviewOrchestrator(): InterviewOrchestrator {
    if (!interviewOrchestrator) {
        interviewOrchestrator = InterviewOrchestrator.create();
    }
    return interviewOrchestrator;
}
