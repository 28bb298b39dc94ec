import { randomUUID } from 'crypto';
import { logger, ILogger } from '../config/logger';
import { InvalidStateTransitionError, SessionNotFoundError, ValidationError } from '../errors/interview-errors';
import {
    Answer,
    InterviewSession,
    JobContext,
    Question,
    SessionStatus,
    StopReason
} from '../types/interview';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { BanditSelector } from './bandit-selector.service';
import { PerformanceSummarizer } from './performance-summarizer.service';

export type ArmPolicy = Pick<BanditSelector, 'seed' | 'update'>;

export interface SessionInit {
    candidateId: string;
    jobContext: JobContext;
    questionPool: readonly Question[];
}

/**
 * The question asked but not yet answered, if any
 */
export function pendingQuestion(session: InterviewSession): Question | null {
    return session.questions.length > session.answers.length
        ? session.questions[session.answers.length]
        : null;
}

const ACTIVE_STATES: readonly SessionStatus[] = [SessionStatus.Created, SessionStatus.InProgress, SessionStatus.Paused];

export function isFinished(session: InterviewSession): boolean {
    return !ACTIVE_STATES.includes(session.status);
}

// Stored copies, so a caller keeping the original cannot change recorded history
function freezeQuestion(question: Question): Question {
    return Object.freeze({ ...question, expectedKeywords: Object.freeze([...question.expectedKeywords]) });
}

function freezeAnswer(answer: Answer): Answer {
    return Object.freeze({
        ...answer,
        emotionWeights: Object.freeze({ ...answer.emotionWeights }),
        degradedSources: Object.freeze([...answer.degradedSources])
    });
}

/**
 * Session Controller
 *
 * In-memory registry and state machine for interview sessions:
 *
 *   created --start--> in_progress <--pause/resume--> paused
 *   in_progress --complete--> completed
 *   created | in_progress | paused --cancel--> cancelled
 *
 * Each mutation runs under a per-session lock and swaps in a new frozen
 * session object with `version` bumped. No I/O happens under the lock.
 */
export class SessionController {
    private sessions = new Map<string, InterviewSession>();
    private locks = new KeyedMutex();

    constructor(
        private armPolicy: ArmPolicy,
        private summarizer: PerformanceSummarizer,
        private logger: ILogger,
        private now: () => Date = () => new Date(),
        private createId: () => string = randomUUID
    ) { }

    /**
     * Factory method for production use
     */
    static create(armPolicy: ArmPolicy): SessionController {
        return new SessionController(armPolicy, new PerformanceSummarizer(), logger);
    }

    create(init: SessionInit): InterviewSession {
        const session: InterviewSession = {
            id: this.createId(),
            candidateId: init.candidateId,
            jobContext: Object.freeze({ ...init.jobContext, keySkills: Object.freeze([...init.jobContext.keySkills]) }),
            status: SessionStatus.Created,
            questionPool: Object.freeze([...init.questionPool]),
            questions: Object.freeze([]),
            answers: Object.freeze([]),
            currentIndex: 0,
            createdAt: this.now(),
            armStats: BanditSelector.priorArmStats(),
            version: 1
        };

        const frozen = Object.freeze(session);
        this.sessions.set(frozen.id, frozen);

        this.logger.info({
            sessionId: frozen.id,
            candidateId: frozen.candidateId,
            poolSize: frozen.questionPool.length
        }, 'Interview session created');

        return frozen;
    }

    /**
     * Adopt a session loaded from storage. An already registered session wins,
     * since it may hold mutations the store has not seen yet.
     */
    register(session: InterviewSession): InterviewSession {
        const existing = this.sessions.get(session.id);
        if (existing) {
            return existing;
        }
        const frozen = Object.freeze(session);
        this.sessions.set(frozen.id, frozen);
        return frozen;
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    /**
     * Drop a finished session from the registry; the store holds its final state
     */
    evict(sessionId: string): boolean {
        const session = this.sessions.get(sessionId);
        if (!session) {
            return false;
        }
        if (!isFinished(session)) {
            throw new InvalidStateTransitionError(session.status, 'evict');
        }
        this.sessions.delete(sessionId);
        this.logger.debug({ sessionId, status: session.status }, 'Interview session evicted from registry');
        return true;
    }

    get(sessionId: string): InterviewSession {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return session;
    }

    start(sessionId: string): Promise<InterviewSession> {
        return this.transition(sessionId, 'start', [SessionStatus.Created], session => ({
            ...session,
            status: SessionStatus.InProgress,
            startedAt: this.now(),
            armStats: this.armPolicy.seed(session.jobContext, session.armStats)
        }));
    }

    pause(sessionId: string): Promise<InterviewSession> {
        return this.transition(sessionId, 'pause', [SessionStatus.InProgress], session => ({
            ...session,
            status: SessionStatus.Paused
        }));
    }

    resume(sessionId: string): Promise<InterviewSession> {
        return this.transition(sessionId, 'resume', [SessionStatus.Paused], session => ({
            ...session,
            status: SessionStatus.InProgress
        }));
    }

    recordQuestion(sessionId: string, question: Question): Promise<InterviewSession> {
        return this.transition(sessionId, 'record a question for', [SessionStatus.InProgress], session => {
            const pending = pendingQuestion(session);
            if (pending) {
                throw new ValidationError(`Question ${pending.id} has not been answered yet`, { pendingQuestionId: pending.id });
            }
            this.assertNotAsked(session, question);

            return {
                ...session,
                questions: Object.freeze([...session.questions, freezeQuestion(question)])
            };
        });
    }

    /**
     * Append an answer. The question is appended too when it was not recorded
     * at ask time.
     */
    recordAnswer(sessionId: string, question: Question, answer: Answer): Promise<InterviewSession> {
        return this.transition(sessionId, 'record an answer for', [SessionStatus.InProgress], session => {
            if (answer.questionId !== question.id) {
                throw new ValidationError(`Answer references question ${answer.questionId}, expected ${question.id}`);
            }

            const pending = pendingQuestion(session);
            let questions = session.questions;
            if (pending) {
                if (pending.id !== question.id) {
                    throw new ValidationError(`Question ${pending.id} is awaiting an answer, got one for ${question.id}`, {
                        pendingQuestionId: pending.id
                    });
                }
            } else {
                this.assertNotAsked(session, question);
                questions = Object.freeze([...session.questions, freezeQuestion(question)]);
            }

            return {
                ...session,
                questions,
                answers: Object.freeze([...session.answers, freezeAnswer(answer)]),
                currentIndex: session.currentIndex + 1,
                armStats: this.armPolicy.update(session.armStats, answer, question)
            };
        });
    }

    complete(sessionId: string, reason?: StopReason): Promise<InterviewSession> {
        return this.transition(sessionId, 'complete', [SessionStatus.InProgress], session => ({
            ...session,
            status: SessionStatus.Completed,
            completedAt: this.now(),
            metrics: this.summarizer.summarize(session),
            ...(reason && { stopReason: reason })
        }));
    }

    cancel(sessionId: string): Promise<InterviewSession> {
        return this.transition(sessionId, 'cancel', ACTIVE_STATES, session => ({
            ...session,
            status: SessionStatus.Cancelled,
            cancelledAt: this.now()
        }));
    }

    private assertNotAsked(session: InterviewSession, question: Question): void {
        if (session.questions.some(asked => asked.id === question.id)) {
            throw new ValidationError(`Question ${question.id} was already asked in this session`);
        }
    }

    private transition(
        sessionId: string,
        attempted: string,
        allowed: readonly SessionStatus[],
        mutate: (session: InterviewSession) => InterviewSession
    ): Promise<InterviewSession> {
        return this.locks.runExclusive(sessionId, () => {
            const current = this.get(sessionId);
            if (!allowed.includes(current.status)) {
                throw new InvalidStateTransitionError(current.status, attempted);
            }

            const next: InterviewSession = Object.freeze({ ...mutate(current), version: current.version + 1 });
            this.sessions.set(sessionId, next);

            const fields = {
                sessionId,
                operation: attempted,
                from: current.status,
                to: next.status,
                version: next.version,
                questions: next.questions.length,
                answers: next.answers.length
            };
            if (next.status !== current.status) {
                this.logger.info(fields, 'Interview session state changed');
            } else {
                this.logger.debug(fields, 'Interview session updated');
            }

            return next;
        });
    }
}
