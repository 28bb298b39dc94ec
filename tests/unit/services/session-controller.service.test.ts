import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidStateTransitionError, SessionNotFoundError, ValidationError } from '../../../src/errors/interview-errors';
import { BanditSelector } from '../../../src/services/bandit-selector.service';
import { PerformanceSummarizer } from '../../../src/services/performance-summarizer.service';
import { SessionController, SessionInit, pendingQuestion } from '../../../src/services/session-controller.service';
import { Difficulty, QuestionType, SessionStatus } from '../../../src/types/interview';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

describe('SessionController - Dependency Injection Tests', () => {
    const { fixedDate, makeAnswer, makeJobContext, makeQuestion } = globalThis.testUtils;
    const q1 = makeQuestion({ id: 'q-1', type: QuestionType.Technical, difficulty: Difficulty.Intermediate });
    const q2 = makeQuestion({ id: 'q-2', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner });

    const mockLogger = { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() };
    let controller: SessionController;
    let init: SessionInit;

    beforeEach(() => {
        vi.clearAllMocks();
        let sequence = 0;
        const selector = new BanditSelector(
            { generateQuestionPool: vi.fn(), generateContextualQuestion: vi.fn(), analyzeJobDescription: vi.fn() },
            mockLogger
        );
        controller = new SessionController(
            selector,
            new PerformanceSummarizer(),
            mockLogger,
            () => fixedDate,
            () => `session-${++sequence}`
        );
        init = {
            candidateId: 'candidate-1',
            jobContext: makeJobContext({ keySkills: ['TypeScript', 'PostgreSQL', 'Redis', 'Docker'] }),
            questionPool: [q1, q2]
        };
    });

    async function startedSession() {
        const session = controller.create(init);
        await controller.start(session.id);
        return session.id;
    }

    describe('create', () => {
        it('should register a frozen session in the created state', () => {
            const session = controller.create(init);

            expect(session.id).toBe('session-1');
            expect(session.status).toBe(SessionStatus.Created);
            expect(session.version).toBe(1);
            expect(session.questions).toEqual([]);
            expect(session.questionPool).toEqual([q1, q2]);
            expect(session.armStats).toEqual(BanditSelector.priorArmStats());
            expect(Object.isFrozen(session)).toBe(true);
            expect(controller.get('session-1')).toBe(session);
            expect(mockLogger.info).toHaveBeenCalledWith(
                { sessionId: 'session-1', candidateId: 'candidate-1', poolSize: 2 },
                'Interview session created'
            );
        });

        it('should throw SessionNotFoundError for unknown ids', () => {
            expect(() => controller.get('missing')).toThrow(SessionNotFoundError);
            expect(controller.has('missing')).toBe(false);
        });
    });

    describe('lifecycle transitions', () => {
        it('should start a session and seed its arms', async () => {
            const created = controller.create(init);

            const started = await controller.start(created.id);

            expect(started.status).toBe(SessionStatus.InProgress);
            expect(started.startedAt).toBe(fixedDate);
            expect(started.version).toBe(2);
            expect(started.armStats.type[QuestionType.Technical]).toEqual({ successCount: 3, failureCount: 1 });
            expect(created.status).toBe(SessionStatus.Created);
        });

        it('should reject transitions that are not allowed from the current state', async () => {
            const { id } = controller.create(init);

            await expect(controller.pause(id)).rejects.toThrow('Cannot pause a session in state "created"');
            await expect(controller.complete(id)).rejects.toBeInstanceOf(InvalidStateTransitionError);

            await controller.start(id);
            await expect(controller.resume(id)).rejects.toBeInstanceOf(InvalidStateTransitionError);
            await expect(controller.start(id)).rejects.toBeInstanceOf(InvalidStateTransitionError);

            await controller.complete(id);
            await expect(controller.cancel(id)).rejects.toThrow('Cannot cancel a session in state "completed"');
        });

        it('should allow cancelling from created, in progress and paused', async () => {
            const created = controller.create(init);
            await expect(controller.cancel(created.id)).resolves.toMatchObject({ status: SessionStatus.Cancelled, cancelledAt: fixedDate });

            const paused = await startedSession();
            await controller.pause(paused);
            await expect(controller.cancel(paused)).resolves.toMatchObject({ status: SessionStatus.Cancelled });

            await expect(controller.cancel(paused)).rejects.toBeInstanceOf(InvalidStateTransitionError);
        });

        it('should keep questions, answers and arms across pause and resume', async () => {
            const id = await startedSession();
            await controller.recordQuestion(id, q1);
            const answered = await controller.recordAnswer(id, q1, makeAnswer('q-1', { technical: 0.9 }));

            const paused = await controller.pause(id);
            expect(paused.questions).toBe(answered.questions);
            expect(paused.answers).toBe(answered.answers);

            const resumed = await controller.resume(id);
            expect(resumed.status).toBe(SessionStatus.InProgress);
            expect(resumed.questions).toBe(answered.questions);
            expect(resumed.answers).toBe(answered.answers);
            expect(resumed.armStats).toBe(answered.armStats);
            expect(resumed.currentIndex).toBe(answered.currentIndex);

            const pausedAgain = await controller.pause(id);
            expect(pausedAgain.status).toBe(SessionStatus.Paused);
            expect(pausedAgain.questions).toBe(answered.questions);
            expect(pausedAgain.answers).toBe(answered.answers);
            expect(pausedAgain.armStats).toBe(answered.armStats);
        });

        it('should complete with metrics and a stop reason', async () => {
            const id = await startedSession();
            await controller.recordAnswer(id, q1, makeAnswer('q-1'));

            const completed = await controller.complete(id, 'plateau');

            expect(completed.status).toBe(SessionStatus.Completed);
            expect(completed.completedAt).toBe(fixedDate);
            expect(completed.stopReason).toBe('plateau');
            expect(completed.metrics?.technical).toBe(0.7);
        });
    });

    describe('recording questions and answers', () => {
        it('should track the pending question', async () => {
            const id = await startedSession();

            const asked = await controller.recordQuestion(id, q1);

            expect(pendingQuestion(asked)).toEqual(q1);
            await expect(controller.recordQuestion(id, q2)).rejects.toBeInstanceOf(ValidationError);
        });

        it('should store frozen copies of questions and answers', async () => {
            const id = await startedSession();
            const keywords = ['event loop', 'microtask'];
            const weights: Record<string, number> = { confident: 1 };
            const question = makeQuestion({ id: 'q-1', expectedKeywords: keywords });
            const answer = makeAnswer('q-1', { emotionWeights: weights });

            await controller.recordQuestion(id, question);
            const session = await controller.recordAnswer(id, question, answer);
            keywords.push('closure');
            weights.anxious = 1;

            const [storedQuestion] = session.questions;
            const [storedAnswer] = session.answers;
            expect(storedQuestion).not.toBe(question);
            expect(storedAnswer).not.toBe(answer);
            expect(storedQuestion.expectedKeywords).toEqual(['event loop', 'microtask']);
            expect(storedAnswer.emotionWeights).toEqual({ confident: 1 });
            expect(Object.isFrozen(storedQuestion)).toBe(true);
            expect(Object.isFrozen(storedQuestion.expectedKeywords)).toBe(true);
            expect(Object.isFrozen(storedAnswer)).toBe(true);
            expect(Object.isFrozen(storedAnswer.emotionWeights)).toBe(true);
        });

        it('should never ask the same question twice', async () => {
            const id = await startedSession();
            await controller.recordQuestion(id, q1);
            await controller.recordAnswer(id, q1, makeAnswer('q-1'));

            await expect(controller.recordQuestion(id, q1)).rejects.toThrow('Question q-1 was already asked in this session');
        });

        it('should append the answer, advance the index and update the arms', async () => {
            const id = await startedSession();
            await controller.recordQuestion(id, q1);

            const session = await controller.recordAnswer(id, q1, makeAnswer('q-1', { technical: 0.9 }));

            expect(session.answers).toHaveLength(1);
            expect(session.currentIndex).toBe(1);
            expect(pendingQuestion(session)).toBeNull();
            expect(session.armStats.type[QuestionType.Technical]).toEqual({ successCount: 4, failureCount: 1 });
            expect(session.armStats.difficulty[Difficulty.Intermediate]).toEqual({ successCount: 4, failureCount: 1 });
        });

        it('should append the question when it was not recorded at ask time', async () => {
            const id = await startedSession();

            const session = await controller.recordAnswer(id, q2, makeAnswer('q-2'));

            expect(session.questions).toEqual([q2]);
            expect(session.answers).toHaveLength(1);
        });

        it('should reject answers for a question other than the pending one', async () => {
            const id = await startedSession();
            await controller.recordQuestion(id, q1);

            await expect(controller.recordAnswer(id, q2, makeAnswer('q-2'))).rejects.toThrow('Question q-1 is awaiting an answer, got one for q-2');
            await expect(controller.recordAnswer(id, q1, makeAnswer('q-2'))).rejects.toThrow('Answer references question q-2, expected q-1');
        });

        it('should reject answers while paused', async () => {
            const id = await startedSession();
            await controller.recordQuestion(id, q1);
            await controller.pause(id);

            await expect(controller.recordAnswer(id, q1, makeAnswer('q-1'))).rejects.toThrow('Cannot record an answer for a session in state "paused"');
        });
    });

    describe('isolation and versioning', () => {
        it('should leave earlier snapshots untouched', async () => {
            const id = await startedSession();
            const before = controller.get(id);

            await controller.recordQuestion(id, q1);

            expect(before.questions).toEqual([]);
            expect(controller.get(id).questions).toEqual([q1]);
        });

        it('should bump the version on every mutation', async () => {
            const id = await startedSession();
            const versions = [controller.get(id).version];

            versions.push((await controller.recordQuestion(id, q1)).version);
            versions.push((await controller.recordAnswer(id, q1, makeAnswer('q-1'))).version);
            versions.push((await controller.pause(id)).version);
            versions.push((await controller.resume(id)).version);

            expect(versions).toEqual([2, 3, 4, 5, 6]);
        });

        it('should keep arm statistics separate per session', async () => {
            const first = await startedSession();
            const second = await startedSession();

            await controller.recordAnswer(first, q1, makeAnswer('q-1', { technical: 0.9 }));

            expect(controller.get(first).armStats.type[QuestionType.Technical]).toEqual({ successCount: 4, failureCount: 1 });
            expect(controller.get(second).armStats.type[QuestionType.Technical]).toEqual({ successCount: 3, failureCount: 1 });
        });

        it('should serialize concurrent mutations of one session', async () => {
            const id = await startedSession();

            const results = await Promise.allSettled([
                controller.recordQuestion(id, q1),
                controller.recordQuestion(id, q2)
            ]);

            expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
            expect(controller.get(id).questions).toEqual([q1]);
            expect(controller.get(id).version).toBe(3);
        });

        it('should evict finished sessions only', async () => {
            const active = await startedSession();
            const cancelled = await startedSession();
            await controller.cancel(cancelled);

            expect(() => controller.evict(active)).toThrow('Cannot evict a session in state "in_progress"');
            expect(controller.evict(cancelled)).toBe(true);
            expect(controller.has(cancelled)).toBe(false);
            expect(controller.has(active)).toBe(true);
            expect(controller.evict('missing')).toBe(false);
            expect(mockLogger.debug).toHaveBeenCalledWith(
                { sessionId: cancelled, status: SessionStatus.Cancelled },
                'Interview session evicted from registry'
            );
        });

        it('should keep the registered copy when adopting a stored session', async () => {
            const id = await startedSession();
            const live = controller.get(id);

            const adopted = controller.register({ ...live, status: SessionStatus.Created, version: 1 });

            expect(adopted).toBe(live);
        });
    });
});
