import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { BanditSelector } from '../../../src/services/bandit-selector.service';
import { ArmStat, Difficulty, QuestionType } from '../../../src/types/interview';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

describe('BanditSelector - Dependency Injection Tests', () => {
    const { makeAnswer, makeJobContext, makeQuestion, makeSession, priorArmStats } = globalThis.testUtils;

    let mockGenerator: { generateQuestionPool: Mock; generateContextualQuestion: Mock; analyzeJobDescription: Mock };
    let mockLogger: { info: Mock; error: Mock; warn: Mock; debug: Mock };
    // Posterior mean instead of a random draw keeps selection deterministic
    let posteriorMean: Mock<(arm: ArmStat) => number>;
    let selector: BanditSelector;

    beforeEach(() => {
        vi.clearAllMocks();
        mockGenerator = {
            generateQuestionPool: vi.fn(),
            generateContextualQuestion: vi.fn(),
            analyzeJobDescription: vi.fn()
        };
        mockLogger = { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() };
        posteriorMean = vi.fn((arm: ArmStat) => arm.successCount / (arm.successCount + arm.failureCount));
        selector = new BanditSelector(mockGenerator, mockLogger, posteriorMean);
    });

    describe('Constructor and Factory', () => {
        it('should create selector with factory method', () => {
            expect(BanditSelector.create()).toBeInstanceOf(BanditSelector);
        });

        it('should start every arm at a uniform prior', () => {
            const prior = BanditSelector.priorArmStats();

            expect(prior.type[QuestionType.Technical]).toEqual({ successCount: 1, failureCount: 1 });
            expect(prior.difficulty[Difficulty.Expert]).toEqual({ successCount: 1, failureCount: 1 });
        });
    });

    describe('seed', () => {
        it('should favour technical questions on skill-heavy jobs and the target level', () => {
            const seeded = selector.seed(makeJobContext({
                keySkills: ['TypeScript', 'PostgreSQL', 'Redis', 'Docker'],
                experienceLevel: Difficulty.Advanced
            }));

            expect(seeded.type[QuestionType.Technical]).toEqual({ successCount: 3, failureCount: 1 });
            expect(seeded.type[QuestionType.Behavioral]).toEqual({ successCount: 2, failureCount: 2 });
            expect(seeded.difficulty[Difficulty.Advanced]).toEqual({ successCount: 3, failureCount: 1 });
            expect(seeded.difficulty[Difficulty.Beginner]).toEqual({ successCount: 2, failureCount: 2 });
        });

        it('should never lower existing counts', () => {
            const prior = priorArmStats();
            const current = {
                ...prior,
                type: { ...prior.type, [QuestionType.Behavioral]: { successCount: 5, failureCount: 0 } }
            };

            const seeded = selector.seed(makeJobContext(), current);

            expect(seeded.type[QuestionType.Behavioral]).toEqual({ successCount: 5, failureCount: 2 });
            expect(seeded.type[QuestionType.Technical]).toEqual({ successCount: 2, failureCount: 2 });
        });
    });

    describe('update', () => {
        it('should count a success on both arms without touching the input', () => {
            const prior = priorArmStats();
            const question = makeQuestion({ type: QuestionType.Technical, difficulty: Difficulty.Intermediate });

            const updated = selector.update(prior, makeAnswer(question.id, { technical: 0.7 }), question);

            expect(updated.type[QuestionType.Technical]).toEqual({ successCount: 2, failureCount: 1 });
            expect(updated.difficulty[Difficulty.Intermediate]).toEqual({ successCount: 2, failureCount: 1 });
            expect(updated.type[QuestionType.Behavioral]).toEqual({ successCount: 1, failureCount: 1 });
            expect(prior.type[QuestionType.Technical]).toEqual({ successCount: 1, failureCount: 1 });
        });

        it('should count a failure below the success threshold', () => {
            const question = makeQuestion({ type: QuestionType.Situational, difficulty: Difficulty.Expert });

            const updated = selector.update(priorArmStats(), makeAnswer(question.id, { technical: 0.69 }), question);

            expect(updated.type[QuestionType.Situational]).toEqual({ successCount: 1, failureCount: 2 });
            expect(updated.difficulty[Difficulty.Expert]).toEqual({ successCount: 1, failureCount: 2 });
        });
    });

    describe('performanceLevel and targetDifficulty', () => {
        function withScores(scores: number[], experienceLevel = Difficulty.Intermediate) {
            const questions = scores.map((_, index) => makeQuestion({ id: `asked-${index}` }));
            const answers = scores.map((technical, index) => makeAnswer(`asked-${index}`, { technical }));
            return makeSession({ jobContext: makeJobContext({ experienceLevel }), questions, answers });
        }

        it('should report medium before any answer', () => {
            expect(selector.performanceLevel(withScores([]))).toBe('medium');
        });

        it('should classify the rolling average', () => {
            expect(selector.performanceLevel(withScores([0.5, 0.55]))).toBe('low');
            expect(selector.performanceLevel(withScores([0.6, 0.7]))).toBe('medium');
            expect(selector.performanceLevel(withScores([0.8]))).toBe('high');
        });

        it('should only consider the last five answers', () => {
            expect(selector.performanceLevel(withScores([0.1, 0.1, 0.9, 0.9, 0.9, 0.9, 0.9]))).toBe('high');
        });

        it('should shift the job level one step and stay in range', () => {
            expect(selector.targetDifficulty(withScores([0.9]))).toBe(Difficulty.Advanced);
            expect(selector.targetDifficulty(withScores([0.3]))).toBe(Difficulty.Beginner);
            expect(selector.targetDifficulty(withScores([0.9], Difficulty.Expert))).toBe(Difficulty.Expert);
            expect(selector.targetDifficulty(withScores([0.3], Difficulty.Beginner))).toBe(Difficulty.Beginner);
        });

        it('should use neutral performance before any answer', () => {
            expect(selector.performanceSnapshot(withScores([]))).toEqual({ technical: 0.5, communication: 0.5, confidence: 0.5 });
        });
    });

    describe('next - pool selection', () => {
        it('should prefer relevant questions at the target difficulty', async () => {
            const session = makeSession({
                jobContext: makeJobContext({ keySkills: ['TypeScript', 'PostgreSQL', 'Redis', 'Docker'] }),
                questionPool: [
                    makeQuestion({ id: 'p1', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner }),
                    makeQuestion({ id: 'p2', type: QuestionType.Technical, difficulty: Difficulty.Intermediate }),
                    makeQuestion({ id: 'p3', type: QuestionType.Technical, difficulty: Difficulty.Advanced })
                ]
            });

            const question = await selector.next(session);

            expect(question.id).toBe('p2');
            expect(posteriorMean).toHaveBeenCalledTimes(9);
            expect(mockGenerator.generateContextualQuestion).not.toHaveBeenCalled();
        });

        it('should keep the earliest pool entry on ties', async () => {
            const session = makeSession({
                questionPool: [
                    makeQuestion({ id: 'a', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner }),
                    makeQuestion({ id: 'b', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner })
                ]
            });

            expect((await selector.next(session)).id).toBe('a');
        });

        it('should never repeat an asked question', async () => {
            const asked = makeQuestion({ id: 'p2', type: QuestionType.Technical, difficulty: Difficulty.Intermediate });
            const session = makeSession({
                jobContext: makeJobContext({ keySkills: ['TypeScript', 'PostgreSQL', 'Redis', 'Docker'] }),
                questionPool: [
                    makeQuestion({ id: 'p1', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner }),
                    asked,
                    makeQuestion({ id: 'p3', type: QuestionType.Technical, difficulty: Difficulty.Advanced })
                ],
                questions: [asked],
                answers: [makeAnswer('p2', { technical: 0.7 })]
            });

            expect((await selector.next(session)).id).toBe('p3');
        });

        it('should penalize easy difficulties for strong candidates', async () => {
            const asked = makeQuestion({ id: 'q-a' });
            const prior = priorArmStats();
            const session = makeSession({
                questionPool: [
                    asked,
                    makeQuestion({ id: 'x', type: QuestionType.Behavioral, difficulty: Difficulty.Intermediate }),
                    makeQuestion({ id: 'y', type: QuestionType.Behavioral, difficulty: Difficulty.Expert })
                ],
                questions: [asked],
                answers: [makeAnswer('q-a', { technical: 0.9 })],
                armStats: {
                    ...prior,
                    difficulty: { ...prior.difficulty, [Difficulty.Intermediate]: { successCount: 6, failureCount: 4 } }
                }
            });

            expect((await selector.next(session)).id).toBe('y');

            const unpenalized = new BanditSelector(mockGenerator, mockLogger, posteriorMean, { difficultyPenalty: 1 });
            expect((await unpenalized.next(session)).id).toBe('x');
        });

        it('should penalize hard difficulties for struggling candidates', async () => {
            const asked = makeQuestion({ id: 'q-a' });
            const prior = priorArmStats();
            const session = makeSession({
                jobContext: makeJobContext({ experienceLevel: Difficulty.Advanced }),
                questionPool: [
                    asked,
                    makeQuestion({ id: 'x', type: QuestionType.Behavioral, difficulty: Difficulty.Expert }),
                    makeQuestion({ id: 'y', type: QuestionType.Behavioral, difficulty: Difficulty.Beginner })
                ],
                questions: [asked],
                answers: [makeAnswer('q-a', { technical: 0.3 })],
                armStats: {
                    ...prior,
                    difficulty: { ...prior.difficulty, [Difficulty.Expert]: { successCount: 6, failureCount: 4 } }
                }
            });

            expect((await selector.next(session)).id).toBe('y');
        });
    });

    describe('next - exhausted pool', () => {
        const asked = makeQuestion({ id: 'q-a', text: 'How would you index a large table?' });
        const exhausted = () => makeSession({
            questionPool: [asked],
            questions: [asked],
            answers: [makeAnswer('q-a', { technical: 0.7, transcript: 'I would use a B-tree index' })]
        });

        it('should ask the generator for a contextual question', async () => {
            const generated = makeQuestion({ id: 'ctx-1', source: 'generated' });
            mockGenerator.generateContextualQuestion.mockResolvedValue(generated);
            const session = exhausted();

            const question = await selector.next(session);

            expect(question).toBe(generated);
            expect(mockGenerator.generateContextualQuestion).toHaveBeenCalledWith(
                session.jobContext.description,
                [{ question: 'How would you index a large table?', answer: 'I would use a B-tree index' }],
                ['q-a'],
                expect.objectContaining({ technical: 0.7, targetDifficulty: Difficulty.Intermediate })
            );
        });

        it('should fall back to a template question when generation fails', async () => {
            mockGenerator.generateContextualQuestion.mockRejectedValue(new Error('model overloaded'));

            const question = await selector.next(exhausted());

            expect(question.id).toBe('fallback-intermediate-2');
            expect(question.source).toBe('fallback');
            expect(question.difficulty).toBe(Difficulty.Intermediate);
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ questionId: 'fallback-intermediate-2', error: 'model overloaded' }),
                'Contextual question generation failed, using fallback template'
            );
        });

        it('should fall back when the generator repeats an asked question', async () => {
            mockGenerator.generateContextualQuestion.mockResolvedValue(asked);

            const question = await selector.next(exhausted());

            expect(question.source).toBe('fallback');
        });
    });
});
