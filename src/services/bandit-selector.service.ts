import { logger, ILogger } from '../config/logger';
import { errorMessage } from '../errors/interview-errors';
import { IQuestionGenerator } from '../types/collaborators';
import {
    Answer,
    ArmStat,
    ArmStats,
    DIFFICULTY_ORDER,
    Difficulty,
    ExchangeRecord,
    InterviewSession,
    JobContext,
    PerformanceLevel,
    PerformanceSnapshot,
    QUESTION_TYPES,
    Question,
    QuestionType
} from '../types/interview';
import { sampleBeta } from '../utils/beta-sampler.util';
import { mean } from '../utils/statistics.util';
import { buildFallbackQuestion } from './question-templates';
import { getQuestionGeneratorService } from './question-generator.service';

export type ArmSampler = (arm: ArmStat) => number;

/** Draw from the arm's Beta(successes + 1, failures + 1) posterior. */
export const thompsonSample: ArmSampler = arm => sampleBeta(arm.successCount + 1, arm.failureCount + 1);

export interface BanditSelectorOptions {
    rollingWindow?: number;
    successThreshold?: number;
    difficultyPenalty?: number;
    historyLength?: number;
}

const EASY_DIFFICULTIES = new Set([Difficulty.Beginner, Difficulty.Intermediate]);
const HARD_DIFFICULTIES = new Set([Difficulty.Advanced, Difficulty.Expert]);

function typeArms(stat: (type: QuestionType) => ArmStat): Record<QuestionType, ArmStat> {
    return {
        [QuestionType.Technical]: stat(QuestionType.Technical),
        [QuestionType.Behavioral]: stat(QuestionType.Behavioral),
        [QuestionType.Situational]: stat(QuestionType.Situational),
        [QuestionType.ProblemSolving]: stat(QuestionType.ProblemSolving),
        [QuestionType.CulturalFit]: stat(QuestionType.CulturalFit)
    };
}

function difficultyArms(stat: (difficulty: Difficulty) => ArmStat): Record<Difficulty, ArmStat> {
    return {
        [Difficulty.Beginner]: stat(Difficulty.Beginner),
        [Difficulty.Intermediate]: stat(Difficulty.Intermediate),
        [Difficulty.Advanced]: stat(Difficulty.Advanced),
        [Difficulty.Expert]: stat(Difficulty.Expert)
    };
}

function bump(arm: ArmStat, success: boolean): ArmStat {
    return success
        ? { successCount: arm.successCount + 1, failureCount: arm.failureCount }
        : { successCount: arm.successCount, failureCount: arm.failureCount + 1 };
}

/**
 * Bandit Selector
 *
 * Adaptive question selection with two independent Thompson-Sampling
 * processes, one over question types and one over difficulty levels. Each
 * candidate is scored as the mean of its type sample, its (possibly
 * penalized) difficulty sample and a job-relevance heuristic; the best unseen
 * pool question wins. When the pool is exhausted a contextual question is
 * requested from the generator, and a template question stands in if that
 * call fails.
 */
export class BanditSelector {
    private readonly rollingWindow: number;
    private readonly successThreshold: number;
    private readonly difficultyPenalty: number;
    private readonly historyLength: number;

    constructor(
        private generator: IQuestionGenerator,
        private logger: ILogger,
        private sampleArm: ArmSampler = thompsonSample,
        options: BanditSelectorOptions = {}
    ) {
        this.rollingWindow = options.rollingWindow ?? 5;
        this.successThreshold = options.successThreshold ?? 0.7;
        this.difficultyPenalty = options.difficultyPenalty ?? 0.7;
        this.historyLength = options.historyLength ?? 3;
    }

    /**
     * Factory method for production use
     */
    static create(): BanditSelector {
        return new BanditSelector(getQuestionGeneratorService(), logger);
    }

    /**
     * Uniform (1, 1) prior on every arm
     */
    static priorArmStats(): ArmStats {
        return {
            type: typeArms(() => ({ successCount: 1, failureCount: 1 })),
            difficulty: difficultyArms(() => ({ successCount: 1, failureCount: 1 }))
        };
    }

    /**
     * Seed arm stats from the job context when a session starts.
     * Technical questions get an optimistic prior on skill-heavy jobs, and the
     * difficulty matching the target experience level starts ahead.
     */
    seed(jobContext: JobContext, current: ArmStats = BanditSelector.priorArmStats()): ArmStats {
        const skillHeavy = jobContext.keySkills.length > 3;
        const seeded = (arm: ArmStat, favoured: boolean): ArmStat => {
            const target = favoured ? { successCount: 3, failureCount: 1 } : { successCount: 2, failureCount: 2 };
            // counts never go down, even when re-seeding a session that already has history
            return {
                successCount: Math.max(arm.successCount, target.successCount),
                failureCount: Math.max(arm.failureCount, target.failureCount)
            };
        };

        return {
            type: typeArms(type =>
                seeded(current.type[type], type === QuestionType.Technical && skillHeavy)),
            difficulty: difficultyArms(difficulty =>
                seeded(current.difficulty[difficulty], difficulty === jobContext.experienceLevel))
        };
    }

    /**
     * Rolling performance level from the most recent technical scores
     */
    performanceLevel(session: InterviewSession): PerformanceLevel {
        const recent = session.answers.slice(-this.rollingWindow);
        if (recent.length === 0) {
            return 'medium';
        }

        const average = mean(recent.map(answer => answer.technical));
        if (average >= 0.8) {
            return 'high';
        }
        if (average < 0.6) {
            return 'low';
        }
        return 'medium';
    }

    /**
     * The job's experience level, shifted one step toward the candidate's current performance
     */
    targetDifficulty(session: InterviewSession): Difficulty {
        const base = DIFFICULTY_ORDER.indexOf(session.jobContext.experienceLevel);
        const level = this.performanceLevel(session);
        const shift = level === 'high' ? 1 : level === 'low' ? -1 : 0;
        const index = Math.min(DIFFICULTY_ORDER.length - 1, Math.max(0, base + shift));
        return DIFFICULTY_ORDER[index];
    }

    performanceSnapshot(session: InterviewSession): PerformanceSnapshot {
        if (session.answers.length === 0) {
            return { technical: 0.5, communication: 0.5, confidence: 0.5 };
        }
        return {
            technical: mean(session.answers.map(answer => answer.technical)),
            communication: mean(session.answers.map(answer => (answer.fluency + answer.confidence) / 2)),
            confidence: mean(session.answers.map(answer => answer.confidence))
        };
    }

    /**
     * Select the next question for a session. Does not modify the session.
     */
    async next(session: InterviewSession): Promise<Question> {
        const asked = new Set(session.questions.map(question => question.id));
        const candidates = session.questionPool.filter(question => !asked.has(question.id));
        const target = this.targetDifficulty(session);

        if (candidates.length === 0) {
            return this.nextContextual(session, asked, target);
        }

        const level = this.performanceLevel(session);
        const typeScores: Partial<Record<QuestionType, number>> = {};
        for (const type of QUESTION_TYPES) {
            typeScores[type] = this.sampleArm(session.armStats.type[type]);
        }

        const difficultyScores: Partial<Record<Difficulty, number>> = {};
        for (const difficulty of DIFFICULTY_ORDER) {
            let sample = this.sampleArm(session.armStats.difficulty[difficulty]);
            if (level === 'high' && EASY_DIFFICULTIES.has(difficulty)) {
                sample *= this.difficultyPenalty;
            } else if (level === 'low' && HARD_DIFFICULTIES.has(difficulty)) {
                sample *= this.difficultyPenalty;
            }
            difficultyScores[difficulty] = sample;
        }

        let best: Question = candidates[0];
        let bestScore = Number.NEGATIVE_INFINITY;
        for (const question of candidates) {
            const score = ((typeScores[question.type] ?? 0.5)
                + (difficultyScores[question.difficulty] ?? 0.5)
                + this.relevance(question, session, target)) / 3;
            // strict comparison keeps the earliest pool entry on ties
            if (score > bestScore) {
                best = question;
                bestScore = score;
            }
        }

        this.logger.debug({
            sessionId: session.id,
            questionId: best.id,
            score: bestScore,
            performanceLevel: level,
            targetDifficulty: target,
            candidates: candidates.length
        }, 'Question selected from pool');

        return best;
    }

    /**
     * Record the outcome of an answer against the question's type and difficulty arms
     */
    update(armStats: ArmStats, answer: Answer, question: Question): ArmStats {
        const success = answer.technical >= this.successThreshold;
        return {
            type: { ...armStats.type, [question.type]: bump(armStats.type[question.type], success) },
            difficulty: {
                ...armStats.difficulty,
                [question.difficulty]: bump(armStats.difficulty[question.difficulty], success)
            }
        };
    }

    private relevance(question: Question, session: InterviewSession, target: Difficulty): number {
        let relevance = 0.5;
        if (question.type === QuestionType.Technical && session.jobContext.keySkills.length > 3) {
            relevance += 0.3;
        }
        if (question.difficulty === target) {
            relevance += 0.2;
        }
        return Math.min(relevance, 1);
    }

    private recentHistory(session: InterviewSession): ExchangeRecord[] {
        return session.answers
            .map((answer, index) => ({ question: session.questions[index]?.text ?? '', answer: answer.transcript }))
            .slice(-this.historyLength);
    }

    private async nextContextual(session: InterviewSession, asked: Set<string>, target: Difficulty): Promise<Question> {
        try {
            const generated = await this.generator.generateContextualQuestion(
                session.jobContext.description,
                this.recentHistory(session),
                [...asked],
                { ...this.performanceSnapshot(session), targetDifficulty: target }
            );

            if (asked.has(generated.id)) {
                throw new Error(`generator returned already asked question ${generated.id}`);
            }

            this.logger.info({
                sessionId: session.id,
                questionId: generated.id,
                difficulty: generated.difficulty
            }, 'Contextual question generated');

            return generated;
        } catch (error) {
            const fallback = buildFallbackQuestion(target, session.questions.length + 1);

            this.logger.warn({
                sessionId: session.id,
                questionId: fallback.id,
                targetDifficulty: target,
                error: errorMessage(error)
            }, 'Contextual question generation failed, using fallback template');

            return fallback;
        }
    }
}
