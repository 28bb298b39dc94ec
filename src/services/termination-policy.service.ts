import { getSettings } from '../config/settings';
import { InterviewSession, TerminationDecision } from '../types/interview';
import { mean, populationStdDev } from '../utils/statistics.util';

export interface TerminationPolicyOptions {
    maxQuestions?: number;
    plateauWindow?: number;
    plateauStdDev?: number;
    poorWindow?: number;
    poorMean?: number;
}

const CONTINUE: TerminationDecision = Object.freeze({ stop: false, reason: null });

/**
 * Termination Policy
 *
 * Early-stop rules, checked in a fixed order (first match wins):
 * 1. max_questions: the answer limit is reached
 * 2. plateau: the last `plateauWindow` technical scores barely move
 * 3. poor_performance: the last `poorWindow` technical scores average too low
 */
export class TerminationPolicy {
    readonly maxQuestions: number;
    private readonly plateauWindow: number;
    private readonly plateauStdDev: number;
    private readonly poorWindow: number;
    private readonly poorMean: number;

    constructor(options: TerminationPolicyOptions = {}) {
        this.maxQuestions = options.maxQuestions ?? 20;
        this.plateauWindow = options.plateauWindow ?? 5;
        this.plateauStdDev = options.plateauStdDev ?? 0.1;
        this.poorWindow = options.poorWindow ?? 3;
        this.poorMean = options.poorMean ?? 0.4;
    }

    static create(): TerminationPolicy {
        return new TerminationPolicy({ maxQuestions: getSettings().MAX_QUESTIONS });
    }

    evaluate(session: InterviewSession): TerminationDecision {
        const scores = session.answers.map(answer => answer.technical);

        if (scores.length >= this.maxQuestions) {
            return { stop: true, reason: 'max_questions' };
        }

        if (scores.length >= this.plateauWindow
            && populationStdDev(scores.slice(-this.plateauWindow)) < this.plateauStdDev) {
            return { stop: true, reason: 'plateau' };
        }

        if (scores.length >= this.poorWindow && mean(scores.slice(-this.poorWindow)) < this.poorMean) {
            return { stop: true, reason: 'poor_performance' };
        }

        return CONTINUE;
    }

    shouldStop(session: InterviewSession): boolean {
        return this.evaluate(session).stop;
    }
}
