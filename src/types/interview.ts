/**
 * Interview domain model
 *
 * Typed shapes for everything the orchestration engine reads and writes.
 * Sessions, questions and answers are treated as values: every mutation
 * produces a new object, so a reference held by a caller is a stable snapshot.
 */

export enum QuestionType {
    Technical = 'technical',
    Behavioral = 'behavioral',
    Situational = 'situational',
    ProblemSolving = 'problem_solving',
    CulturalFit = 'cultural_fit'
}

export enum Difficulty {
    Beginner = 'beginner',
    Intermediate = 'intermediate',
    Advanced = 'advanced',
    Expert = 'expert'
}

export enum SessionStatus {
    Created = 'created',
    InProgress = 'in_progress',
    Paused = 'paused',
    Completed = 'completed',
    Cancelled = 'cancelled'
}

export const QUESTION_TYPES: readonly QuestionType[] = [
    QuestionType.Technical,
    QuestionType.Behavioral,
    QuestionType.Situational,
    QuestionType.ProblemSolving,
    QuestionType.CulturalFit
];

// Easiest first; index doubles as the difficulty rank.
export const DIFFICULTY_ORDER: readonly Difficulty[] = [
    Difficulty.Beginner,
    Difficulty.Intermediate,
    Difficulty.Advanced,
    Difficulty.Expert
];

/**
 * Where a question came from. `fallback` marks template questions issued
 * when the contextual generator failed, so degraded sourcing can be audited.
 */
export type QuestionSource = 'pool' | 'generated' | 'fallback';

export interface Question {
    readonly id: string;
    readonly text: string;
    readonly type: QuestionType;
    readonly difficulty: Difficulty;
    readonly category: string;
    readonly expectedKeywords: readonly string[];
    readonly source: QuestionSource;
}

/** Signals that were unavailable when an answer was scored. */
export type ScoreSource = 'transcription' | 'audio' | 'text';

export interface Answer {
    readonly questionId: string;
    readonly transcript: string;
    readonly technical: number;     // [0, 1]
    readonly fluency: number;       // [0, 1]
    readonly confidence: number;    // [0, 1]
    readonly sentiment: number;     // [-1, 1]
    readonly emotionWeights: Readonly<Record<string, number>>;
    readonly audioDurationSec: number;
    readonly timestamp: Date;
    readonly degradedSources: readonly ScoreSource[];
}

export interface ArmStat {
    readonly successCount: number;
    readonly failureCount: number;
}

export interface ArmStats {
    readonly type: Readonly<Record<QuestionType, ArmStat>>;
    readonly difficulty: Readonly<Record<Difficulty, ArmStat>>;
}

export interface JobContext {
    readonly title: string;
    readonly description: string;
    readonly keySkills: readonly string[];
    readonly experienceLevel: Difficulty;
}

export type StopReason = 'max_questions' | 'plateau' | 'poor_performance';

export interface TerminationDecision {
    stop: boolean;
    reason: StopReason | null;
}

export interface PerformanceMetrics {
    readonly technical: number;
    readonly communication: number;
    readonly emotionalIntelligence: number;
    readonly behavioral: number;
    readonly overall: number;
    readonly strengths: readonly string[];
    readonly weaknesses: readonly string[];
    readonly recommendations: readonly string[];
}

export interface InterviewSession {
    readonly id: string;
    readonly candidateId: string;
    readonly jobContext: JobContext;
    readonly status: SessionStatus;
    readonly questionPool: readonly Question[];
    readonly questions: readonly Question[];
    readonly answers: readonly Answer[];
    readonly currentIndex: number;
    readonly createdAt: Date;
    readonly startedAt?: Date;
    readonly completedAt?: Date;
    readonly cancelledAt?: Date;
    readonly armStats: ArmStats;
    readonly metrics?: PerformanceMetrics;
    readonly stopReason?: StopReason;
    readonly version: number;
}

export type PerformanceLevel = 'low' | 'medium' | 'high';

export interface PerformanceSnapshot {
    technical: number;
    communication: number;
    confidence: number;
}

export interface ExchangeRecord {
    question: string;
    answer: string;
}

export type ScoreGrade = 'Excellent' | 'Very Good' | 'Good' | 'Fair' | 'Needs Improvement';

export interface QuestionFeedback {
    questionId: string;
    question: string;
    type: QuestionType;
    difficulty: Difficulty;
    response: string;
    score: number;
    feedback: string;
}

export interface SessionAnalysis {
    totalQuestions: number;
    totalAnswers: number;
    averageResponseSec: number;
    performanceTrend: 'Improving' | 'Declining' | 'Stable' | 'Insufficient data';
    questionTypeBreakdown: Partial<Record<QuestionType, number>>;
    difficultyProgression: Array<{ index: number; difficulty: Difficulty; score: number }>;
    difficultyTrend: 'Increasing' | 'Decreasing' | 'Stable' | 'Insufficient data';
    grades: Record<'technical' | 'communication' | 'emotionalIntelligence' | 'behavioral' | 'overall', ScoreGrade>;
    questionFeedback: QuestionFeedback[];
}
