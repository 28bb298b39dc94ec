import { z } from 'zod';
import { ValidationError } from '../errors/interview-errors';
import {
    Answer,
    ArmStat,
    Difficulty,
    InterviewSession,
    Question,
    QuestionType,
    SessionStatus
} from '../types/interview';

export const SESSION_SCHEMA_VERSION = 1;

const isoDate = z.string().datetime({ offset: true });

const armStatSchema = z.object({
    successCount: z.number().int().nonnegative(),
    failureCount: z.number().int().nonnegative()
});

const questionSchema = z.object({
    id: z.string().min(1),
    text: z.string(),
    type: z.nativeEnum(QuestionType),
    difficulty: z.nativeEnum(Difficulty),
    category: z.string(),
    expectedKeywords: z.array(z.string()),
    source: z.enum(['pool', 'generated', 'fallback'])
});

const answerSchema = z.object({
    questionId: z.string().min(1),
    transcript: z.string(),
    technical: z.number().min(0).max(1),
    fluency: z.number().min(0).max(1),
    confidence: z.number().min(0).max(1),
    sentiment: z.number().min(-1).max(1),
    emotionWeights: z.record(z.number()),
    audioDurationSec: z.number().nonnegative(),
    timestamp: isoDate,
    degradedSources: z.array(z.enum(['transcription', 'audio', 'text']))
});

const metricsSchema = z.object({
    technical: z.number(),
    communication: z.number(),
    emotionalIntelligence: z.number(),
    behavioral: z.number(),
    overall: z.number(),
    strengths: z.array(z.string()),
    weaknesses: z.array(z.string()),
    recommendations: z.array(z.string())
});

/**
 * Stored shape of a session, version 1. Dates are ISO strings.
 */
export const sessionDocumentV1Schema = z.object({
    id: z.string().min(1),
    candidateId: z.string().min(1),
    jobContext: z.object({
        title: z.string(),
        description: z.string(),
        keySkills: z.array(z.string()),
        experienceLevel: z.nativeEnum(Difficulty)
    }),
    status: z.nativeEnum(SessionStatus),
    questionPool: z.array(questionSchema),
    questions: z.array(questionSchema),
    answers: z.array(answerSchema),
    currentIndex: z.number().int().nonnegative(),
    createdAt: isoDate,
    startedAt: isoDate.optional(),
    completedAt: isoDate.optional(),
    cancelledAt: isoDate.optional(),
    armStats: z.object({
        type: z.object({
            [QuestionType.Technical]: armStatSchema,
            [QuestionType.Behavioral]: armStatSchema,
            [QuestionType.Situational]: armStatSchema,
            [QuestionType.ProblemSolving]: armStatSchema,
            [QuestionType.CulturalFit]: armStatSchema
        }),
        difficulty: z.object({
            [Difficulty.Beginner]: armStatSchema,
            [Difficulty.Intermediate]: armStatSchema,
            [Difficulty.Advanced]: armStatSchema,
            [Difficulty.Expert]: armStatSchema
        })
    }),
    metrics: metricsSchema.optional(),
    stopReason: z.enum(['max_questions', 'plateau', 'poor_performance']).optional(),
    version: z.number().int().positive()
});

export type SessionDocumentV1 = z.infer<typeof sessionDocumentV1Schema>;

function freezeQuestion(question: z.infer<typeof questionSchema>): Question {
    return Object.freeze({ ...question, expectedKeywords: Object.freeze(question.expectedKeywords) });
}

function freezeAnswer(answer: z.infer<typeof answerSchema>): Answer {
    return Object.freeze({
        ...answer,
        timestamp: new Date(answer.timestamp),
        emotionWeights: Object.freeze(answer.emotionWeights),
        degradedSources: Object.freeze(answer.degradedSources)
    });
}

function freezeArms<K extends string>(arms: Record<K, ArmStat>): Readonly<Record<K, ArmStat>> {
    return Object.freeze(arms);
}

export function serializeSession(session: InterviewSession): SessionDocumentV1 {
    return {
        id: session.id,
        candidateId: session.candidateId,
        jobContext: { ...session.jobContext, keySkills: [...session.jobContext.keySkills] },
        status: session.status,
        questionPool: session.questionPool.map(question => ({ ...question, expectedKeywords: [...question.expectedKeywords] })),
        questions: session.questions.map(question => ({ ...question, expectedKeywords: [...question.expectedKeywords] })),
        answers: session.answers.map(answer => ({
            ...answer,
            emotionWeights: { ...answer.emotionWeights },
            timestamp: answer.timestamp.toISOString(),
            degradedSources: [...answer.degradedSources]
        })),
        currentIndex: session.currentIndex,
        createdAt: session.createdAt.toISOString(),
        startedAt: session.startedAt?.toISOString(),
        completedAt: session.completedAt?.toISOString(),
        cancelledAt: session.cancelledAt?.toISOString(),
        armStats: {
            type: { ...session.armStats.type },
            difficulty: { ...session.armStats.difficulty }
        },
        metrics: session.metrics && {
            ...session.metrics,
            strengths: [...session.metrics.strengths],
            weaknesses: [...session.metrics.weaknesses],
            recommendations: [...session.metrics.recommendations]
        },
        stopReason: session.stopReason,
        version: session.version
    };
}

/**
 * Validate a stored document and rebuild the frozen session
 */
export function deserializeSession(schemaVersion: number, document: unknown): InterviewSession {
    if (schemaVersion !== SESSION_SCHEMA_VERSION) {
        throw new ValidationError(`Unsupported session schema version ${schemaVersion}`, { schemaVersion });
    }

    const parsed = sessionDocumentV1Schema.safeParse(document);
    if (!parsed.success) {
        throw new ValidationError('Stored session document is invalid', parsed.error.errors.map(issue => ({
            path: issue.path.join('.'),
            message: issue.message
        })));
    }
    const doc = parsed.data;

    const session: InterviewSession = {
        id: doc.id,
        candidateId: doc.candidateId,
        jobContext: Object.freeze({ ...doc.jobContext, keySkills: Object.freeze(doc.jobContext.keySkills) }),
        status: doc.status,
        questionPool: Object.freeze(doc.questionPool.map(freezeQuestion)),
        questions: Object.freeze(doc.questions.map(freezeQuestion)),
        answers: Object.freeze(doc.answers.map(freezeAnswer)),
        currentIndex: doc.currentIndex,
        createdAt: new Date(doc.createdAt),
        ...(doc.startedAt ? { startedAt: new Date(doc.startedAt) } : {}),
        ...(doc.completedAt ? { completedAt: new Date(doc.completedAt) } : {}),
        ...(doc.cancelledAt ? { cancelledAt: new Date(doc.cancelledAt) } : {}),
        armStats: Object.freeze({
            type: freezeArms(doc.armStats.type),
            difficulty: freezeArms(doc.armStats.difficulty)
        }),
        ...(doc.metrics && {
            metrics: Object.freeze({
                ...doc.metrics,
                strengths: Object.freeze(doc.metrics.strengths),
                weaknesses: Object.freeze(doc.metrics.weaknesses),
                recommendations: Object.freeze(doc.metrics.recommendations)
            })
        }),
        ...(doc.stopReason ? { stopReason: doc.stopReason } : {}),
        version: doc.version
    };

    return Object.freeze(session);
}
