import {
    Answer,
    DIFFICULTY_ORDER,
    InterviewSession,
    PerformanceMetrics,
    Question,
    QuestionFeedback,
    QuestionType,
    ScoreGrade,
    SessionAnalysis
} from '../types/interview';
import { linearSlope, mean } from '../utils/statistics.util';

const STRENGTH_THRESHOLD = 0.8;
const WEAKNESS_THRESHOLD = 0.6;
const RECOMMENDATION_THRESHOLD = 0.7;

type Axis = 'technical' | 'communication' | 'emotionalIntelligence' | 'behavioral';

const AXIS_LABELS: Record<Axis, { strength: string; weakness: string }> = {
    technical: {
        strength: 'Strong technical knowledge',
        weakness: 'Technical knowledge needs improvement'
    },
    communication: {
        strength: 'Excellent communication skills',
        weakness: 'Communication skills need development'
    },
    emotionalIntelligence: {
        strength: 'High emotional intelligence',
        weakness: 'Emotional intelligence could be enhanced'
    },
    behavioral: {
        strength: 'Good behavioral responses',
        weakness: 'Behavioral responses need refinement'
    }
};

const AXES: readonly Axis[] = ['technical', 'communication', 'emotionalIntelligence', 'behavioral'];

function dominantEmotion(answer: Answer): number {
    const weights = Object.values(answer.emotionWeights);
    return weights.length > 0 ? Math.max(...weights) : 0.5;
}

export function scoreToGrade(score: number): ScoreGrade {
    if (score >= 0.9) return 'Excellent';
    if (score >= 0.8) return 'Very Good';
    if (score >= 0.7) return 'Good';
    if (score >= 0.6) return 'Fair';
    return 'Needs Improvement';
}

function answerFeedback(score: number): string {
    if (score >= 0.8) {
        return 'Excellent response! You demonstrated strong understanding.';
    }
    if (score >= 0.6) {
        return 'Good response with room for improvement.';
    }
    return 'Consider reviewing this topic and practicing similar questions.';
}

/**
 * Performance Summarizer
 *
 * Pure functions of a session's answers: the same session always yields the
 * same metrics and analysis.
 */
export class PerformanceSummarizer {
    summarize(session: InterviewSession): PerformanceMetrics {
        const answers = session.answers;
        const scores: Record<Axis, number> = {
            technical: mean(answers.map(answer => answer.technical)),
            communication: mean(answers.map(answer => (answer.fluency + answer.confidence) / 2)),
            emotionalIntelligence: mean(answers.map(dominantEmotion)),
            behavioral: mean(answers.map(answer => answer.sentiment))
        };

        const strengths = AXES.filter(axis => scores[axis] >= STRENGTH_THRESHOLD).map(axis => AXIS_LABELS[axis].strength);
        const weaknesses = AXES.filter(axis => scores[axis] < WEAKNESS_THRESHOLD).map(axis => AXIS_LABELS[axis].weakness);

        const metrics: PerformanceMetrics = {
            ...scores,
            // emotional intelligence and behavioral are reported but do not weigh in
            overall: (scores.technical + scores.communication) / 2,
            strengths: Object.freeze(strengths.length > 0 ? strengths : ['Areas for improvement identified']),
            weaknesses: Object.freeze(weaknesses.length > 0 ? weaknesses : ['No significant weaknesses identified']),
            recommendations: Object.freeze(this.recommendations(scores, session.jobContext.keySkills))
        };

        return Object.freeze(metrics);
    }

    /**
     * Detailed breakdown of a finished interview
     */
    analyze(session: InterviewSession): SessionAnalysis {
        const metrics = session.metrics ?? this.summarize(session);
        const questionsById = new Map(session.questions.map(question => [question.id, question]));
        const answered = session.answers.flatMap(answer => {
            const question = questionsById.get(answer.questionId);
            return question ? [{ question, answer }] : [];
        });

        const scores = session.answers.map(answer => answer.technical);
        let performanceTrend: SessionAnalysis['performanceTrend'] = 'Insufficient data';
        if (scores.length >= 3) {
            const slope = linearSlope(scores);
            performanceTrend = slope > 0.05 ? 'Improving' : slope < -0.05 ? 'Declining' : 'Stable';
        }

        const difficultyProgression = answered.map(({ question, answer }, index) => ({
            index,
            difficulty: question.difficulty,
            score: answer.technical
        }));

        let difficultyTrend: SessionAnalysis['difficultyTrend'] = 'Insufficient data';
        if (difficultyProgression.length >= 3) {
            const slope = linearSlope(difficultyProgression.map(entry => DIFFICULTY_ORDER.indexOf(entry.difficulty) + 1));
            difficultyTrend = slope > 0.1 ? 'Increasing' : slope < -0.1 ? 'Decreasing' : 'Stable';
        }

        return {
            totalQuestions: session.questions.length,
            totalAnswers: session.answers.length,
            averageResponseSec: mean(session.answers.map(answer => answer.audioDurationSec)),
            performanceTrend,
            questionTypeBreakdown: this.typeBreakdown(answered),
            difficultyProgression,
            difficultyTrend,
            grades: {
                technical: scoreToGrade(metrics.technical),
                communication: scoreToGrade(metrics.communication),
                emotionalIntelligence: scoreToGrade(metrics.emotionalIntelligence),
                behavioral: scoreToGrade(metrics.behavioral),
                overall: scoreToGrade(metrics.overall)
            },
            questionFeedback: answered.map(({ question, answer }): QuestionFeedback => ({
                questionId: question.id,
                question: question.text,
                type: question.type,
                difficulty: question.difficulty,
                response: answer.transcript,
                score: answer.technical,
                feedback: answerFeedback(answer.technical)
            }))
        };
    }

    private recommendations(scores: Record<Axis, number>, keySkills: readonly string[]): string[] {
        const recommendations: string[] = [];

        if (scores.technical < RECOMMENDATION_THRESHOLD) {
            recommendations.push(keySkills.length > 0
                ? `Focus on improving ${keySkills.slice(0, 2).join(', ')} skills`
                : 'Review the core technical concepts for this role');
        }
        if (scores.communication < RECOMMENDATION_THRESHOLD) {
            recommendations.push('Practice clear and structured communication');
        }
        if (scores.emotionalIntelligence < RECOMMENDATION_THRESHOLD) {
            recommendations.push('Work on confidence and stress management');
        }
        if (scores.behavioral < RECOMMENDATION_THRESHOLD) {
            recommendations.push('Structure behavioral answers around concrete situations and outcomes');
        }

        recommendations.push('Continue practicing mock interviews');
        recommendations.push('Research the company and role thoroughly');

        return recommendations;
    }

    private typeBreakdown(answered: Array<{ question: Question; answer: Answer }>): Partial<Record<QuestionType, number>> {
        const byType = new Map<QuestionType, number[]>();
        for (const { question, answer } of answered) {
            const scores = byType.get(question.type) ?? [];
            scores.push(answer.technical);
            byType.set(question.type, scores);
        }

        const breakdown: Partial<Record<QuestionType, number>> = {};
        for (const [type, scores] of byType) {
            breakdown[type] = mean(scores);
        }
        return breakdown;
    }
}
