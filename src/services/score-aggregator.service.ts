import { Answer, Question, ScoreSource } from '../types/interview';
import { AudioFeatures, TextAnalysis } from '../types/collaborators';
import { clamp } from '../utils/statistics.util';

export const NEUTRAL_UNIT_SCORE = 0.5;
export const NEUTRAL_SENTIMENT = 0;

export interface ScoreMeta {
    audioDurationSec?: number;
    timestamp?: Date;
}

function normalizeEmotionWeights(weights: Record<string, number>): Record<string, number> {
    const positive = Object.entries(weights).filter(([, weight]) => Number.isFinite(weight) && weight > 0);
    const total = positive.reduce((sum, [, weight]) => sum + weight, 0);
    if (total === 0) {
        return {};
    }
    return Object.fromEntries(positive.map(([label, weight]) => [label, weight / total]));
}

/**
 * Score Aggregator
 *
 * Folds the audio-feature and text-analysis signals for one response into an
 * immutable Answer. The two sources are not cross-checked: text analysis owns
 * technical, sentiment and confidence; audio owns fluency and emotions. A
 * missing source (null) leaves its axes at the neutral value and is listed in
 * `degradedSources`.
 */
export class ScoreAggregator {
    score(
        transcript: string,
        audioFeatures: AudioFeatures | null,
        textAnalysis: TextAnalysis | null,
        question: Question,
        meta: ScoreMeta = {}
    ): Answer {
        const degradedSources: ScoreSource[] = [];
        if (transcript.trim().length === 0) {
            degradedSources.push('transcription');
        }
        if (!audioFeatures) {
            degradedSources.push('audio');
        }
        if (!textAnalysis) {
            degradedSources.push('text');
        }

        const answer: Answer = {
            questionId: question.id,
            transcript,
            technical: textAnalysis ? clamp(textAnalysis.technical, 0, 1) : NEUTRAL_UNIT_SCORE,
            confidence: textAnalysis ? clamp(textAnalysis.confidence, 0, 1) : NEUTRAL_UNIT_SCORE,
            sentiment: textAnalysis ? clamp(textAnalysis.sentiment, -1, 1) : NEUTRAL_SENTIMENT,
            fluency: audioFeatures ? clamp(audioFeatures.fluency, 0, 1) : NEUTRAL_UNIT_SCORE,
            emotionWeights: Object.freeze(audioFeatures ? normalizeEmotionWeights(audioFeatures.emotionWeights) : {}),
            audioDurationSec: Math.max(0, meta.audioDurationSec ?? audioFeatures?.durationSec ?? 0),
            timestamp: meta.timestamp ?? new Date(),
            degradedSources: Object.freeze(degradedSources)
        };

        return Object.freeze(answer);
    }
}
