import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { ILanguageAnalyzer, TextAnalysis } from '../types/collaborators';
import { Question } from '../types/interview';
import { IOpenAIService, getOpenAIService } from './openai.service';

const textAnalysisSchema = z.object({
    technical_score: z.number().min(0).max(1),
    sentiment_score: z.number().min(-1).max(1),
    confidence_score: z.number().min(0).max(1)
});

/**
 * Text Analysis Service
 *
 * Scores a transcribed answer against its question with a JSON completion.
 * A single attempt per call; the orchestrator owns retries and timeouts.
 */
export class TextAnalysisService implements ILanguageAnalyzer {
    constructor(
        private openaiService: IOpenAIService,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): TextAnalysisService {
        return new TextAnalysisService(getOpenAIService(), logger);
    }

    async analyzeText(question: Question, transcript: string, expectedKeywords: readonly string[]): Promise<TextAnalysis> {
        const keywords = expectedKeywords.length > 0 ? expectedKeywords.join(', ') : 'none given';

        try {
            const analysis = await this.openaiService.generateStructuredCompletion(
                [
                    {
                        role: 'system',
                        content: 'You grade interview answers. Reply with a single JSON object and nothing else.'
                    },
                    {
                        role: 'user',
                        content: `Score this interview answer.

Question (${question.type}, ${question.difficulty}): ${question.text}
Answer: ${transcript}
Expected keywords: ${keywords}

Return a JSON object with:
- technical_score: 0 to 1, technical accuracy and depth
- sentiment_score: -1 (negative) to 1 (positive)
- confidence_score: 0 to 1, how confident the answer sounds`
                    }
                ],
                textAnalysisSchema,
                { temperature: 0, maxAttempts: 1 }
            );

            this.logger.debug({
                questionId: question.id,
                technical: analysis.technical_score,
                sentiment: analysis.sentiment_score,
                confidence: analysis.confidence_score
            }, 'Answer text analyzed');

            return {
                technical: analysis.technical_score,
                sentiment: analysis.sentiment_score,
                confidence: analysis.confidence_score
            };
        } catch (error) {
            throw new ExternalServiceUnavailableError('text-analysis', errorMessage(error));
        }
    }
}

// Singleton instance
let textAnalysisService: TextAnalysisService | null = null;

export function getTextAnalysisService(): TextAnalysisService {
    if (!textAnalysisService) {
        textAnalysisService = TextAnalysisService.create();
    }
    return textAnalysisService;
}
