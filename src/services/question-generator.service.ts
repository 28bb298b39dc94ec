import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger, ILogger } from '../config/logger';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { IQuestionGenerator, JobRequirements } from '../types/collaborators';
import {
    DIFFICULTY_ORDER,
    Difficulty,
    ExchangeRecord,
    PerformanceSnapshot,
    QUESTION_TYPES,
    Question,
    QuestionType
} from '../types/interview';
import { ChatMessage, IOpenAIService, getOpenAIService } from './openai.service';

/**
 * Map free-form type labels ("Problem-Solving", "cultural fit") onto QuestionType
 */
export function normalizeQuestionType(value: string): QuestionType | null {
    const normalized = value.trim().toLowerCase().replace(/[-\s]+/g, '_');
    return QUESTION_TYPES.find(type => type === normalized) ?? null;
}

const questionTypeSchema = z.string().transform((value, ctx) => {
    const type = normalizeQuestionType(value);
    if (!type) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown question type "${value}"` });
        return z.NEVER;
    }
    return type;
});

const difficultySchema = z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.nativeEnum(Difficulty)
);

const generatedQuestionSchema = z.object({
    text: z.string().trim().min(1),
    type: questionTypeSchema,
    difficulty: difficultySchema,
    category: z.string().trim().min(1).default('General'),
    expected_keywords: z.array(z.string()).default([])
});

const contextualQuestionSchema = generatedQuestionSchema.extend({
    difficulty: difficultySchema.optional()
});

// Items are validated one by one so a single malformed question does not sink the pool
const questionPoolSchema = z.object({
    questions: z.array(z.unknown())
});

const jobRequirementsSchema = z.object({
    key_skills: z.array(z.string().trim().min(1)).min(1),
    experience_level: difficultySchema
});

const SYSTEM_PROMPT: ChatMessage = {
    role: 'system',
    content: 'You are an experienced technical interviewer. Reply with a single JSON object and nothing else.'
};

function formatHistory(history: ExchangeRecord[]): string {
    if (history.length === 0) {
        return 'No questions answered yet.';
    }
    return history
        .map((exchange, index) => `Q${index + 1}: ${exchange.question}\nA${index + 1}: ${exchange.answer}`)
        .join('\n\n');
}

/**
 * Question Generator Service
 *
 * Builds question pools and follow-up questions from a job description, and
 * extracts the job's key skills and expected level. All three calls are JSON
 * completions validated with zod; anything the model gets wrong surfaces as
 * ExternalServiceUnavailableError('question-generator') and the caller
 * decides on a fallback.
 */
export class QuestionGeneratorService implements IQuestionGenerator {
    constructor(
        private openaiService: IOpenAIService,
        private logger: ILogger,
        private createContextualId: () => string = () => `ctx-${randomUUID().slice(0, 8)}`
    ) { }

    /**
     * Factory method for production use
     */
    static create(): QuestionGeneratorService {
        return new QuestionGeneratorService(getOpenAIService(), logger);
    }

    /**
     * Generate the initial candidate pool, easiest questions first
     */
    async generateQuestionPool(jobTitle: string, jobDescription: string): Promise<Question[]> {
        const messages: ChatMessage[] = [
            SYSTEM_PROMPT,
            {
                role: 'user',
                content: `Generate 20 diverse interview questions for a ${jobTitle} position.

Job Description: ${jobDescription}

Progress naturally in difficulty: 3 beginner (warm-up), 5 intermediate (practical application),
7 advanced (complex scenarios) and 5 expert (architecture, design trade-offs).
Phrase every question the way a human interviewer would ask it.

Return {"questions": [...]} where each question has:
- text: the question
- type: one of ${QUESTION_TYPES.join(', ')}
- difficulty: one of ${DIFFICULTY_ORDER.join(', ')}
- category: a short topic label
- expected_keywords: keywords a strong answer would mention`
            }
        ];

        const response = await this.request('question pool', messages, questionPoolSchema);

        const seen = new Set<string>();
        const valid: Array<z.infer<typeof generatedQuestionSchema>> = [];
        let rejected = 0;
        for (const item of response.questions) {
            const parsed = generatedQuestionSchema.safeParse(item);
            if (!parsed.success) {
                rejected++;
                continue;
            }
            const key = parsed.data.text.toLowerCase();
            if (seen.has(key)) {
                rejected++;
                continue;
            }
            seen.add(key);
            valid.push(parsed.data);
        }

        if (valid.length === 0) {
            throw new ExternalServiceUnavailableError('question-generator', 'generated pool contained no valid questions');
        }

        // Array.prototype.sort is stable, so model order is kept within a difficulty
        valid.sort((a, b) => DIFFICULTY_ORDER.indexOf(a.difficulty) - DIFFICULTY_ORDER.indexOf(b.difficulty));

        const pool = valid.map((question, index) => this.toQuestion(`pool-${index + 1}`, question, question.difficulty, 'pool'));

        this.logger.info({
            jobTitle,
            poolSize: pool.length,
            rejected
        }, 'Question pool generated');

        return pool;
    }

    /**
     * Generate one follow-up question that builds on the recent conversation
     */
    async generateContextualQuestion(
        jobDescription: string,
        recentHistory: ExchangeRecord[],
        askedIds: string[],
        performance: PerformanceSnapshot & { targetDifficulty: Difficulty }
    ): Promise<Question> {
        const messages: ChatMessage[] = [
            SYSTEM_PROMPT,
            {
                role: 'user',
                content: `You are interviewing a candidate for this position:

Job Description: ${jobDescription}

Current performance:
- Technical: ${performance.technical.toFixed(2)}
- Communication: ${performance.communication.toFixed(2)}
- Confidence: ${performance.confidence.toFixed(2)}

Conversation so far:
${formatHistory(recentHistory)}

${askedIds.length} questions have been asked already. Ask the next one:
1. Difficulty: ${performance.targetDifficulty}
2. Build on the previous answers where it makes sense, but cover a different aspect
3. If the candidate is struggling (scores below 0.6) keep it simple and encouraging
4. Open with a short conversational transition

Return a JSON object with text, type (one of ${QUESTION_TYPES.join(', ')}),
difficulty, category and expected_keywords.`
            }
        ];

        const generated = await this.request('contextual question', messages, contextualQuestionSchema);
        const question = this.toQuestion(
            this.createContextualId(),
            generated,
            generated.difficulty ?? performance.targetDifficulty,
            'generated'
        );

        this.logger.debug({
            questionId: question.id,
            type: question.type,
            difficulty: question.difficulty
        }, 'Contextual question generated');

        return question;
    }

    /**
     * Extract key skills and the expected experience level from a job description
     */
    async analyzeJobDescription(jobTitle: string, jobDescription: string): Promise<JobRequirements> {
        const messages: ChatMessage[] = [
            SYSTEM_PROMPT,
            {
                role: 'user',
                content: `Analyze this job description and extract its requirements.

Job Title: ${jobTitle}
Job Description: ${jobDescription}

Return a JSON object with:
- key_skills: the technical skills required, most important first
- experience_level: one of ${DIFFICULTY_ORDER.join(', ')}`
            }
        ];

        const requirements = await this.request('job analysis', messages, jobRequirementsSchema);

        return {
            keySkills: requirements.key_skills,
            experienceLevel: requirements.experience_level
        };
    }

    private async request<T>(
        operation: string,
        messages: ChatMessage[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>
    ): Promise<T> {
        try {
            return await this.openaiService.generateStructuredCompletion(messages, schema);
        } catch (error) {
            this.logger.error({
                operation,
                error: errorMessage(error)
            }, 'Question generation request failed');
            throw new ExternalServiceUnavailableError('question-generator', `${operation} failed: ${errorMessage(error)}`);
        }
    }

    private toQuestion(
        id: string,
        generated: { text: string; type: QuestionType; category: string; expected_keywords: string[] },
        difficulty: Difficulty,
        source: Question['source']
    ): Question {
        const question: Question = {
            id,
            text: generated.text,
            type: generated.type,
            difficulty,
            category: generated.category,
            expectedKeywords: Object.freeze([...generated.expected_keywords]),
            source
        };
        return Object.freeze(question);
    }
}

// Singleton instance
let questionGeneratorService: QuestionGeneratorService | null = null;

export function getQuestionGeneratorService(): QuestionGeneratorService {
    if (!questionGeneratorService) {
        questionGeneratorService = QuestionGeneratorService.create();
    }
    return questionGeneratorService;
}
