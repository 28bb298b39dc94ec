import {
    Difficulty,
    ExchangeRecord,
    InterviewSession,
    PerformanceSnapshot,
    Question
} from './interview';

/**
 * Contracts for the services the engine talks to but does not own.
 * Adapters live in src/services; tests substitute vi.fn() doubles.
 */

export interface AudioFeatures {
    fluency: number;
    pitch: number;
    emotionWeights: Record<string, number>;
    durationSec: number;
}

export interface TextAnalysis {
    technical: number;
    sentiment: number;
    confidence: number;
}

export interface JobRequirements {
    keySkills: string[];
    experienceLevel: Difficulty;
}

export interface ITranscriber {
    transcribe(audio: Buffer): Promise<string>;
}

export interface IAudioFeatureExtractor {
    extract(audio: Buffer): Promise<AudioFeatures>;
}

export interface ILanguageAnalyzer {
    analyzeText(question: Question, transcript: string, expectedKeywords: readonly string[]): Promise<TextAnalysis>;
}

export interface IQuestionGenerator {
    generateQuestionPool(jobTitle: string, jobDescription: string): Promise<Question[]>;
    generateContextualQuestion(
        jobDescription: string,
        recentHistory: ExchangeRecord[],
        askedIds: string[],
        performance: PerformanceSnapshot & { targetDifficulty: Difficulty }
    ): Promise<Question>;
    analyzeJobDescription(jobTitle: string, jobDescription: string): Promise<JobRequirements>;
}

export interface ISessionStore {
    persist(session: InterviewSession): Promise<void>;
    load(sessionId: string): Promise<InterviewSession>;
}

export interface ISpeechSynthesizer {
    synthesize(text: string): Promise<Buffer>;
}
