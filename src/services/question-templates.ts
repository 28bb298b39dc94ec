import { Difficulty, Question, QuestionType } from '../types/interview';

function freezeAll(questions: Question[]): readonly Question[] {
    return Object.freeze(questions.map(question => Object.freeze(question)));
}

/**
 * Built-in questions used when the generator cannot produce a pool.
 */
export const DEFAULT_QUESTION_BANK = freezeAll([
    {
        id: 'bank-technical-1',
        text: 'Could you walk me through your experience with the core technologies this role uses?',
        type: QuestionType.Technical,
        difficulty: Difficulty.Beginner,
        category: 'Technical Knowledge',
        expectedKeywords: ['experience', 'technology', 'skills', 'project'],
        source: 'pool'
    },
    {
        id: 'bank-technical-2',
        text: 'Explain object-oriented programming and the principles behind it.',
        type: QuestionType.Technical,
        difficulty: Difficulty.Intermediate,
        category: 'Programming Fundamentals',
        expectedKeywords: ['encapsulation', 'inheritance', 'polymorphism', 'abstraction'],
        source: 'pool'
    },
    {
        id: 'bank-behavioral-1',
        text: 'Tell me about a time you had to work with a difficult team member.',
        type: QuestionType.Behavioral,
        difficulty: Difficulty.Intermediate,
        category: 'Teamwork',
        expectedKeywords: ['conflict', 'resolution', 'communication', 'collaboration'],
        source: 'pool'
    },
    {
        id: 'bank-situational-1',
        text: "How would you handle disagreeing with your manager's technical decision?",
        type: QuestionType.Situational,
        difficulty: Difficulty.Advanced,
        category: 'Problem Solving',
        expectedKeywords: ['respect', 'communication', 'evidence', 'compromise'],
        source: 'pool'
    },
    {
        id: 'bank-problem-solving-1',
        text: 'Design a URL shortening service. How would it scale?',
        type: QuestionType.ProblemSolving,
        difficulty: Difficulty.Advanced,
        category: 'System Design',
        expectedKeywords: ['database', 'hashing', 'scalability', 'cache'],
        source: 'pool'
    },
    {
        id: 'bank-cultural-fit-1',
        text: 'What kind of work environment do you do your best work in?',
        type: QuestionType.CulturalFit,
        difficulty: Difficulty.Beginner,
        category: 'Culture',
        expectedKeywords: ['collaborative', 'independent', 'structured', 'flexible'],
        source: 'pool'
    },
    {
        id: 'bank-behavioral-2',
        text: 'Describe a challenging situation at work and how you handled it.',
        type: QuestionType.Behavioral,
        difficulty: Difficulty.Intermediate,
        category: 'Problem Solving',
        expectedKeywords: ['challenge', 'solution', 'result', 'teamwork'],
        source: 'pool'
    }
]);

interface FallbackTemplate {
    text: string;
    category: string;
    keywords: readonly string[];
}

const FALLBACK_TEMPLATES: Record<Difficulty, FallbackTemplate> = {
    [Difficulty.Beginner]: {
        text: 'Could you tell me about your background and experience?',
        category: 'Background',
        keywords: ['background', 'experience', 'skills', 'introduction']
    },
    [Difficulty.Intermediate]: {
        text: "Can you describe a project you're particularly proud of?",
        category: 'Experience',
        keywords: ['project', 'challenges', 'solutions', 'achievements']
    },
    [Difficulty.Advanced]: {
        text: 'How would you approach solving a complex technical problem?',
        category: 'Problem Solving',
        keywords: ['approach', 'problem', 'solution', 'technical']
    },
    [Difficulty.Expert]: {
        text: 'Can you discuss your experience with system architecture and design patterns?',
        category: 'Architecture',
        keywords: ['architecture', 'design', 'patterns', 'systems']
    }
};

/**
 * Deterministic stand-in for a generated question.
 * `sequence` keeps ids unique when the fallback fires more than once per session.
 */
export function buildFallbackQuestion(difficulty: Difficulty, sequence: number): Question {
    const template = FALLBACK_TEMPLATES[difficulty];
    const question: Question = {
        id: `fallback-${difficulty}-${sequence}`,
        text: template.text,
        type: QuestionType.Behavioral,
        difficulty,
        category: template.category,
        expectedKeywords: template.keywords,
        source: 'fallback'
    };
    return Object.freeze(question);
}
