export type UserRole = 'student' | 'teacher';
export type Difficulty = 'Easy' | 'Medium' | 'Hard';

export const ANSWER_LETTERS = ['A', 'B', 'C', 'D'] as const;
export type AnswerLetter = (typeof ANSWER_LETTERS)[number];

export type SessionStatus = 'empty' | 'active' | 'submitted';
export type Tier = 'perfect' | 'near_perfect' | 'good' | 'encourage';

export interface QuestionOptions {
  A: string;
  B: string;
  C: string;
  D: string;
}

export interface Question {
  id: string;
  question: string;
  options: QuestionOptions;
  answer: string;
  subject: string;
  chapter: string;
  topic: string;
  difficulty: Difficulty;
  type: string;
}

/**
 * What a learner gets to see of a question: everything but the canonical answer.
 */
export type PublicQuestion = Omit<Question, 'answer'>;

export type NewQuestion = Omit<Question, 'id'>;

export interface NewAttempt {
  studentId: string;
  questionId: string;
  isCorrect: boolean;
  timestamp: Date;
}

export interface Attempt extends NewAttempt {
  id: string;
}

export interface SubmissionResult {
  correct: number;
  total: number;
  accuracy: number;
  xp: number;
  tier: Tier;
}

export interface LeaderboardRow {
  studentId: string;
  attempted: number;
  correct: number;
  xp: number;
  accuracy: number;
  rank: number;
}

export interface StudentProgress {
  studentId: string;
  attempted: number;
  correct: number;
  accuracy: number;
}

/**
 * Source of questions and their canonical answers.
 */
export interface QuestionRepository {
  /**
   * Up to `count` distinct questions in random order, restricted to `subject` when given.
   */
  sampleRandom(subject: string | undefined, count: number): Promise<Question[]>;
  /**
   * Rejects with QuestionNotFoundError for an unknown id.
   */
  getCanonicalAnswer(questionId: string): Promise<string>;
  insertIfAbsent(input: NewQuestion): Promise<{ question: Question; created: boolean }>;
  listSubjects(): Promise<string[]>;
}

/**
 * Append-only record of scored answers.
 */
export interface AttemptStore {
  /**
   * Either every row of the batch is stored or none is.
   */
  appendAttempts(batch: NewAttempt[]): Promise<void>;
  readAll(): Promise<Attempt[]>;
  readByStudent(studentId: string): Promise<Attempt[]>;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: {
        userId: string;
        email?: string;
        role: UserRole;
      };
    }
  }
}
