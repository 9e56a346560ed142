import {
  AttemptStore,
  LeaderboardRow,
  QuestionRepository,
  SessionStatus,
  StudentProgress,
  SubmissionResult,
} from '../types';
import { KeyedLock } from '../utils/keyedLock';
import { AnswerCollector, AnswerUpdate } from './answer.service';
import { LeaderboardAggregator } from './leaderboard.service';
import { ScoringEngine } from './scoring.service';
import {
  CreateSessionInput,
  CreatedSession,
  SessionManager,
  SessionStatusView,
  SessionStore,
} from './session.service';

export interface QuizServiceDeps {
  questions: QuestionRepository;
  attempts: AttemptStore;
  now?: () => Date;
}

/**
 * Entry point for everything a learner does with a quiz. The session store and
 * lock are created here and shared by the components that touch sessions.
 */
export class QuizService {
  private readonly sessions: SessionManager;
  private readonly answers: AnswerCollector;
  private readonly scoring: ScoringEngine;
  private readonly leaderboard: LeaderboardAggregator;

  constructor({ questions, attempts, now }: QuizServiceDeps) {
    const store = new SessionStore();
    const lock = new KeyedLock();
    this.sessions = new SessionManager(questions, store, lock, now);
    this.answers = new AnswerCollector(store, lock);
    this.scoring = new ScoringEngine(questions, attempts, store, lock, now);
    this.leaderboard = new LeaderboardAggregator(attempts);
  }

  createSession(studentId: string, input: CreateSessionInput): Promise<CreatedSession> {
    return this.sessions.createSession(studentId, input);
  }

  setAnswer(studentId: string, questionId: string, answer: string | null): Promise<AnswerUpdate> {
    return this.answers.setAnswer(studentId, questionId, answer);
  }

  submit(studentId: string): Promise<SubmissionResult> {
    return this.scoring.submit(studentId);
  }

  resetSession(studentId: string): Promise<SessionStatus> {
    return this.sessions.resetSession(studentId);
  }

  getStatus(studentId: string): SessionStatusView {
    return this.sessions.getStatus(studentId);
  }

  getLeaderboard(): Promise<LeaderboardRow[]> {
    return this.leaderboard.aggregate();
  }

  getStudentProgress(studentId: string): Promise<StudentProgress> {
    return this.leaderboard.progressFor(studentId);
  }
}
