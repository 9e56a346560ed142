import {
  AnswerLetter,
  PublicQuestion,
  Question,
  QuestionRepository,
  SessionStatus,
  SubmissionResult,
} from '../types';
import { ApiError } from '../utils/ApiError';
import { InvalidSessionStateError, NoQuestionsAvailableError } from '../utils/quizErrors';
import { KeyedLock } from '../utils/keyedLock';
import logger from '../config/logger';

interface SessionBase {
  studentId: string;
  questionIds: string[];
  questions: PublicQuestion[];
  answers: Map<string, AnswerLetter | null>;
  createdAt: Date;
}

export interface ActiveSession extends SessionBase {
  status: 'active';
}

export interface SubmittedSession extends SessionBase {
  status: 'submitted';
  result: SubmissionResult;
  submittedAt: Date;
}

export type QuizSession = ActiveSession | SubmittedSession;

export interface SessionQuestionView extends PublicQuestion {
  selected: AnswerLetter | null;
}

export interface SessionView {
  status: SessionStatus;
  questions: SessionQuestionView[];
  answered: number;
  total: number;
  createdAt: string;
  submittedAt?: string;
  result?: SubmissionResult;
}

export interface SessionStatusView {
  status: SessionStatus;
  session: SessionView | null;
}

export interface SelectionNotice {
  requested: number;
  available: number;
  shortfall: true;
}

export interface CreateSessionInput {
  subject?: string;
  count: number;
  /** Discard an active session first instead of refusing. */
  restart?: boolean;
}

export interface CreatedSession {
  session: SessionView;
  notice: SelectionNotice | null;
}

/**
 * In-memory map of learner id to their current session. Absence of an entry
 * is the `empty` state.
 */
export class SessionStore {
  private readonly sessions = new Map<string, QuizSession>();

  get(studentId: string): QuizSession | undefined {
    return this.sessions.get(studentId);
  }

  set(session: QuizSession): void {
    this.sessions.set(session.studentId, session);
  }

  delete(studentId: string): boolean {
    return this.sessions.delete(studentId);
  }

  statusOf(studentId: string): SessionStatus {
    return this.sessions.get(studentId)?.status ?? 'empty';
  }
}

const toPublicQuestion = ({ answer: _answer, ...rest }: Question): PublicQuestion => rest;

const uniqueById = (questions: Question[]): Question[] => {
  const seen = new Set<string>();
  return questions.filter((q) => {
    if (seen.has(q.id)) return false;
    seen.add(q.id);
    return true;
  });
};

export const countAnswered = (session: QuizSession): number => {
  let answered = 0;
  for (const letter of session.answers.values()) {
    if (letter !== null) answered++;
  }
  return answered;
};

export const toSessionView = (session: QuizSession): SessionView => {
  const view: SessionView = {
    status: session.status,
    questions: session.questions.map((q) => ({ ...q, selected: session.answers.get(q.id) ?? null })),
    answered: countAnswered(session),
    total: session.questionIds.length,
    createdAt: session.createdAt.toISOString(),
  };
  if (session.status === 'submitted') {
    view.submittedAt = session.submittedAt.toISOString();
    view.result = { ...session.result };
  }
  return view;
};

/**
 * Owns the lifecycle of each learner's quiz: selection of questions, reset and
 * status. Mutating operations share the per-learner lock with answer
 * collection and scoring.
 */
export class SessionManager {
  constructor(
    private readonly questions: QuestionRepository,
    private readonly store: SessionStore,
    private readonly lock: KeyedLock,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createSession(studentId: string, input: CreateSessionInput): Promise<CreatedSession> {
    const { subject, count, restart = false } = input;
    if (!Number.isInteger(count) || count < 1) {
      throw ApiError.badRequest('Question count must be a positive integer');
    }

    return this.lock.runExclusive(studentId, async () => {
      const current = this.store.get(studentId);
      if (current?.status === 'active' && !restart) {
        throw new InvalidSessionStateError(
          'A quiz is already in progress; reset it before starting a new one',
          'active'
        );
      }

      // The previous session stays in place until a replacement is ready
      const selected = uniqueById(await this.questions.sampleRandom(subject, count)).slice(0, count);
      if (selected.length === 0) {
        throw new NoQuestionsAvailableError(subject);
      }

      const session: ActiveSession = {
        studentId,
        status: 'active',
        questionIds: selected.map((q) => q.id),
        questions: selected.map(toPublicQuestion),
        answers: new Map(selected.map((q) => [q.id, null])),
        createdAt: this.now(),
      };
      this.store.set(session);
      if (current?.status === 'active') {
        logger.info(`Quiz session restarted for student ${studentId}`);
      }

      const notice: SelectionNotice | null =
        selected.length < count
          ? { requested: count, available: selected.length, shortfall: true }
          : null;

      logger.info(
        `Quiz session created for student ${studentId}: ${selected.length} questions` +
          (subject ? ` in ${subject}` : '') +
          (notice ? ` (requested ${count})` : '')
      );

      return { session: toSessionView(session), notice };
    });
  }

  /**
   * Drops whatever session the learner has, answered or not. Returns the
   * status it had before.
   */
  async resetSession(studentId: string): Promise<SessionStatus> {
    return this.lock.runExclusive(studentId, () => {
      const previous = this.store.statusOf(studentId);
      this.store.delete(studentId);
      if (previous !== 'empty') {
        logger.info(`Quiz session reset for student ${studentId} (was ${previous})`);
      }
      return previous;
    });
  }

  getStatus(studentId: string): SessionStatusView {
    const session = this.store.get(studentId);
    if (!session) {
      return { status: 'empty', session: null };
    }
    return { status: session.status, session: toSessionView(session) };
  }
}
