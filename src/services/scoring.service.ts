import { AttemptStore, NewAttempt, QuestionRepository, SubmissionResult } from '../types';
import {
  IncompleteSubmissionError,
  NoActiveSessionError,
  PersistenceFailureError,
  QuestionLookupFailureError,
  QuestionNotFoundError,
} from '../utils/quizErrors';
import {
  calculateAccuracy,
  calculateTier,
  calculateXp,
  canonicalLetter,
} from '../utils/helpers';
import { KeyedLock } from '../utils/keyedLock';
import { ActiveSession, SessionStore, SubmittedSession } from './session.service';
import logger from '../config/logger';

export const summarize = (correct: number, total: number): SubmissionResult => ({
  correct,
  total,
  accuracy: calculateAccuracy(correct, total),
  xp: calculateXp(correct),
  tier: calculateTier(correct, total),
});

/**
 * Turns a complete active session into attempt records and a result.
 *
 * Canonical answers are looked up at submission time, so an edit to a
 * question made while a learner is mid-quiz is what they get scored against.
 */
export class ScoringEngine {
  constructor(
    private readonly questions: QuestionRepository,
    private readonly attempts: AttemptStore,
    private readonly store: SessionStore,
    private readonly lock: KeyedLock,
    private readonly now: () => Date = () => new Date()
  ) {}

  async submit(studentId: string): Promise<SubmissionResult> {
    return this.lock.runExclusive(studentId, async () => {
      const session = this.store.get(studentId);
      if (!session) {
        throw new NoActiveSessionError();
      }
      if (session.status === 'submitted') {
        return { ...session.result };
      }

      const unanswered = session.questionIds.filter((id) => session.answers.get(id) == null);
      if (unanswered.length > 0) {
        throw new IncompleteSubmissionError(unanswered);
      }

      const batch = await this.grade(session);
      await this.persist(batch);

      const correct = batch.filter((a) => a.isCorrect).length;
      const result = summarize(correct, batch.length);
      const submitted: SubmittedSession = {
        ...session,
        status: 'submitted',
        result,
        submittedAt: batch[0].timestamp,
      };
      this.store.set(submitted);

      logger.info(
        `Quiz submitted by student ${studentId}: ${correct}/${batch.length} (${result.accuracy}%), +${result.xp} XP`
      );
      return { ...result };
    });
  }

  private async grade(session: ActiveSession): Promise<NewAttempt[]> {
    const canonical = await Promise.all(session.questionIds.map((id) => this.lookup(id)));
    const timestamp = this.now();

    return session.questionIds.map((questionId, i) => {
      const chosen = session.answers.get(questionId) ?? '';
      return {
        studentId: session.studentId,
        questionId,
        isCorrect: chosen.toUpperCase() === canonical[i],
        timestamp,
      };
    });
  }

  private async lookup(questionId: string): Promise<string> {
    let answer: string;
    try {
      answer = await this.questions.getCanonicalAnswer(questionId);
    } catch (error) {
      if (error instanceof QuestionNotFoundError) {
        throw new QuestionLookupFailureError(questionId, error);
      }
      throw error;
    }

    const letter = canonicalLetter(answer);
    if (!letter) {
      throw new QuestionLookupFailureError(questionId);
    }
    return letter;
  }

  private async persist(batch: NewAttempt[]): Promise<void> {
    try {
      await this.attempts.appendAttempts(batch);
    } catch (error) {
      if (error instanceof PersistenceFailureError) throw error;
      throw new PersistenceFailureError('Failed to record quiz attempts', error);
    }
  }
}
