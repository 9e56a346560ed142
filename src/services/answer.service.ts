import { AnswerLetter } from '../types';
import { ApiError } from '../utils/ApiError';
import { isAnswerLetter } from '../utils/helpers';
import { InvalidSessionStateError } from '../utils/quizErrors';
import { KeyedLock } from '../utils/keyedLock';
import { SessionStore, countAnswered } from './session.service';

export interface AnswerUpdate {
  questionId: string;
  answer: AnswerLetter | null;
  answered: number;
  total: number;
}

/**
 * Accepts "a".."d" in any case, or null / empty string for "unanswered".
 */
export const parseAnswerLetter = (raw: string | null): AnswerLetter | null => {
  if (raw === null) return null;
  const normalized = raw.trim().toUpperCase();
  if (normalized === '') return null;
  if (!isAnswerLetter(normalized)) {
    throw ApiError.badRequest(`Answer must be one of A, B, C, D or null (got "${raw}")`);
  }
  return normalized;
};

export class AnswerCollector {
  constructor(
    private readonly store: SessionStore,
    private readonly lock: KeyedLock
  ) {}

  async setAnswer(studentId: string, questionId: string, raw: string | null): Promise<AnswerUpdate> {
    const answer = parseAnswerLetter(raw);

    return this.lock.runExclusive(studentId, () => {
      const session = this.store.get(studentId);
      if (!session || session.status !== 'active') {
        throw new InvalidSessionStateError(
          'Answers can only be changed while a quiz is in progress',
          session?.status ?? 'empty'
        );
      }
      if (!session.answers.has(questionId)) {
        throw new InvalidSessionStateError(
          `Question ${questionId} is not part of the current quiz`,
          session.status
        );
      }

      session.answers.set(questionId, answer);
      return {
        questionId,
        answer,
        answered: countAnswered(session),
        total: session.questionIds.length,
      };
    });
  }
}
