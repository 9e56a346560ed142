import { ApiError } from './ApiError';
import { SessionStatus } from '../types';

export type QuizErrorCode =
  | 'INVALID_SESSION_STATE'
  | 'INCOMPLETE_SUBMISSION'
  | 'NO_ACTIVE_SESSION'
  | 'NO_QUESTIONS_AVAILABLE'
  | 'QUESTION_NOT_FOUND'
  | 'QUESTION_LOOKUP_FAILURE'
  | 'PERSISTENCE_FAILURE';

/**
 * Base class for failures of the quiz core. Each carries a stable `code`
 * that clients can branch on, plus optional structured `details`.
 */
export class QuizError extends ApiError {
  readonly code: QuizErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    code: QuizErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(statusCode, message, statusCode < 500);
    this.code = code;
    this.details = details;
  }
}

export class InvalidSessionStateError extends QuizError {
  constructor(message: string, status: SessionStatus) {
    super(409, 'INVALID_SESSION_STATE', message, { status });
  }
}

export class IncompleteSubmissionError extends QuizError {
  readonly unansweredQuestionIds: string[];

  constructor(unansweredQuestionIds: string[]) {
    super(
      422,
      'INCOMPLETE_SUBMISSION',
      `Please answer all questions before submitting (${unansweredQuestionIds.length} unanswered)`,
      { unansweredQuestionIds }
    );
    this.unansweredQuestionIds = unansweredQuestionIds;
  }
}

export class NoActiveSessionError extends QuizError {
  constructor() {
    super(404, 'NO_ACTIVE_SESSION', 'No active quiz session');
  }
}

export class NoQuestionsAvailableError extends QuizError {
  constructor(subject?: string) {
    super(
      404,
      'NO_QUESTIONS_AVAILABLE',
      subject ? `No questions available for subject "${subject}"` : 'No questions available',
      subject ? { subject } : undefined
    );
  }
}

export class QuestionNotFoundError extends QuizError {
  readonly questionId: string;

  constructor(questionId: string) {
    super(404, 'QUESTION_NOT_FOUND', `Question ${questionId} not found`, { questionId });
    this.questionId = questionId;
  }
}

export class QuestionLookupFailureError extends QuizError {
  constructor(questionId: string, cause?: unknown) {
    super(500, 'QUESTION_LOOKUP_FAILURE', `Canonical answer unavailable for question ${questionId}`, {
      questionId,
    });
    if (cause instanceof Error) {
      this.cause = cause;
    }
  }
}

export class PersistenceFailureError extends QuizError {
  constructor(message: string, cause?: unknown) {
    super(503, 'PERSISTENCE_FAILURE', message);
    if (cause instanceof Error) {
      this.cause = cause;
    }
  }
}
