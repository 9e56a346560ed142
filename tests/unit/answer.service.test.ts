import { AnswerCollector, parseAnswerLetter } from '../../src/services/answer.service';
import { SessionManager, SessionStore } from '../../src/services/session.service';
import { KeyedLock } from '../../src/utils/keyedLock';
import { ApiError } from '../../src/utils/ApiError';
import { InvalidSessionStateError } from '../../src/utils/quizErrors';
import { InMemoryQuestionRepository, buildQuestion } from '../utils/fakes';

describe('parseAnswerLetter', () => {
  it('normalizes letters to upper case', () => {
    expect(parseAnswerLetter('a')).toBe('A');
    expect(parseAnswerLetter(' d ')).toBe('D');
    expect(parseAnswerLetter('C')).toBe('C');
  });

  it('treats null and blank as unanswered', () => {
    expect(parseAnswerLetter(null)).toBeNull();
    expect(parseAnswerLetter('  ')).toBeNull();
  });

  it.each(['E', 'AB', 'A. Newton', '1'])('rejects %p', (raw) => {
    expect(() => parseAnswerLetter(raw)).toThrow(ApiError);
  });
});

describe('AnswerCollector', () => {
  let store: SessionStore;
  let manager: SessionManager;
  let collector: AnswerCollector;
  let questionIds: string[];

  beforeEach(async () => {
    const repository = new InMemoryQuestionRepository(
      Array.from({ length: 4 }, (_, i) => buildQuestion(i + 1))
    );
    const lock = new KeyedLock();
    store = new SessionStore();
    manager = new SessionManager(repository, store, lock);
    collector = new AnswerCollector(store, lock);

    const { session } = await manager.createSession('student-1', { count: 3 });
    questionIds = session.questions.map((q) => q.id);
  });

  it('records an answer and reports progress', async () => {
    const update = await collector.setAnswer('student-1', questionIds[0], 'b');

    expect(update).toEqual({ questionId: questionIds[0], answer: 'B', answered: 1, total: 3 });
    expect(store.get('student-1')?.answers.get(questionIds[0])).toBe('B');
  });

  it('keeps only the last write', async () => {
    await collector.setAnswer('student-1', questionIds[0], 'A');
    await collector.setAnswer('student-1', questionIds[0], 'C');
    const update = await collector.setAnswer('student-1', questionIds[0], 'C');

    expect(update.answered).toBe(1);
    expect(store.get('student-1')?.answers.get(questionIds[0])).toBe('C');
  });

  it('clears an answer with null', async () => {
    await collector.setAnswer('student-1', questionIds[1], 'D');
    const update = await collector.setAnswer('student-1', questionIds[1], null);

    expect(update.answered).toBe(0);
    expect(manager.getStatus('student-1').session?.questions.find((q) => q.id === questionIds[1])?.selected).toBeNull();
  });

  it('rejects a question that is not in the session', async () => {
    const outsider = ['q1', 'q2', 'q3', 'q4'].find((id) => !questionIds.includes(id));
    if (!outsider) throw new Error('expected one question outside the session');

    await expect(collector.setAnswer('student-1', outsider, 'A')).rejects.toBeInstanceOf(
      InvalidSessionStateError
    );
  });

  it('rejects answers when the learner has no session', async () => {
    await expect(collector.setAnswer('student-2', questionIds[0], 'A')).rejects.toMatchObject({
      code: 'INVALID_SESSION_STATE',
      details: { status: 'empty' },
    });
  });

  it('rejects answers once the session is submitted', async () => {
    const active = store.get('student-1');
    if (!active) throw new Error('expected a session');
    store.set({
      ...active,
      status: 'submitted',
      result: { correct: 0, total: 3, accuracy: 0, xp: 0, tier: 'encourage' },
      submittedAt: new Date(),
    });

    await expect(collector.setAnswer('student-1', questionIds[0], 'A')).rejects.toMatchObject({
      code: 'INVALID_SESSION_STATE',
      details: { status: 'submitted' },
    });
  });

  it('validates the letter before touching the session', async () => {
    await expect(collector.setAnswer('student-2', questionIds[0], 'Z')).rejects.toMatchObject({
      statusCode: 400,
    });
  });
});
