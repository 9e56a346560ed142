import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/app';
import { generateAccessToken } from '../../src/config/jwt';
import { QuizService } from '../../src/services/quiz.service';
import { InMemoryAttemptStore, InMemoryQuestionRepository, buildQuestion } from '../utils/fakes';

const teacher = `Bearer ${generateAccessToken({ userId: 'teacher-1', role: 'teacher' })}`;
const student = `Bearer ${generateAccessToken({ userId: 'student-1', role: 'student' })}`;

const newQuestion = {
  question: 'What is the chemical symbol for sodium?',
  options: { A: 'S', B: 'Na', C: 'So', D: 'Sd' },
  answer: 'b',
  subject: 'Chemistry',
  chapter: 'Periodic Table',
};

describe('Questions API', () => {
  let app: Express;
  let questions: InMemoryQuestionRepository;

  beforeEach(() => {
    questions = new InMemoryQuestionRepository([
      buildQuestion(1, { subject: 'Physics' }),
      buildQuestion(2, { subject: 'Biology' }),
    ]);
    const quiz = new QuizService({ questions, attempts: new InMemoryAttemptStore() });
    app = createApp({ quiz, questions });
  });

  it('lists subjects in alphabetical order', async () => {
    const res = await request(app).get('/api/v1/questions/subjects').set('Authorization', student);

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual(['Biology', 'Physics']);
  });

  it('lets a teacher add a question', async () => {
    const res = await request(app).post('/api/v1/questions').set('Authorization', teacher).send(newQuestion);

    expect(res.status).toBe(201);
    expect(res.body.message).toBe('Question added');
    expect(res.body.data).toEqual({
      question: {
        id: 'q3',
        question: 'What is the chemical symbol for sodium?',
        options: { A: 'S', B: 'Na', C: 'So', D: 'Sd' },
        answer: 'B',
        subject: 'Chemistry',
        chapter: 'Periodic Table',
        topic: '',
        difficulty: 'Medium',
        type: 'mcq',
      },
      created: true,
    });
  });

  it('ignores a question whose text already exists', async () => {
    await request(app).post('/api/v1/questions').set('Authorization', teacher).send(newQuestion);

    const res = await request(app)
      .post('/api/v1/questions')
      .set('Authorization', teacher)
      .send({ ...newQuestion, answer: 'A' });

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Question already exists');
    expect(res.body.data.created).toBe(false);
    expect(res.body.data.question.answer).toBe('B');
    expect(questions.ids()).toHaveLength(3);
  });

  it('validates the answer key', async () => {
    const res = await request(app)
      .post('/api/v1/questions')
      .set('Authorization', teacher)
      .send({ ...newQuestion, answer: 'E' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Correct answer must be A, B, C or D');
  });

  it('does not let students add questions', async () => {
    const res = await request(app).post('/api/v1/questions').set('Authorization', student).send(newQuestion);

    expect(res.status).toBe(403);
    expect(questions.ids()).toHaveLength(2);
  });
});
