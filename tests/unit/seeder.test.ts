import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import { readSeedFile, seedQuestions } from '../../src/seeders/questions.seeder';
import { InMemoryQuestionRepository, buildQuestion } from '../utils/fakes';

const SEED_FILE = path.join(__dirname, '..', '..', 'data', 'questions.json');

describe('question seeder', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads the bundled question bank', () => {
    const questions = readSeedFile(SEED_FILE);

    expect(questions).toHaveLength(12);
    expect(new Set(questions.map((q) => q.subject))).toEqual(
      new Set(['Physics', 'Chemistry', 'Biology'])
    );
    expect(questions.every((q) => ['A', 'B', 'C', 'D'].includes(q.answer))).toBe(true);
  });

  it('normalizes answers and fills defaults', () => {
    jest.spyOn(fs, 'readFileSync').mockReturnValue(
      JSON.stringify([
        {
          question: 'Which gas do plants absorb?',
          options: { A: 'Oxygen', B: 'Carbon dioxide', C: 'Nitrogen', D: 'Helium' },
          answer: ' b ',
          subject: 'Biology',
        },
      ])
    );

    expect(readSeedFile('questions.json')).toEqual([
      {
        question: 'Which gas do plants absorb?',
        options: { A: 'Oxygen', B: 'Carbon dioxide', C: 'Nitrogen', D: 'Helium' },
        answer: 'B',
        subject: 'Biology',
        chapter: '',
        topic: '',
        difficulty: 'Medium',
        type: 'mcq',
      },
    ]);
  });

  it('rejects a file with an invalid answer key', () => {
    jest.spyOn(fs, 'readFileSync').mockReturnValue(
      JSON.stringify([{ ...buildQuestion(1), answer: 'E' }])
    );

    expect(() => readSeedFile('questions.json')).toThrow(ZodError);
  });

  it('inserts new questions and skips ones already present', async () => {
    const repository = new InMemoryQuestionRepository([buildQuestion(1)]);

    const summary = await seedQuestions(repository, [buildQuestion(1), buildQuestion(2), buildQuestion(3)]);

    expect(summary).toEqual({ created: 2, skipped: 1 });
    expect(repository.ids()).toHaveLength(3);
  });

  it('is safe to run twice', async () => {
    const repository = new InMemoryQuestionRepository();
    const questions = readSeedFile(SEED_FILE);

    await expect(seedQuestions(repository, questions)).resolves.toEqual({ created: 12, skipped: 0 });
    await expect(seedQuestions(repository, questions)).resolves.toEqual({ created: 0, skipped: 12 });
  });
});
