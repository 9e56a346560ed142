import fs from 'fs';
import { z } from 'zod';
import { NewQuestion, QuestionRepository } from '../types';
import { questionInputSchema } from '../validators/question.validator';

export const readSeedFile = (filePath: string): NewQuestion[] => {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return z.array(questionInputSchema).parse(raw);
};

export interface SeedSummary {
  created: number;
  skipped: number;
}

/**
 * Inserts each question unless one with the same text already exists, so the
 * seeder can be re-run against a populated database.
 */
export const seedQuestions = async (
  repository: QuestionRepository,
  questions: NewQuestion[]
): Promise<SeedSummary> => {
  const summary: SeedSummary = { created: 0, skipped: 0 };
  for (const question of questions) {
    const { created } = await repository.insertIfAbsent(question);
    if (created) {
      summary.created++;
    } else {
      summary.skipped++;
    }
  }
  return summary;
};
