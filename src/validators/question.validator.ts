import { z } from 'zod';
import { DIFFICULTIES } from '../utils/constants';

const optionText = (letter: string) =>
  z.string().trim().min(1, `Option ${letter} is required`);

export const questionInputSchema = z.object({
  question: z.string().trim().min(1, 'Question text is required'),
  options: z.object({
    A: optionText('A'),
    B: optionText('B'),
    C: optionText('C'),
    D: optionText('D'),
  }),
  answer: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(['A', 'B', 'C', 'D'], { message: 'Correct answer must be A, B, C or D' })),
  subject: z.string().trim().min(1, 'Subject is required'),
  chapter: z.string().trim().default(''),
  topic: z.string().trim().default(''),
  difficulty: z.enum(DIFFICULTIES).default('Medium'),
  type: z.string().trim().min(1).default('mcq'),
});

export const createQuestionSchema = z.object({
  body: questionInputSchema,
});

export type CreateQuestionBody = z.infer<typeof questionInputSchema>;
