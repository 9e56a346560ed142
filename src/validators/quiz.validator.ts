import { z } from 'zod';
import { MAX_QUESTION_COUNT } from '../utils/constants';

export const createSessionSchema = z.object({
  body: z
    .object({
      subject: z.string().trim().min(1, 'Subject cannot be empty').optional(),
      count: z
        .number({ invalid_type_error: 'Count must be a number' })
        .int('Count must be a whole number')
        .min(1, 'Count must be at least 1')
        .max(MAX_QUESTION_COUNT, `Count cannot exceed ${MAX_QUESTION_COUNT}`)
        .optional(),
      restart: z.boolean().optional(),
    })
    .default({}),
});

export const setAnswerSchema = z.object({
  params: z.object({
    questionId: z.string().min(1),
  }),
  body: z.object({
    answer: z
      .string()
      .trim()
      .regex(/^[a-dA-D]?$/, 'Answer must be one of A, B, C, D or null')
      .nullable(),
  }),
});

export type CreateSessionBody = z.infer<typeof createSessionSchema>['body'];
export type SetAnswerBody = z.infer<typeof setAnswerSchema>['body'];
