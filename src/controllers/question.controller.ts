import { Request, Response } from 'express';
import { asyncHandler } from '../utils/asyncHandler';
import { ApiResponse } from '../utils/ApiResponse';
import { QuestionRepository } from '../types';
import { CreateQuestionBody } from '../validators/question.validator';
import logger from '../config/logger';

export const createQuestionController = (questions: QuestionRepository) => ({
  /**
   * @desc    Add a question; identical question text is ignored
   * @route   POST /api/v1/questions
   * @access  Private (Teacher)
   */
  addQuestion: asyncHandler(async (req: Request, res: Response) => {
    const input: CreateQuestionBody = req.body;
    const { question, created } = await questions.insertIfAbsent(input);

    if (!created) {
      res.json(ApiResponse.success('Question already exists', { question, created }));
      return;
    }

    logger.info(`Question ${question.id} added to ${question.subject} by ${req.user?.userId}`);
    res.status(201).json(ApiResponse.success('Question added', { question, created }));
  }),

  /**
   * @desc    Subjects that have at least one question
   * @route   GET /api/v1/questions/subjects
   * @access  Private
   */
  listSubjects: asyncHandler(async (_req: Request, res: Response) => {
    const subjects = await questions.listSubjects();
    res.json(ApiResponse.success('Data retrieved successfully', subjects));
  }),
});
