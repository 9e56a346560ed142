import { Request, Response } from 'express';
import { asyncHandler } from '../utils/asyncHandler';
import { ApiResponse } from '../utils/ApiResponse';
import { DEFAULT_QUESTION_COUNT, TIER_MESSAGES } from '../utils/constants';
import { currentUserId } from '../middleware/auth.middleware';
import { QuizService } from '../services/quiz.service';
import { CreateSessionBody, SetAnswerBody } from '../validators/quiz.validator';

export const createQuizController = (quiz: QuizService) => ({
  /**
   * @desc    Start a quiz with randomly sampled questions
   * @route   POST /api/v1/quiz/session
   * @access  Private (Student)
   */
  createSession: asyncHandler(async (req: Request, res: Response) => {
    const { subject, count, restart }: CreateSessionBody = req.body;
    const requested = count ?? DEFAULT_QUESTION_COUNT;

    const { session, notice } = await quiz.createSession(currentUserId(req), {
      subject,
      count: requested,
      restart,
    });

    const message = notice
      ? `Only ${notice.available} of ${notice.requested} requested questions are available`
      : 'Quiz started successfully';
    res.status(201).json(ApiResponse.success(message, { session, notice }));
  }),

  /**
   * @desc    Current quiz state for the learner
   * @route   GET /api/v1/quiz/session
   * @access  Private (Student)
   */
  getStatus: asyncHandler(async (req: Request, res: Response) => {
    const status = quiz.getStatus(currentUserId(req));
    res.json(ApiResponse.success('Data retrieved successfully', status));
  }),

  /**
   * @desc    Select (or clear) the answer to one question
   * @route   PUT /api/v1/quiz/session/answers/:questionId
   * @access  Private (Student)
   */
  setAnswer: asyncHandler(async (req: Request, res: Response) => {
    const { answer }: SetAnswerBody = req.body;
    const update = await quiz.setAnswer(currentUserId(req), req.params.questionId, answer);
    res.json(ApiResponse.success('Answer saved', update));
  }),

  /**
   * @desc    Score the quiz and record attempts
   * @route   POST /api/v1/quiz/session/submit
   * @access  Private (Student)
   */
  submit: asyncHandler(async (req: Request, res: Response) => {
    const result = await quiz.submit(currentUserId(req));
    res.json(
      ApiResponse.success('Quiz submitted successfully', {
        ...result,
        feedback: TIER_MESSAGES[result.tier],
      })
    );
  }),

  /**
   * @desc    Discard the current quiz, answered or not
   * @route   DELETE /api/v1/quiz/session
   * @access  Private (Student)
   */
  resetSession: asyncHandler(async (req: Request, res: Response) => {
    const previousStatus = await quiz.resetSession(currentUserId(req));
    res.json(ApiResponse.success('Quiz reset', { previousStatus, status: 'empty' }));
  }),

  /**
   * @desc    Ranked standings across all learners
   * @route   GET /api/v1/quiz/leaderboard
   * @access  Private
   */
  getLeaderboard: asyncHandler(async (_req: Request, res: Response) => {
    const rows = await quiz.getLeaderboard();
    res.json(
      ApiResponse.success(rows.length ? 'Data retrieved successfully' : 'No scores yet', rows, {
        total: rows.length,
      })
    );
  }),

  /**
   * @desc    Attempted / correct / accuracy totals for the learner
   * @route   GET /api/v1/quiz/progress
   * @access  Private (Student)
   */
  getProgress: asyncHandler(async (req: Request, res: Response) => {
    const progress = await quiz.getStudentProgress(currentUserId(req));
    res.json(
      ApiResponse.success(progress.attempted ? 'Data retrieved successfully' : 'No attempts yet', progress)
    );
  }),
});
