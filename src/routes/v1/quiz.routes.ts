import { Router } from 'express';
import { createQuizController } from '../../controllers/quiz.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { submitLimiter } from '../../middleware/rateLimit.middleware';
import { validate } from '../../middleware/validate.middleware';
import { QuizService } from '../../services/quiz.service';
import { createSessionSchema, setAnswerSchema } from '../../validators/quiz.validator';
import { USER_ROLES } from '../../utils/constants';

export const createQuizRoutes = (quiz: QuizService): Router => {
  const router = Router();
  const controller = createQuizController(quiz);

  // All routes require authentication
  router.use(authenticate);

  /**
   * @openapi
   * /quiz/leaderboard:
   *   get:
   *     tags: [Quiz]
   *     summary: Learners ranked by XP, then accuracy
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Ranked rows }
   */
  router.get('/leaderboard', controller.getLeaderboard);

  router.use(authorizeRoles(USER_ROLES.STUDENT));

  /**
   * @openapi
   * /quiz/session:
   *   post:
   *     tags: [Quiz]
   *     summary: Start a quiz
   *     security: [{ bearerAuth: [] }]
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               subject: { type: string }
   *               count: { type: integer, minimum: 1 }
   *               restart: { type: boolean }
   *     responses:
   *       201: { description: Session started }
   *       409: { description: A quiz is already in progress }
   *   get:
   *     tags: [Quiz]
   *     summary: Current quiz state
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Status with the session view when one exists }
   *   delete:
   *     tags: [Quiz]
   *     summary: Discard the current quiz
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Reset }
   */
  router
    .route('/session')
    .get(controller.getStatus)
    .post(validate(createSessionSchema), controller.createSession)
    .delete(controller.resetSession);

  /**
   * @openapi
   * /quiz/session/answers/{questionId}:
   *   put:
   *     tags: [Quiz]
   *     summary: Select or clear an answer
   *     security: [{ bearerAuth: [] }]
   *     parameters:
   *       - { in: path, name: questionId, required: true, schema: { type: string } }
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               answer: { type: string, enum: [A, B, C, D], nullable: true }
   *     responses:
   *       200: { description: Saved }
   *       409: { description: No active quiz or question not in it }
   */
  router.put('/session/answers/:questionId', validate(setAnswerSchema), controller.setAnswer);

  /**
   * @openapi
   * /quiz/session/submit:
   *   post:
   *     tags: [Quiz]
   *     summary: Score the quiz
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Result (repeat calls return the same result) }
   *       404: { description: No active session }
   *       422: { description: Unanswered questions }
   *       503: { description: Attempts could not be recorded }
   */
  router.post('/session/submit', submitLimiter, controller.submit);

  /**
   * @openapi
   * /quiz/progress:
   *   get:
   *     tags: [Quiz]
   *     summary: The learner's attempted, correct and accuracy totals
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Totals }
   */
  router.get('/progress', controller.getProgress);

  return router;
};
