import { Router } from 'express';
import { createQuestionController } from '../../controllers/question.controller';
import { authenticate } from '../../middleware/auth.middleware';
import { authorizeRoles } from '../../middleware/role.middleware';
import { validate } from '../../middleware/validate.middleware';
import { QuestionRepository } from '../../types';
import { createQuestionSchema } from '../../validators/question.validator';
import { USER_ROLES } from '../../utils/constants';

export const createQuestionRoutes = (questions: QuestionRepository): Router => {
  const router = Router();
  const controller = createQuestionController(questions);

  router.use(authenticate);

  /**
   * @openapi
   * /questions/subjects:
   *   get:
   *     tags: [Questions]
   *     summary: Subjects with at least one question
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200: { description: Sorted subject names }
   */
  router.get('/subjects', controller.listSubjects);

  /**
   * @openapi
   * /questions:
   *   post:
   *     tags: [Questions]
   *     summary: Add a multiple-choice question (duplicate text is ignored)
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       201: { description: Created }
   *       200: { description: Already existed }
   */
  router.post(
    '/',
    authorizeRoles(USER_ROLES.TEACHER),
    validate(createQuestionSchema),
    controller.addQuestion
  );

  return router;
};
