import { Router } from 'express';
import { AppServices } from '../../app';
import { createQuizRoutes } from './quiz.routes';
import { createQuestionRoutes } from './question.routes';

export const createV1Router = ({ quiz, questions }: AppServices): Router => {
  const router = Router();

  router.use('/quiz', createQuizRoutes(quiz));
  router.use('/questions', createQuestionRoutes(questions));

  return router;
};
