import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import mongoSanitize from 'express-mongo-sanitize';
import compression from 'compression';
import hpp from 'hpp';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger } from './middleware/logger.middleware';
import { generalLimiter } from './middleware/rateLimit.middleware';
import { setupSwagger } from './config/swagger';
import { createV1Router } from './routes/v1';
import { QuizService } from './services/quiz.service';
import { QuestionRepository } from './types';
import logger from './config/logger';

export interface AppServices {
  quiz: QuizService;
  questions: QuestionRepository;
}

export const createApp = (services: AppServices): Express => {
  const app: Express = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
      credentials: true,
    })
  );
  app.use(mongoSanitize());
  app.use(hpp());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  if (process.env.NODE_ENV !== 'test') {
    app.use(requestLogger);
  }

  // Rate limiting
  app.use('/api', generalLimiter);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({
      success: true,
      message: 'Server is healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV,
    });
  });

  // API version info
  app.get('/api/v1', (req, res) => {
    res.status(200).json({
      success: true,
      message: 'SmartLearn Quiz API v1',
      version: '1.0.0',
      documentation: '/docs',
    });
  });

  // Swagger documentation
  setupSwagger(app);

  app.use('/api/v1', createV1Router(services));

  logger.debug('Express app configured successfully');

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
