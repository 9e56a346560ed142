import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import connectDatabase, { disconnectDatabase } from './config/database';
import logger from './config/logger';
import { MongoAttemptStore } from './repositories/attempt.repository';
import { MongoQuestionRepository } from './repositories/question.repository';
import { QuizService } from './services/quiz.service';

const PORT = process.env.PORT || 5000;

const startServer = async () => {
  try {
    await connectDatabase();

    const questions = new MongoQuestionRepository();
    const attempts = new MongoAttemptStore();
    const quiz = new QuizService({ questions, attempts });
    const app = createApp({ quiz, questions });

    const server = app.listen(PORT, () => {
      logger.info(`Server running in ${process.env.NODE_ENV} mode on port ${PORT}`);
      logger.info(`Health check: http://localhost:${PORT}/health`);
      logger.info(`API documentation: http://localhost:${PORT}/docs`);
    });

    // Graceful shutdown
    let shuttingDown = false;
    const gracefulShutdown = (exitCode: number) => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Shutting down gracefully...');

      server.close(() => {
        logger.info('HTTP server closed');
        disconnectDatabase()
          .then(() => process.exit(exitCode))
          .catch((err) => {
            logger.error('Error while closing MongoDB connection:', err);
            process.exit(1);
          });
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown(0));
    process.on('SIGINT', () => gracefulShutdown(0));

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Promise Rejection:', reason);
      gracefulShutdown(1);
    });

    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      gracefulShutdown(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
