import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import connectDatabase, { disconnectDatabase } from '../config/database';
import logger from '../config/logger';
import { MongoQuestionRepository } from '../repositories/question.repository';
import { readSeedFile, seedQuestions } from './questions.seeder';

const SEED_FILE = process.env.SEED_FILE || path.join(process.cwd(), 'data', 'questions.json');

const seedDatabase = async () => {
  try {
    await connectDatabase();
    logger.info('Connected to MongoDB for seeding');

    const questions = readSeedFile(SEED_FILE);
    logger.info(`Loaded ${questions.length} questions from ${SEED_FILE}`);

    const { created, skipped } = await seedQuestions(new MongoQuestionRepository(), questions);
    logger.info(`Seeded ${created} questions (${skipped} already present)`);

    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('Error seeding database:', error);
    process.exit(1);
  }
};

void seedDatabase();
