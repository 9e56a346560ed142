import mongoose from 'mongoose';
import logger from './logger';

export const resolveMongoUri = (): string =>
  process.env.MONGODB_URI || 'mongodb://localhost:27017/smartlearn?replicaSet=rs0';

const connectDatabase = async (): Promise<void> => {
  try {
    await mongoose.connect(resolveMongoUri(), {
      maxPoolSize: 10,
      minPoolSize: 2,
      socketTimeoutMS: 45000,
    });

    logger.info('MongoDB connected successfully');

    mongoose.connection.on('error', (err) => {
      logger.error('MongoDB connection error:', err);
    });

    mongoose.connection.on('disconnected', () => {
      logger.warn('MongoDB disconnected');
    });
  } catch (error) {
    logger.error('MongoDB connection failed:', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
  logger.info('MongoDB connection closed');
};

export default connectDatabase;
