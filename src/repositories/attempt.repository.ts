import mongoose, { Types } from 'mongoose';
import Attempt from '../models/Attempt.model';
import { Attempt as AttemptEntity, AttemptStore, NewAttempt } from '../types';
import { PersistenceFailureError } from '../utils/quizErrors';
import logger from '../config/logger';

interface AttemptRecord {
  _id: Types.ObjectId;
  studentId: string;
  question: Types.ObjectId;
  isCorrect: boolean;
  timestamp: Date;
}

const toAttempt = (doc: AttemptRecord): AttemptEntity => ({
  id: doc._id.toString(),
  studentId: doc.studentId,
  questionId: doc.question.toString(),
  isCorrect: doc.isCorrect,
  timestamp: doc.timestamp,
});

/**
 * Attempt history backed by the `attempts` collection. Batches are written in
 * a single multi-document transaction, which requires MongoDB to run as a
 * replica set.
 */
export class MongoAttemptStore implements AttemptStore {
  async appendAttempts(batch: NewAttempt[]): Promise<void> {
    if (batch.length === 0) return;

    try {
      const session = await mongoose.startSession();
      try {
        await session.withTransaction(async () => {
          await Attempt.insertMany(
            batch.map((attempt) => ({
              studentId: attempt.studentId,
              question: new Types.ObjectId(attempt.questionId),
              isCorrect: attempt.isCorrect,
              timestamp: attempt.timestamp,
            })),
            { session }
          );
        });
      } finally {
        await session.endSession();
      }
    } catch (error) {
      logger.error('Attempt batch write failed:', error);
      throw new PersistenceFailureError(
        `Failed to record ${batch.length} attempts for student ${batch[0].studentId}`,
        error
      );
    }
  }

  async readAll(): Promise<AttemptEntity[]> {
    const docs = await Attempt.find().sort({ timestamp: 1 }).lean<AttemptRecord[]>();
    return docs.map(toAttempt);
  }

  async readByStudent(studentId: string): Promise<AttemptEntity[]> {
    const docs = await Attempt.find({ studentId }).sort({ timestamp: 1 }).lean<AttemptRecord[]>();
    return docs.map(toAttempt);
  }
}
