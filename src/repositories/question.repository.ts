import mongoose, { Types } from 'mongoose';
import Question from '../models/Question.model';
import { Difficulty, NewQuestion, QuestionOptions, QuestionRepository, Question as QuestionEntity } from '../types';
import { QuestionNotFoundError } from '../utils/quizErrors';
import { RandomSource, sampleWithoutReplacement } from '../utils/helpers';
import logger from '../config/logger';

interface QuestionRecord {
  _id: Types.ObjectId;
  question: string;
  options: QuestionOptions;
  answer: string;
  subject: string;
  chapter: string;
  topic: string;
  difficulty: Difficulty;
  type: string;
}

const DUPLICATE_KEY = 11000;

const toQuestion = (doc: QuestionRecord): QuestionEntity => ({
  id: doc._id.toString(),
  question: doc.question,
  options: {
    A: doc.options.A,
    B: doc.options.B,
    C: doc.options.C,
    D: doc.options.D,
  },
  answer: doc.answer,
  subject: doc.subject,
  chapter: doc.chapter,
  topic: doc.topic,
  difficulty: doc.difficulty,
  type: doc.type,
});

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;

/**
 * Question bank backed by the `questions` collection.
 *
 * Sampling happens here rather than in the database: candidate ids are
 * loaded, shuffled with the injected random source and cut to size, so the
 * selection is reproducible when a seeded source is supplied.
 */
export class MongoQuestionRepository implements QuestionRepository {
  constructor(private readonly random: RandomSource = Math.random) {}

  async sampleRandom(subject: string | undefined, count: number): Promise<QuestionEntity[]> {
    const filter = subject ? { subject } : {};
    const candidates = await Question.find(filter).select('_id').lean<Array<{ _id: Types.ObjectId }>>();
    const picked = sampleWithoutReplacement(
      candidates.map((c) => c._id.toString()),
      count,
      this.random
    );
    if (picked.length === 0) return [];

    const docs = await Question.find({ _id: { $in: picked } }).lean<QuestionRecord[]>();
    const byId = new Map(docs.map((doc) => [doc._id.toString(), toQuestion(doc)]));

    // $in does not preserve order; re-apply the sampled order and drop anything
    // deleted between the two reads.
    return picked.flatMap((id) => {
      const question = byId.get(id);
      return question ? [question] : [];
    });
  }

  async getCanonicalAnswer(questionId: string): Promise<string> {
    if (!Types.ObjectId.isValid(questionId)) {
      throw new QuestionNotFoundError(questionId);
    }
    const doc = await Question.findById(questionId)
      .select('answer')
      .lean<{ answer: string } | null>();
    if (!doc) {
      throw new QuestionNotFoundError(questionId);
    }
    return doc.answer;
  }

  async insertIfAbsent(input: NewQuestion): Promise<{ question: QuestionEntity; created: boolean }> {
    const existing = await Question.findOne({ question: input.question }).lean<QuestionRecord | null>();
    if (existing) {
      return { question: toQuestion(existing), created: false };
    }

    try {
      const doc = await Question.create(input);
      return { question: toQuestion(doc.toObject<QuestionRecord>()), created: true };
    } catch (error) {
      // Lost a race with a concurrent insert of the same text
      if (isDuplicateKeyError(error)) {
        const winner = await Question.findOne({ question: input.question }).lean<QuestionRecord | null>();
        if (winner) {
          return { question: toQuestion(winner), created: false };
        }
      }
      logger.error('Failed to insert question:', error);
      throw error;
    }
  }

  async listSubjects(): Promise<string[]> {
    const subjects: unknown[] = await Question.distinct('subject');
    return subjects.filter((s): s is string => typeof s === 'string').sort();
  }
}
