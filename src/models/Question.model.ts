import mongoose, { Document, Schema } from 'mongoose';
import { Difficulty } from '../types';
import { DIFFICULTIES } from '../utils/constants';

export interface IQuestion extends Document {
  question: string;
  options: {
    A: string;
    B: string;
    C: string;
    D: string;
  };
  answer: string;
  subject: string;
  chapter: string;
  topic: string;
  difficulty: Difficulty;
  type: string;
  createdAt: Date;
  updatedAt: Date;
}

const questionSchema = new Schema<IQuestion>(
  {
    question: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    options: {
      A: { type: String, required: true },
      B: { type: String, required: true },
      C: { type: String, required: true },
      D: { type: String, required: true },
    },
    answer: {
      type: String,
      required: true,
      uppercase: true,
      trim: true,
    },
    subject: {
      type: String,
      required: true,
      trim: true,
      index: true,
    },
    chapter: {
      type: String,
      default: '',
    },
    topic: {
      type: String,
      default: '',
    },
    difficulty: {
      type: String,
      enum: [...DIFFICULTIES],
      default: 'Medium',
    },
    type: {
      type: String,
      default: 'mcq',
    },
  },
  {
    timestamps: true,
  }
);

const Question = mongoose.model<IQuestion>('Question', questionSchema);

export default Question;
