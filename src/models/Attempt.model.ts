import mongoose, { Document, Schema } from 'mongoose';

export interface IAttempt extends Document {
  studentId: string;
  question: mongoose.Types.ObjectId;
  isCorrect: boolean;
  timestamp: Date;
}

// Append-only: the app never updates or deletes these documents
const attemptSchema = new Schema<IAttempt>({
  studentId: {
    type: String,
    required: true,
    index: true,
  },
  question: {
    type: Schema.Types.ObjectId,
    ref: 'Question',
    required: true,
    index: true,
  },
  isCorrect: {
    type: Boolean,
    required: true,
  },
  timestamp: {
    type: Date,
    default: Date.now,
  },
});

const Attempt = mongoose.model<IAttempt>('Attempt', attemptSchema);

export default Attempt;
