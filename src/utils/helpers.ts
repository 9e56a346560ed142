import { ANSWER_LETTERS, AnswerLetter, Tier } from '../types';
import { XP_PER_CORRECT } from './constants';

export type RandomSource = () => number;

export const roundTo = (value: number, decimals = 2): number => {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};

export const calculateAccuracy = (correct: number, attempted: number): number => {
  if (attempted === 0) return 0;
  return roundTo((100 * correct) / attempted, 2);
};

export const calculateXp = (correct: number): number => correct * XP_PER_CORRECT;

export const calculateTier = (correct: number, total: number): Tier => {
  if (correct === total) return 'perfect';
  if (total > 1 && correct >= total - 1) return 'near_perfect';
  if (correct >= total / 2) return 'good';
  return 'encourage';
};

export const isAnswerLetter = (value: string): value is AnswerLetter => {
  return (ANSWER_LETTERS as readonly string[]).includes(value);
};

/**
 * First character of a stored answer, upper-cased. Stored answers may be
 * "b", " C" or "A. Newton" depending on how they were authored.
 */
export const canonicalLetter = (answer: string): string => {
  return answer.trim().toUpperCase().charAt(0);
};

/**
 * Fisher-Yates shuffle of a copy, then take the first `count`.
 */
export const sampleWithoutReplacement = <T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random
): T[] => {
  const pool = [...items];
  for (let i = pool.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, Math.max(0, count));
};
