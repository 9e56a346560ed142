import { Attempt, AttemptStore, LeaderboardRow, StudentProgress } from '../types';
import { calculateAccuracy, calculateXp } from '../utils/helpers';

type Standing = Omit<LeaderboardRow, 'rank'>;

const compareStandings = (a: Standing, b: Standing): number => {
  if (a.xp !== b.xp) return b.xp - a.xp;
  if (a.accuracy !== b.accuracy) return b.accuracy - a.accuracy;
  // Ties on both scores fall back to student id so the order never depends on input order
  if (a.studentId < b.studentId) return -1;
  if (a.studentId > b.studentId) return 1;
  return 0;
};

export const rankAttempts = (attempts: readonly Attempt[]): LeaderboardRow[] => {
  const totals = new Map<string, { attempted: number; correct: number }>();
  for (const attempt of attempts) {
    const entry = totals.get(attempt.studentId) ?? { attempted: 0, correct: 0 };
    entry.attempted++;
    if (attempt.isCorrect) entry.correct++;
    totals.set(attempt.studentId, entry);
  }

  const standings: Standing[] = [...totals].map(([studentId, { attempted, correct }]) => ({
    studentId,
    attempted,
    correct,
    xp: calculateXp(correct),
    accuracy: calculateAccuracy(correct, attempted),
  }));

  return standings.sort(compareStandings).map((row, i) => ({ ...row, rank: i + 1 }));
};

/**
 * Read-only views over the attempt history. Nothing here touches sessions or
 * takes locks; each call reflects whatever the store returns at that moment.
 */
export class LeaderboardAggregator {
  constructor(private readonly attempts: AttemptStore) {}

  async aggregate(): Promise<LeaderboardRow[]> {
    return rankAttempts(await this.attempts.readAll());
  }

  async progressFor(studentId: string): Promise<StudentProgress> {
    const history = await this.attempts.readByStudent(studentId);
    const correct = history.filter((a) => a.isCorrect).length;
    return {
      studentId,
      attempted: history.length,
      correct,
      accuracy: calculateAccuracy(correct, history.length),
    };
  }
}
