export const USER_ROLES = {
  STUDENT: 'student',
  TEACHER: 'teacher',
} as const;

export const DIFFICULTIES = ['Easy', 'Medium', 'Hard'] as const;

export const TIER_MESSAGES = {
  perfect: 'Perfect Score!',
  near_perfect: 'So Close! Excellent Work!',
  good: 'Good job, keep practicing!',
  encourage: "Don't give up! Focus on weak areas.",
} as const;

export const XP_PER_CORRECT = 10;
export const DEFAULT_QUESTION_COUNT = parseInt(process.env.QUIZ_DEFAULT_QUESTION_COUNT || '5');
export const MAX_QUESTION_COUNT = parseInt(process.env.QUIZ_MAX_QUESTION_COUNT || '50');
