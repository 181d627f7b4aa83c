import { DIFFICULTY_LEVELS, DifficultyLevel } from '../../models/types';

export interface DifficultySnapshot {
  difficulty: DifficultyLevel;
  goodStreak: number;
  badStreak: number;
}

export interface DifficultySignals {
  shouldIncreaseDifficulty: boolean;
  shouldSimplify: boolean;
}

/** Consecutive signals needed to move one level. */
export const STREAK_THRESHOLD = 2;

export const shiftDifficulty = (level: DifficultyLevel, step: 1 | -1): DifficultyLevel => {
  const index = DIFFICULTY_LEVELS.indexOf(level) + step;
  return DIFFICULTY_LEVELS[Math.min(DIFFICULTY_LEVELS.length - 1, Math.max(0, index))];
};

export const adjustDifficulty = (snapshot: DifficultySnapshot, signals: DifficultySignals): DifficultySnapshot => {
  if (signals.shouldIncreaseDifficulty) {
    const goodStreak = snapshot.goodStreak + 1;
    if (goodStreak >= STREAK_THRESHOLD) {
      return { difficulty: shiftDifficulty(snapshot.difficulty, 1), goodStreak: 0, badStreak: 0 };
    }
    return { difficulty: snapshot.difficulty, goodStreak, badStreak: 0 };
  }

  if (signals.shouldSimplify) {
    const badStreak = snapshot.badStreak + 1;
    if (badStreak >= STREAK_THRESHOLD) {
      return { difficulty: shiftDifficulty(snapshot.difficulty, -1), goodStreak: 0, badStreak: 0 };
    }
    return { difficulty: snapshot.difficulty, goodStreak: 0, badStreak };
  }

  return { difficulty: snapshot.difficulty, goodStreak: 0, badStreak: 0 };
};
