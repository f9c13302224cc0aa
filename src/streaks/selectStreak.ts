import type { Streak } from "../types";

/**
 * Longest streak with at least `minLength` months; ties go to the one that
 * ended last. Null when nothing qualifies.
 */
export function selectStreak(streaks: Streak[], minLength: number): Streak | null {
  let best: Streak | null = null;

  for (const s of streaks) {
    if (s.length < minLength) continue;
    if (
      best === null ||
      s.length > best.length ||
      (s.length === best.length && s.endMonth > best.endMonth)
    ) {
      best = s;
    }
  }

  return best;
}
