import type { DebtLevel, SegmentedEntry, Streak, TimelineEntry } from "../types";

// Single forward pass; a new streak starts on the first entry and on every
// level change. Ids start at 1 and never decrease.
export function segmentTimeline(timeline: TimelineEntry[]): SegmentedEntry[] {
  const out: SegmentedEntry[] = [];
  let prevLevel: DebtLevel | null = null;
  let streakId = 0;

  for (const entry of timeline) {
    if (prevLevel === null || entry.level !== prevLevel) streakId += 1;
    out.push({ ...entry, streakId });
    prevLevel = entry.level;
  }

  return out;
}

// Each streak id from segmentTimeline becomes one Streak; ids are consecutive,
// so a change of id closes the current run.
export function collectStreaks(timeline: TimelineEntry[]): Streak[] {
  const streaks: Streak[] = [];
  let current: Streak | null = null;
  let currentId = 0;

  for (const entry of segmentTimeline(timeline)) {
    if (current && entry.streakId === currentId) {
      current.endMonth = entry.monthEnd;
      current.length += 1;
      continue;
    }
    currentId = entry.streakId;
    current = {
      clientId: entry.clientId,
      level: entry.level,
      startMonth: entry.monthEnd,
      endMonth: entry.monthEnd,
      length: 1,
    };
    streaks.push(current);
  }

  return streaks;
}
