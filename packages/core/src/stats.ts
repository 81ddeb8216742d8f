import { SessionStats, StatsView } from "@numdrill/types";

export function createInitialStats(): SessionStats {
  return {
    correctCount: 0,
    totalCount: 0,
    startTime: null,
    elapsedMs: 0,
  };
}

export function beginStats(now: number): SessionStats {
  return { ...createInitialStats(), startTime: now };
}

export function recordKeystroke(stats: SessionStats, isCorrect: boolean): SessionStats {
  const newStats = { ...stats };
  newStats.totalCount += 1;
  if (isCorrect) {
    newStats.correctCount += 1;
  }
  return newStats;
}

export function tickStats(stats: SessionStats, now: number): SessionStats {
  // Nothing to measure until a session has started
  if (stats.startTime === null) return stats;
  return { ...stats, elapsedMs: now - stats.startTime };
}

export function calculateAccuracy(stats: SessionStats): number {
  if (stats.totalCount === 0) return 0;
  return (stats.correctCount / stats.totalCount) * 100;
}

/**
 * Symbols typed per minute, right or wrong. The terminal app labels this NPM
 * (numbers per minute).
 */
export function calculateThroughput(stats: SessionStats): number {
  const elapsedSeconds = stats.elapsedMs / 1000;
  if (elapsedSeconds <= 0) return 0;
  return stats.totalCount / (elapsedSeconds / 60);
}

export function toStatsView(stats: SessionStats): StatsView {
  return {
    correctCount: stats.correctCount,
    totalCount: stats.totalCount,
    elapsedSeconds: stats.elapsedMs / 1000,
    accuracy: calculateAccuracy(stats),
    throughput: calculateThroughput(stats),
  };
}
