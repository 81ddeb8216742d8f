export type PracticeSymbol = string; // always a single character, e.g. "7" or "+"

export const ALPHABET_NAMES = ["digits", "numpad"] as const;
export type AlphabetName = (typeof ALPHABET_NAMES)[number];

export type CharStatus = "correct" | "incorrect" | "current" | "future";

export const DEFAULT_WINDOW_RADIUS = 2;
export const DEFAULT_ALPHABET: AlphabetName = "digits";
export const STATS_REFRESH_MS = 500;

export interface EngineConfig {
  windowRadius: number; // symbols of context on each side of the cursor
  alphabet: AlphabetName;
}

export interface WindowState {
  target: PracticeSymbol[]; // length 2 * radius + 1
  typed: PracticeSymbol[]; // length === cursor
  cursor: number;
  radius: number;
}

export interface SessionStats {
  correctCount: number;
  totalCount: number;
  startTime: number | null; // epoch ms
  elapsedMs: number;
}

export interface StatsView {
  correctCount: number;
  totalCount: number;
  elapsedSeconds: number;
  accuracy: number; // Percentage
  throughput: number; // Symbols per minute
}

export interface CharCell {
  symbol: PracticeSymbol;
  status: CharStatus;
}

export interface DisplayData {
  cells: CharCell[];
  stats: StatsView;
  isActive: boolean;
}
