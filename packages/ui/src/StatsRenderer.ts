import { StatsView } from "@numdrill/types";
import { CLEAR_LINE, moveTo, TerminalOutput } from "./terminal";

const LABEL_WIDTH = 12;

export function formatStats(stats: StatsView): string[] {
  return [
    formatStat("Accuracy", `${stats.accuracy.toFixed(2)}%`),
    formatStat("NPM", stats.throughput.toFixed(2)),
    formatStat("Characters", `${stats.correctCount} / ${stats.totalCount}`),
    formatStat("Time", `${stats.elapsedSeconds.toFixed(2)}s`),
  ];
}

function formatStat(label: string, value: string): string {
  return `${label}:`.padEnd(LABEL_WIDTH) + value;
}

export class StatsRenderer {
  private output: TerminalOutput;
  private row: number;

  constructor(output: TerminalOutput, row: number) {
    this.output = output;
    this.row = row;
  }

  static readonly height = 4;

  render(stats: StatsView) {
    const frame = formatStats(stats)
      .map((line, i) => moveTo(this.row + i, 3) + CLEAR_LINE + line)
      .join("");
    this.output.write(frame);
  }
}
