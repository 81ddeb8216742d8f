import { STATS_REFRESH_MS, DisplayData, StatsView } from "@numdrill/types";
import { TestEngine } from "@numdrill/engine";
import {
  BOLD,
  CLEAR_SCREEN,
  HIDE_CURSOR,
  RESET,
  SHOW_CURSOR,
  StatsRenderer,
  WindowRenderer,
  centerOffset,
  moveTo,
  TerminalOutput,
} from "@numdrill/ui";

// Screen layout (1-based rows)
const TITLE_ROW = 2;
const WINDOW_ROW = 4;
const STATS_ROW = 6;
const HINT_ROW = STATS_ROW + StatsRenderer.height + 1;
const EXIT_ROW = HINT_ROW + 2;

const TITLE = "numdrill";
const HINT = "Type the highlighted character • Press R to reset • Q to quit";

// The subset of readline's keypress info the app looks at
export interface Keypress {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
}

export interface AppOptions {
  refreshMs?: number;
  onExit?: (stats: StatsView) => void;
}

export function formatSummary(stats: StatsView): string {
  return (
    `Session finished: ${stats.correctCount} / ${stats.totalCount} correct, ` +
    `${stats.accuracy.toFixed(2)}% accuracy, ${stats.throughput.toFixed(2)} NPM ` +
    `in ${stats.elapsedSeconds.toFixed(2)}s`
  );
}

export class NumdrillApp {
  private engine: TestEngine;
  private output: TerminalOutput;
  private options: AppOptions;

  private windowRenderer: WindowRenderer;
  private statsRenderer: StatsRenderer;

  private refreshTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(engine: TestEngine, output: TerminalOutput, options: AppOptions = {}) {
    this.engine = engine;
    this.output = output;
    this.options = options;
    this.windowRenderer = new WindowRenderer(output, WINDOW_ROW);
    this.statsRenderer = new StatsRenderer(output, STATS_ROW);
  }

  get isRunning(): boolean {
    return this.refreshTimer !== null;
  }

  run() {
    if (this.isRunning) return;

    this.output.write(HIDE_CURSOR);
    this.drawChrome();

    // Sessions start right away; the first keypress already counts
    this.engine.start();
    this.unsubscribe = this.engine.subscribe((data) => this.render(data));

    // Keypresses and ticks both arrive on the event loop, so they never interleave
    this.refreshTimer = setInterval(() => this.engine.tick(), this.options.refreshMs ?? STATS_REFRESH_MS);
  }

  handleKeypress(str: string | undefined, key: Keypress = {}) {
    if (!this.isRunning) return;

    if ((key.ctrl && key.name === "c") || key.name === "escape" || str === "q" || str === "Q") {
      this.quit();
      return;
    }

    if (key.ctrl || key.meta) return;

    if (str === "r" || str === "R") {
      this.windowRenderer.invalidate();
      this.engine.reset();
      return;
    }

    if (str !== undefined) {
      this.engine.processInput(str);
    }
  }

  // Repaints everything, e.g. after the terminal was resized
  redraw() {
    if (!this.isRunning) return;
    this.drawChrome();
    this.windowRenderer.invalidate();
    this.render(this.engine.getDisplayData());
  }

  quit() {
    if (this.refreshTimer === null) return;

    clearInterval(this.refreshTimer);
    this.refreshTimer = null;
    this.unsubscribe?.();
    this.unsubscribe = null;

    this.engine.stop();
    const { stats } = this.engine.getDisplayData();

    this.output.write(moveTo(EXIT_ROW) + SHOW_CURSOR);
    this.options.onExit?.(stats);
  }

  private render(data: DisplayData) {
    this.windowRenderer.render(data.cells);
    this.statsRenderer.render(data.stats);
  }

  private drawChrome() {
    const columns = this.output.columns;
    this.output.write(
      CLEAR_SCREEN +
        moveTo(TITLE_ROW, 1 + centerOffset(TITLE.length, columns)) +
        BOLD +
        TITLE +
        RESET +
        moveTo(HINT_ROW, 1 + centerOffset(HINT.length, columns)) +
        HINT
    );
  }
}
