import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { TestEngine } from "@numdrill/engine";
import { CLEAR_SCREEN, SHOW_CURSOR } from "@numdrill/ui";
import { NumdrillApp, formatSummary, Keypress } from "./app";

const QUIT_KEYS: Array<[string | undefined, Keypress]> = [
  ["q", { name: "q" }],
  ["Q", { name: "q" }],
  [undefined, { name: "escape" }],
  ["\x03", { name: "c", ctrl: true }],
];

function createOutput() {
  const chunks: string[] = [];
  return {
    chunks,
    columns: 80,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

function createApp() {
  const output = createOutput();
  const engine = new TestEngine({ windowRadius: 2, alphabet: "digits" }, { random: () => 0.35 });
  const onExit = vi.fn();
  const app = new NumdrillApp(engine, output, { refreshMs: 500, onExit });
  return { app, engine, output, onExit };
}

describe("NumdrillApp", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("run draws the screen and starts a session", () => {
    const { app, engine, output } = createApp();
    app.run();

    expect(app.isRunning).toBe(true);
    expect(engine.active).toBe(true);

    const screen = output.chunks.join("");
    expect(screen).toContain(CLEAR_SCREEN);
    expect(screen).toContain("numdrill");
    expect(screen).toContain("Type the highlighted character • Press R to reset • Q to quit");
    expect(screen).toContain("Accuracy:   0.00%");
  });

  test("forwards typed characters to the engine", () => {
    const { app, engine, output } = createApp();
    app.run();

    app.handleKeypress("3", { name: "3" });
    app.handleKeypress("5", { name: "5" });
    app.handleKeypress("x", { name: "x" });

    expect(engine.getStats()).toMatchObject({ correctCount: 1, totalCount: 2 });
    expect(output.chunks.join("")).toContain("Characters: 1 / 2");
  });

  test("ignores keys without a character and chords", () => {
    const { app, engine } = createApp();
    app.run();

    app.handleKeypress(undefined, { name: "up" });
    app.handleKeypress("\x01", { name: "a", ctrl: true });
    app.handleKeypress("3", { name: "3", meta: true });

    expect(engine.getStats().totalCount).toBe(0);
  });

  test("R starts a new session", () => {
    const { app, engine } = createApp();
    app.run();
    app.handleKeypress("3", { name: "3" });

    app.handleKeypress("r", { name: "r" });

    expect(engine.active).toBe(true);
    expect(engine.getStats().totalCount).toBe(0);
    expect(engine.getWindow()?.cursor).toBe(0);
  });

  test("refreshes the clock on an interval", () => {
    const { app, engine, output } = createApp();
    app.run();

    vi.advanceTimersByTime(1500);

    expect(engine.getStats().elapsedMs).toBe(1500);
    expect(output.chunks.join("")).toContain("Time:       1.50s");
  });

  test.each(QUIT_KEYS)("quits on %j", (str, key) => {
    const { app, engine, output, onExit } = createApp();
    app.run();
    app.handleKeypress("3", { name: "3" });

    app.handleKeypress(str, key);

    expect(app.isRunning).toBe(false);
    expect(engine.active).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
    expect(output.chunks.at(-1)).toBe("\x1b[13;1H" + SHOW_CURSOR);
    expect(onExit).toHaveBeenCalledTimes(1);
    expect(onExit).toHaveBeenCalledWith(
      expect.objectContaining({ correctCount: 1, totalCount: 1, accuracy: 100 })
    );
  });

  test("nothing reacts after quitting", () => {
    const { app, engine, output, onExit } = createApp();
    app.run();
    app.quit();
    const written = output.chunks.length;

    app.handleKeypress("3", { name: "3" });
    app.redraw();
    app.quit();
    vi.advanceTimersByTime(2000);

    expect(engine.getStats().totalCount).toBe(0);
    expect(output.chunks).toHaveLength(written);
    expect(onExit).toHaveBeenCalledTimes(1);
  });

  test("redraw repaints the whole screen", () => {
    const { app, output } = createApp();
    app.run();
    output.chunks.length = 0;

    app.redraw();

    const screen = output.chunks.join("");
    expect(screen.startsWith(CLEAR_SCREEN)).toBe(true);
    expect(screen).toContain("\x1b[4;1H\x1b[2K");
    expect(screen).toContain("Accuracy:");
  });
});

describe("formatSummary", () => {
  test("reports the final figures", () => {
    expect(
      formatSummary({ correctCount: 3, totalCount: 5, elapsedSeconds: 10, accuracy: 60, throughput: 30 })
    ).toBe("Session finished: 3 / 5 correct, 60.00% accuracy, 30.00 NPM in 10.00s");
  });
});
