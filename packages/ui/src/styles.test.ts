import { describe, expect, test } from "vitest";
import { COLORS, STATUS_STYLES, paint } from "./styles";
import { background, foreground, hexToRgb, moveTo } from "./terminal";

describe("terminal codes", () => {
  test("hexToRgb parses #RRGGBB", () => {
    expect(hexToRgb("#FFD700")).toEqual([255, 215, 0]);
    expect(hexToRgb("90ee90")).toEqual([144, 238, 144]);
  });

  test("hexToRgb rejects anything else", () => {
    expect(() => hexToRgb("#FFF")).toThrow(RangeError);
    expect(() => hexToRgb("gold")).toThrow(RangeError);
  });

  test("truecolor sequences", () => {
    expect(foreground("#000000")).toBe("\x1b[38;2;0;0;0m");
    expect(background("#FFB6C1")).toBe("\x1b[48;2;255;182;193m");
  });

  test("moveTo defaults to the first column", () => {
    expect(moveTo(4)).toBe("\x1b[4;1H");
    expect(moveTo(6, 3)).toBe("\x1b[6;3H");
  });
});

describe("status styles", () => {
  test("only the current symbol is bold", () => {
    expect(STATUS_STYLES.current.bold).toBe(true);
    expect(STATUS_STYLES.correct.bold).toBe(false);
    expect(STATUS_STYLES.incorrect.bold).toBe(false);
    expect(STATUS_STYLES.future.bold).toBe(false);
  });

  test("each status has its own background on black text", () => {
    expect(STATUS_STYLES.current.background).toBe(COLORS.current);
    expect(STATUS_STYLES.correct.background).toBe(COLORS.correct);
    expect(STATUS_STYLES.incorrect.background).toBe(COLORS.incorrect);
    expect(STATUS_STYLES.future.background).toBe(COLORS.future);
    expect(Object.values(STATUS_STYLES).every((s) => s.foreground === COLORS.text)).toBe(true);
  });

  test("paint wraps the text and resets afterwards", () => {
    expect(paint("7", STATUS_STYLES.current)).toBe(
      "\x1b[1m\x1b[38;2;0;0;0m\x1b[48;2;255;215;0m7\x1b[0m"
    );
    expect(paint(" 3 ", STATUS_STYLES.correct)).toBe(
      "\x1b[38;2;0;0;0m\x1b[48;2;144;238;144m 3 \x1b[0m"
    );
  });
});
