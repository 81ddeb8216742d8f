import { CharCell, CharStatus, PracticeSymbol, WindowState } from "@numdrill/types";

export function getWindowLength(radius: number): number {
  return radius * 2 + 1;
}

export function createWindow(symbols: PracticeSymbol[], radius: number): WindowState {
  const expected = getWindowLength(radius);
  if (symbols.length !== expected) {
    throw new RangeError(`Window of radius ${radius} needs ${expected} symbols, got ${symbols.length}`);
  }
  return {
    target: [...symbols],
    typed: [],
    cursor: 0,
    radius,
  };
}

export function typeSymbol(
  window: WindowState,
  symbol: PracticeSymbol
): { window: WindowState; isCorrect: boolean } {
  const isCorrect = symbol === window.target[window.cursor];
  return {
    window: {
      ...window,
      typed: [...window.typed, symbol],
      cursor: window.cursor + 1,
    },
    isCorrect,
  };
}

// Slide once the cursor has moved past the centre of the window
export function shouldSlide(window: WindowState): boolean {
  return window.cursor >= window.radius + 1;
}

export function slideWindow(window: WindowState, nextSymbol: PracticeSymbol): WindowState {
  return {
    ...window,
    target: [...window.target.slice(1), nextSymbol],
    typed: window.typed.slice(1),
    cursor: window.cursor - 1,
  };
}

export function getCharStatus(window: WindowState, index: number): CharStatus {
  const { target, typed, cursor } = window;

  if (index === cursor) return "current";
  if (index > cursor) return "future";

  const typedChar = typed[index];
  // typed always holds `cursor` entries; keep a sane status if it ever doesn't
  if (typedChar === undefined) return "future";

  return typedChar === target[index] ? "correct" : "incorrect";
}

export function getCharStatuses(window: WindowState): CharCell[] {
  return window.target.map((symbol, i) => ({
    symbol,
    status: getCharStatus(window, i),
  }));
}
