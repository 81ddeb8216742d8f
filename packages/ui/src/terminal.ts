export interface TerminalOutput {
  write(chunk: string): unknown;
  columns?: number;
}

const CSI = "\x1b[";

export const RESET = `${CSI}0m`;
export const BOLD = `${CSI}1m`;
export const CLEAR_SCREEN = `${CSI}2J${CSI}H`;
export const CLEAR_LINE = `${CSI}2K`;
export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;

// Rows and columns are 1-based, as in the terminal itself
export function moveTo(row: number, col: number = 1): string {
  return `${CSI}${row};${col}H`;
}

export function hexToRgb(hex: string): [number, number, number] {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) {
    throw new RangeError(`Expected a #RRGGBB color, got "${hex}"`);
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

export function foreground(hex: string): string {
  const [r, g, b] = hexToRgb(hex);
  return `${CSI}38;2;${r};${g};${b}m`;
}

export function background(hex: string): string {
  const [r, g, b] = hexToRgb(hex);
  return `${CSI}48;2;${r};${g};${b}m`;
}

export function centerOffset(width: number, columns: number | undefined): number {
  if (!columns) return 0;
  return Math.max(0, Math.floor((columns - width) / 2));
}
