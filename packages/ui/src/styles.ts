import { CharStatus } from "@numdrill/types";
import { BOLD, RESET, background, foreground } from "./terminal";

export interface CellStyle {
  background: string;
  foreground: string;
  bold: boolean;
}

export const COLORS = {
  current: "#FFD700", // Gold
  correct: "#90EE90", // Light Green
  incorrect: "#FFB6C1", // Light Pink
  future: "#F0F0F0", // Light Gray
  text: "#000000",
} as const;

export const STATUS_STYLES: Record<CharStatus, CellStyle> = {
  current: { background: COLORS.current, foreground: COLORS.text, bold: true },
  correct: { background: COLORS.correct, foreground: COLORS.text, bold: false },
  incorrect: { background: COLORS.incorrect, foreground: COLORS.text, bold: false },
  future: { background: COLORS.future, foreground: COLORS.text, bold: false },
};

export function paint(text: string, style: CellStyle): string {
  const weight = style.bold ? BOLD : "";
  return `${weight}${foreground(style.foreground)}${background(style.background)}${text}${RESET}`;
}
