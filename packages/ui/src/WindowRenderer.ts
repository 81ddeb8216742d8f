import { CharCell } from "@numdrill/types";
import { STATUS_STYLES, paint } from "./styles";
import { CLEAR_LINE, centerOffset, moveTo, TerminalOutput } from "./terminal";

const CELL_WIDTH = 3; // symbol plus one space of padding each side
const CELL_GAP = " ";

export class WindowRenderer {
  private output: TerminalOutput;
  private row: number;
  private lastCells: CharCell[] = [];

  constructor(output: TerminalOutput, row: number) {
    this.output = output;
    this.row = row;
  }

  static visibleWidth(cellCount: number): number {
    if (cellCount === 0) return 0;
    return cellCount * CELL_WIDTH + (cellCount - 1) * CELL_GAP.length;
  }

  format(cells: CharCell[]): string {
    return cells.map((c) => paint(` ${c.symbol} `, STATUS_STYLES[c.status])).join(CELL_GAP);
  }

  // Returns false when the cells match the last frame and nothing was written
  render(cells: CharCell[]): boolean {
    if (this.isUnchanged(cells)) return false;

    const col = 1 + centerOffset(WindowRenderer.visibleWidth(cells.length), this.output.columns);
    this.output.write(moveTo(this.row) + CLEAR_LINE + moveTo(this.row, col) + this.format(cells));
    this.lastCells = cells.map((c) => ({ ...c }));
    return true;
  }

  // Forces the next render to redraw, e.g. after the screen was cleared
  invalidate() {
    this.lastCells = [];
  }

  private isUnchanged(cells: CharCell[]): boolean {
    if (cells.length !== this.lastCells.length || cells.length === 0) return false;
    return cells.every(
      (c, i) => c.symbol === this.lastCells[i].symbol && c.status === this.lastCells[i].status
    );
  }
}
