import type { Cell, CellKey } from "./types.js";

export function cellKey(cell: Cell): CellKey {
  return `${cell.row},${cell.col}`;
}

export function parseCellKey(key: CellKey): Cell {
  const [row, col] = key.split(",").map(n => parseInt(n, 10));
  return { row, col };
}

export function formatCell(cell: Cell): string {
  return `(${cell.row},${cell.col})`;
}

export function inBounds(cell: Cell, height: number, width: number): boolean {
  return Number.isInteger(cell.row) && Number.isInteger(cell.col)
    && cell.row >= 0 && cell.row < height
    && cell.col >= 0 && cell.col < width;
}

/** Row-major ordering. */
export function compareCells(a: Cell, b: Cell): number {
  return a.row - b.row || a.col - b.col;
}

export function sortedCells(keys: Iterable<CellKey>): Cell[] {
  return Array.from(keys, parseCellKey).sort(compareCells);
}

/**
 * In-bounds cells within one row and column of `cell`, not including the
 * cell itself. Between 3 and 8 cells on any grid of at least 2×2.
 */
export function neighborsOf(cell: Cell, height: number, width: number): Cell[] {
  const result: Cell[] = [];
  for (let row = cell.row - 1; row <= cell.row + 1; row++) {
    for (let col = cell.col - 1; col <= cell.col + 1; col++) {
      if (row === cell.row && col === cell.col) continue;
      if (row < 0 || row >= height || col < 0 || col >= width) continue;
      result.push({ row, col });
    }
  }
  return result;
}

export function allCells(height: number, width: number): Cell[] {
  const result: Cell[] = [];
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      result.push({ row, col });
    }
  }
  return result;
}
