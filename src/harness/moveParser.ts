import type { Cell } from "../shared/types.js";
import { formatCell, inBounds } from "../shared/cells.js";
import type { HarnessMove } from "./types.js";

export type ParsedMove = Cell | "auto";

const AUTO_WORDS = new Set(["auto", "ai"]);
const PAIR_PATTERN = /^(-?\d+)\s*[, ]\s*(-?\d+)$/;

/**
 * Parse a line of input into a cell to probe, "auto" (let the engine
 * choose), or an error.
 *
 * Accepted forms:
 *   3,4
 *   3 4
 *   {"row": 3, "col": 4}
 *   auto | ai
 */
export function parseMove(input: string, height: number, width: number): ParsedMove | { error: string } {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { error: "Empty move" };
  }
  if (AUTO_WORDS.has(trimmed.toLowerCase())) {
    return "auto";
  }

  let cell: Cell;
  if (trimmed.startsWith("{")) {
    let parsed: HarnessMove;
    try {
      parsed = JSON.parse(trimmed) as HarnessMove;
    } catch {
      return { error: `Invalid JSON: ${trimmed}` };
    }
    if (typeof parsed.row !== "number" || typeof parsed.col !== "number") {
      return { error: `JSON move requires numeric "row" and "col" fields` };
    }
    cell = { row: parsed.row, col: parsed.col };
  } else {
    const match = PAIR_PATTERN.exec(trimmed);
    if (!match) {
      return { error: `Unrecognised move "${trimmed}". Use "row,col", "row col" or "auto".` };
    }
    cell = { row: parseInt(match[1], 10), col: parseInt(match[2], 10) };
  }

  if (!inBounds(cell, height, width)) {
    return { error: `Cell ${formatCell(cell)} is outside the ${height}x${width} grid` };
  }
  return cell;
}
