/**
 * Move selection. Reads the knowledge base, never writes it; the caller
 * records whichever cell it plays in its own `movesMade`.
 */
import * as ROT from "rot-js";
import type { Cell, CellKey } from "../shared/types.js";
import { allCells, cellKey } from "../shared/cells.js";
import type { KnowledgeBase } from "./knowledge.js";

/**
 * First cell (row-major) known to be safe that has not been played yet.
 */
export function selectSafeMove(knowledge: KnowledgeBase, movesMade: ReadonlySet<CellKey>): Cell | null {
  for (const cell of knowledge.safesUnprobed()) {
    if (!movesMade.has(cellKey(cell))) return cell;
  }
  return null;
}

/**
 * Uniform pick among cells that are neither known hazards nor already
 * played. ROT.RNG must be seeded.
 */
export function selectRandomMove(
  knowledge: KnowledgeBase,
  movesMade: ReadonlySet<CellKey>,
  height: number,
  width: number,
): Cell | null {
  const candidates = allCells(height, width).filter(cell =>
    !knowledge.isHazard(cell)
    && !knowledge.isProbed(cell)
    && !movesMade.has(cellKey(cell))
  );
  if (candidates.length === 0) return null;
  return ROT.RNG.getItem(candidates);
}
