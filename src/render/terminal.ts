import type { GameState, Minefield } from "../shared/types.js";
import { GLYPHS } from "../shared/constants.js";
import { cellKey } from "../shared/cells.js";

/**
 * Render game state to a plain-text string (for headless/harness use).
 * Hazards the engine has not flagged stay hidden unless `reveal` is set or
 * the game is over.
 */
export function renderToString(state: GameState, reveal = false): string {
  const lines: string[] = [];
  const showHazards = reveal || state.gameOver;

  for (let row = 0; row < state.field.height; row++) {
    let line = "";
    for (let col = 0; col < state.field.width; col++) {
      const key = cellKey({ row, col });
      const count = state.revealed.get(key);
      if (key === state.exploded) {
        line += GLYPHS.exploded;
      } else if (count !== undefined) {
        line += count === 0 ? GLYPHS.empty : String(count);
      } else if (state.flags.has(key)) {
        line += GLYPHS.flag;
      } else if (showHazards && state.field.hazards.has(key)) {
        line += GLYPHS.hazard;
      } else if (state.knowledge.isSafe({ row, col })) {
        line += GLYPHS.safe;
      } else {
        line += GLYPHS.hidden;
      }
    }
    lines.push(line);
  }

  lines.push(`Turn: ${state.turn}  Flags: ${state.flags.size}/${state.field.hazards.size}  Safe moves: ${state.knowledge.safesUnprobed().length}`);
  return lines.join("\n");
}

/**
 * Ground-truth board: `X` where a hazard sits, blank elsewhere.
 */
export function renderMinefield(field: Minefield): string {
  const rule = "--".repeat(field.width) + "-";
  const lines: string[] = [];
  for (let row = 0; row < field.height; row++) {
    lines.push(rule);
    let line = "";
    for (let col = 0; col < field.width; col++) {
      line += field.hazards.has(cellKey({ row, col })) ? "|X" : "| ";
    }
    lines.push(line + "|");
  }
  lines.push(rule);
  return lines.join("\n");
}
