import type { Cell, GameState } from "../shared/types.js";
import { MoveKind, TurnOutcome } from "../shared/types.js";
import { cellKey, formatCell, inBounds } from "../shared/cells.js";
import { cleared, isHazard, neighborHazardCount, won } from "./minefield.js";
import { selectRandomMove, selectSafeMove } from "./moves.js";

/**
 * The engine's own choice: a known-safe cell if there is one, otherwise a
 * guess among cells not known to be hazards.
 */
export function chooseMove(state: GameState): { cell: Cell; kind: MoveKind } | null {
  const safe = selectSafeMove(state.knowledge, state.movesMade);
  if (safe) return { cell: safe, kind: MoveKind.Safe };
  const random = selectRandomMove(state.knowledge, state.movesMade, state.field.height, state.field.width);
  if (random) return { cell: random, kind: MoveKind.Random };
  return null;
}

/**
 * Why the caller may not probe this cell now, or null if it may.
 */
export function rejectMove(state: GameState, cell: Cell): string | null {
  if (state.gameOver) return "The game is over";
  const { height, width } = state.field;
  if (!inBounds(cell, height, width)) return `Cell ${formatCell(cell)} is outside the ${height}x${width} grid`;
  if (state.revealed.has(cellKey(cell))) return `Cell ${formatCell(cell)} has already been revealed`;
  return null;
}

export function isValidMove(state: GameState, cell: Cell): boolean {
  return rejectMove(state, cell) === null;
}

/**
 * Play one turn. With no cell the engine picks its own move.
 * Mutates and returns `state`; an invalid manual move changes nothing.
 */
export function step(state: GameState, cell?: Cell): GameState {
  if (state.gameOver) return state;

  let move: { cell: Cell; kind: MoveKind } | null;
  if (cell) {
    if (!isValidMove(state, cell)) return state;
    move = { cell, kind: MoveKind.Manual };
  } else {
    move = chooseMove(state);
  }

  state.turn++;

  if (!move) {
    state.logs.push({ turn: state.turn, cell: null, kind: null, outcome: TurnOutcome.Exhausted });
    state.gameOver = true;
    state.victory = false;
    return state;
  }

  const key = cellKey(move.cell);
  state.movesMade.add(key);

  if (isHazard(state.field, move.cell)) {
    state.logs.push({ turn: state.turn, cell: move.cell, kind: move.kind, outcome: TurnOutcome.Exploded });
    state.exploded = key;
    state.gameOver = true;
    state.victory = false;
    return state;
  }

  const count = neighborHazardCount(state.field, move.cell);
  state.revealed.set(key, count);
  state.knowledge.ingest(move.cell, count);
  for (const hazard of state.knowledge.hazards()) {
    state.flags.add(cellKey(hazard));
  }
  state.logs.push({ turn: state.turn, cell: move.cell, kind: move.kind, outcome: TurnOutcome.Revealed, count });

  if (won(state.field, state.flags) || cleared(state.field, state.revealed)) {
    state.gameOver = true;
    state.victory = true;
  }
  return state;
}

/**
 * Let the engine play until the game ends or `maxTurns` is reached.
 */
export function autoPlay(state: GameState, maxTurns: number): GameState {
  while (!state.gameOver && state.turn < maxTurns) {
    step(state);
  }
  return state;
}
