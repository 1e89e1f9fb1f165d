import type { KnowledgeBase } from "../sim/knowledge.js";

// ── Coordinates ──────────────────────────────────────────────
export interface Cell {
  row: number;
  col: number;
}

/** "row,col" — the form cells take inside Sets and Maps. */
export type CellKey = string;

// ── Configuration ────────────────────────────────────────────
export enum Difficulty {
  Easy = "easy",
  Normal = "normal",
  Hard = "hard",
}

export interface GameConfig {
  height: number;
  width: number;
  hazards: number;
  seed: number;
}

// ── Grid oracle ──────────────────────────────────────────────
export interface Minefield {
  height: number;
  width: number;
  hazards: Set<CellKey>;
}

// ── Turns ────────────────────────────────────────────────────
export enum MoveKind {
  Safe = "safe",       // inferred safe by the knowledge base
  Random = "random",   // unconstrained guess
  Manual = "manual",   // supplied by the caller
}

export enum TurnOutcome {
  Revealed = "revealed",
  Exploded = "exploded",
  Exhausted = "exhausted",
}

export interface TurnRecord {
  turn: number;
  cell: Cell | null;
  kind: MoveKind | null;
  outcome: TurnOutcome;
  count?: number; // neighbour hazard count, when revealed
}

// ── Game state ───────────────────────────────────────────────
export interface GameState {
  seed: number;
  turn: number;
  field: Minefield;
  knowledge: KnowledgeBase;
  revealed: Map<CellKey, number>; // probed cell -> neighbour hazard count
  movesMade: Set<CellKey>;
  flags: Set<CellKey>;
  exploded: CellKey | null;
  logs: TurnRecord[];
  gameOver: boolean;
  victory: boolean;
}
