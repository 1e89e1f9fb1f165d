import { Difficulty } from "./types.js";

// ── Board defaults ───────────────────────────────────────────
export const DEFAULT_HEIGHT = 8;
export const DEFAULT_WIDTH = 8;
export const DEFAULT_HAZARDS = 8;

// ── Golden seed ──────────────────────────────────────────────
export const GOLDEN_SEED = 184201;

// ── Harness ──────────────────────────────────────────────────
export const DEFAULT_MAX_TURNS = 1000;
export const RECENT_LOG_COUNT = 5;

// ── Difficulty presets ───────────────────────────────────────
export const DIFFICULTY_SETTINGS: Record<Difficulty, { height: number; width: number; hazards: number }> = {
  [Difficulty.Easy]: { height: DEFAULT_HEIGHT, width: DEFAULT_WIDTH, hazards: DEFAULT_HAZARDS },
  [Difficulty.Normal]: { height: 16, width: 16, hazards: 40 },
  [Difficulty.Hard]: { height: 16, width: 30, hazards: 99 },
};

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  hidden: "#",
  empty: ".",    // revealed, no neighbouring hazards
  flag: "F",     // inferred hazard
  safe: "o",     // inferred safe, not yet probed
  exploded: "X",
  hazard: "*",   // ground truth, shown on reveal only
} as const;
