import * as ROT from "rot-js";
import type { Cell, CellKey, GameConfig, Minefield } from "../shared/types.js";
import { allCells, cellKey, formatCell, inBounds, neighborsOf } from "../shared/cells.js";
import { ConfigError } from "./errors.js";

/**
 * Validate grid dimensions and hazard count.
 */
export function validateConfig(config: Omit<GameConfig, "seed">): void {
  const { height, width, hazards } = config;
  if (!Number.isInteger(height) || height < 1) {
    throw new ConfigError(`height must be a positive integer, got ${height}`);
  }
  if (!Number.isInteger(width) || width < 1) {
    throw new ConfigError(`width must be a positive integer, got ${width}`);
  }
  if (!Number.isInteger(hazards) || hazards < 0 || hazards > height * width) {
    throw new ConfigError(`hazards must be an integer between 0 and ${height * width}, got ${hazards}`);
  }
}

/**
 * Build a minefield with hazards at exactly the given cells.
 */
export function createMinefield(height: number, width: number, hazards: Cell[]): Minefield {
  validateConfig({ height, width, hazards: 0 });
  const keys = new Set<CellKey>();
  for (const cell of hazards) {
    if (!inBounds(cell, height, width)) {
      throw new ConfigError(`Hazard ${formatCell(cell)} is outside the ${height}x${width} grid`);
    }
    keys.add(cellKey(cell));
  }
  return { height, width, hazards: keys };
}

/**
 * Place `config.hazards` distinct hazards at random.
 * ROT.RNG must already be seeded.
 */
export function generateMinefield(config: Omit<GameConfig, "seed">): Minefield {
  validateConfig(config);
  const shuffled = ROT.RNG.shuffle(allCells(config.height, config.width));
  return createMinefield(config.height, config.width, shuffled.slice(0, config.hazards));
}

export function isHazard(field: Minefield, cell: Cell): boolean {
  return field.hazards.has(cellKey(cell));
}

/**
 * Number of hazards within one row and column of `cell`, not including the
 * cell itself.
 */
export function neighborHazardCount(field: Minefield, cell: Cell): number {
  let count = 0;
  for (const n of neighborsOf(cell, field.height, field.width)) {
    if (field.hazards.has(cellKey(n))) count++;
  }
  return count;
}

/** True once the flagged cells are exactly the hazards. */
export function won(field: Minefield, flags: ReadonlySet<CellKey>): boolean {
  if (flags.size !== field.hazards.size) return false;
  for (const key of flags) {
    if (!field.hazards.has(key)) return false;
  }
  return true;
}

/** True once every non-hazard cell has been revealed. */
export function cleared(field: Minefield, revealed: ReadonlyMap<CellKey, number>): boolean {
  let safeRevealed = 0;
  for (const key of revealed.keys()) {
    if (!field.hazards.has(key)) safeRevealed++;
  }
  return safeRevealed === field.height * field.width - field.hazards.size;
}
