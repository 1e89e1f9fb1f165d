import * as ROT from "rot-js";
import type { GameConfig, GameState, Minefield } from "../shared/types.js";
import { KnowledgeBase } from "./knowledge.js";
import { generateMinefield } from "./minefield.js";

export function createGameFromField(field: Minefield, seed: number): GameState {
  return {
    seed,
    turn: 0,
    field,
    knowledge: new KnowledgeBase(field.height, field.width),
    revealed: new Map(),
    movesMade: new Set(),
    flags: new Set(),
    exploded: null,
    logs: [],
    gameOver: false,
    victory: false,
  };
}

/**
 * Generate a fresh game from a seed. Seeds ROT.RNG, so random moves made
 * afterwards are reproducible too.
 */
export function createGame(config: GameConfig): GameState {
  ROT.RNG.setSeed(config.seed);
  return createGameFromField(generateMinefield(config), config.seed);
}
