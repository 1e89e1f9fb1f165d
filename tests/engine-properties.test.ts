import { describe, it, expect } from "vitest";
import { createGame } from "../src/sim/state.js";
import { step } from "../src/sim/step.js";
import { cellKey } from "../src/shared/cells.js";
import type { GameState } from "../src/shared/types.js";

const SEEDS = [1, 2, 3, 7, 42, 99, 1234, 184201];

/** Play a whole game, calling `check` after every turn. */
function playChecked(state: GameState, check: (s: GameState) => void): GameState {
  let guard = 0;
  while (!state.gameOver && guard++ < 500) {
    step(state);
    check(state);
  }
  return state;
}

describe("Knowledge base invariants over auto-played games", () => {
  SEEDS.forEach((seed) => {
    it(`seed ${seed}: every inferred fact matches the field and the base stays consistent`, () => {
      const state = createGame({ height: 8, width: 8, hazards: 10, seed });

      playChecked(state, (s) => {
        const kb = s.knowledge;
        const hazards = new Set(kb.hazards().map(cellKey));
        const safes = new Set(kb.safes().map(cellKey));

        // Soundness against ground truth
        for (const key of hazards) expect(s.field.hazards.has(key)).toBe(true);
        for (const key of safes) expect(s.field.hazards.has(key)).toBe(false);

        // hazards ∩ safes = ∅, probed ⊆ safes
        for (const key of hazards) expect(safes.has(key)).toBe(false);
        for (const cell of kb.allProbed()) expect(safes.has(cellKey(cell))).toBe(true);
        for (const cell of kb.safesUnprobed()) expect(hazards.has(cellKey(cell))).toBe(false);

        // Constraints hold only unresolved cells, with count in range, no duplicates
        const constraints = kb.constraints();
        constraints.forEach((c, i) => {
          expect(c.count).toBeGreaterThanOrEqual(0);
          expect(c.count).toBeLessThanOrEqual(c.size);
          for (const key of c.cells) {
            expect(hazards.has(key)).toBe(false);
            expect(safes.has(key)).toBe(false);
          }
          for (let j = i + 1; j < constraints.length; j++) {
            expect(c.equals(constraints[j])).toBe(false);
          }
        });

        // Saturation is complete
        expect(kb.saturate()).toBe(false);
      });

      expect(state.gameOver).toBe(true);
    });
  });

  it("hazards and safes only ever grow", () => {
    const state = createGame({ height: 10, width: 10, hazards: 12, seed: 42 });
    let prevHazards = new Set<string>();
    let prevSafes = new Set<string>();

    playChecked(state, (s) => {
      const hazards = new Set(s.knowledge.hazards().map(cellKey));
      const safes = new Set(s.knowledge.safes().map(cellKey));
      for (const key of prevHazards) expect(hazards.has(key)).toBe(true);
      for (const key of prevSafes) expect(safes.has(key)).toBe(true);
      prevHazards = hazards;
      prevSafes = safes;
    });
  });

  it("never plays the same cell twice", () => {
    for (const seed of SEEDS) {
      const state = playChecked(createGame({ height: 8, width: 8, hazards: 8, seed }), () => {});
      const played = state.logs.flatMap(l => (l.cell ? [cellKey(l.cell)] : []));
      expect(new Set(played).size).toBe(played.length);
    }
  });
});

describe("Determinism", () => {
  it("the same seed replays the same game", () => {
    const a = playChecked(createGame({ height: 8, width: 8, hazards: 10, seed: 184201 }), () => {});
    const b = playChecked(createGame({ height: 8, width: 8, hazards: 10, seed: 184201 }), () => {});

    expect([...b.field.hazards].sort()).toEqual([...a.field.hazards].sort());
    expect(b.logs).toEqual(a.logs);
    expect(b.victory).toBe(a.victory);
  });
});
