import { describe, it, expect } from "vitest";
import { renderMinefield, renderToString } from "../src/render/terminal.js";
import { createGameFromField } from "../src/sim/state.js";
import { createMinefield } from "../src/sim/minefield.js";
import { autoPlay, step } from "../src/sim/step.js";

function cornerGame() {
  return createGameFromField(createMinefield(3, 3, [{ row: 2, col: 2 }]), 7);
}

describe("renderToString", () => {
  it("hides everything on a fresh board", () => {
    expect(renderToString(cornerGame())).toBe([
      "###",
      "###",
      "###",
      "Turn: 0  Flags: 0/1  Safe moves: 0",
    ].join("\n"));
  });

  it("shows hazards when asked to reveal", () => {
    expect(renderToString(cornerGame(), true).split("\n")[2]).toBe("##*");
  });

  it("marks revealed counts and inferred safe cells", () => {
    const state = cornerGame();
    step(state, { row: 0, col: 0 });
    expect(renderToString(state)).toBe([
      ".o#",
      "oo#",
      "###",
      "Turn: 1  Flags: 0/1  Safe moves: 3",
    ].join("\n"));
  });

  it("marks flags once the engine has found the hazard", () => {
    const state = cornerGame();
    step(state, { row: 0, col: 0 });
    autoPlay(state, 100);
    expect(renderToString(state)).toBe([
      "...",
      ".1o",
      "ooF",
      "Turn: 5  Flags: 1/1  Safe moves: 3",
    ].join("\n"));
  });

  it("marks the hazard that ended the game", () => {
    const state = cornerGame();
    step(state, { row: 2, col: 2 });
    expect(renderToString(state).split("\n").slice(0, 3)).toEqual(["###", "###", "##X"]);
  });
});

describe("renderMinefield", () => {
  it("draws hazards between rule lines", () => {
    const field = createMinefield(2, 2, [{ row: 0, col: 1 }]);
    expect(renderMinefield(field)).toBe([
      "-----",
      "| |X|",
      "-----",
      "| | |",
      "-----",
    ].join("\n"));
  });
});
