/**
 * Batch playtest — lets the engine play a run of seeds on its own and
 * reports how often pure deduction plus forced guesses wins.
 *
 *   tsx playtest_bot.ts [games] [firstSeed] [easy|normal|hard]
 */
import { createGame } from "./src/sim/state.js";
import { autoPlay } from "./src/sim/step.js";
import { DEFAULT_MAX_TURNS, DIFFICULTY_SETTINGS } from "./src/shared/constants.js";
import { Difficulty, MoveKind, TurnOutcome } from "./src/shared/types.js";

const GAMES = parseInt(process.argv[2] || "20", 10);
const FIRST_SEED = parseInt(process.argv[3] || "1", 10);
const diffArg = process.argv[4] || "easy";
const DIFFICULTY: Difficulty = diffArg === "hard" ? Difficulty.Hard
  : diffArg === "normal" ? Difficulty.Normal
  : Difficulty.Easy;

if (Number.isNaN(GAMES) || GAMES < 1 || Number.isNaN(FIRST_SEED)) {
  console.error("Usage: tsx playtest_bot.ts [games] [firstSeed] [easy|normal|hard]");
  process.exit(1);
}

const settings = DIFFICULTY_SETTINGS[DIFFICULTY];
let wins = 0;
let totalGuesses = 0;

console.log(`Playtest: ${GAMES} games, ${settings.height}x${settings.width}, ${settings.hazards} hazards`);

for (let seed = FIRST_SEED; seed < FIRST_SEED + GAMES; seed++) {
  const state = autoPlay(createGame({ ...settings, seed }), DEFAULT_MAX_TURNS);
  const guesses = state.logs.filter(l => l.kind === MoveKind.Random).length;
  const deduced = state.logs.filter(l => l.kind === MoveKind.Safe).length;
  const last = state.logs[state.logs.length - 1];
  const ending = state.victory ? "WIN "
    : last?.outcome === TurnOutcome.Exploded ? "BOOM"
    : "STOP";

  if (state.victory) wins++;
  totalGuesses += guesses;

  console.log(
    `seed ${String(seed).padStart(6)}  ${ending}  turns=${state.turn}  deduced=${deduced}  guesses=${guesses}  flagged=${state.flags.size}/${settings.hazards}`,
  );
}

console.log("");
console.log(`Wins: ${wins}/${GAMES} (${((wins / GAMES) * 100).toFixed(1)}%)`);
console.log(`Average guesses per game: ${(totalGuesses / GAMES).toFixed(2)}`);
