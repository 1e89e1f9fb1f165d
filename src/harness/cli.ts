import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { createGame } from "../sim/state.js";
import { autoPlay, rejectMove, step } from "../sim/step.js";
import { renderMinefield } from "../render/terminal.js";
import {
  DEFAULT_HAZARDS,
  DEFAULT_HEIGHT,
  DEFAULT_MAX_TURNS,
  DEFAULT_WIDTH,
  DIFFICULTY_SETTINGS,
  GOLDEN_SEED,
} from "../shared/constants.js";
import { formatCell } from "../shared/cells.js";
import { Difficulty } from "../shared/types.js";
import type { GameState } from "../shared/types.js";
import { parseMove } from "./moveParser.js";
import { buildObservation, renderObservationAsText } from "./obsRenderer.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  seed: number;
  height: number;
  width: number;
  hazards: number;
  maxTurns: number;
  script: string | null;
  auto: boolean;
  reveal: boolean;
}

function parsePositiveInt(flag: string, value: string | undefined, allowZero = false): number {
  const n = parseInt(value ?? "", 10);
  if (Number.isNaN(n) || n < (allowZero ? 0 : 1)) {
    console.error(`ERROR: ${flag} requires a ${allowZero ? "non-negative" : "positive"} integer`);
    process.exit(1);
  }
  return n;
}

function isDifficulty(value: string): value is Difficulty {
  return Object.values(Difficulty).some(d => d === value);
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    seed: GOLDEN_SEED,
    height: DEFAULT_HEIGHT,
    width: DEFAULT_WIDTH,
    hazards: DEFAULT_HAZARDS,
    maxTurns: DEFAULT_MAX_TURNS,
    script: null,
    auto: false,
    reveal: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--seed":
        opts.seed = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.seed)) {
          console.error("ERROR: --seed requires a valid integer");
          process.exit(1);
        }
        break;
      case "--difficulty": {
        const value = (argv[++i] ?? "").toLowerCase();
        if (!isDifficulty(value)) {
          console.error("ERROR: --difficulty must be 'easy', 'normal' or 'hard'");
          process.exit(1);
        }
        const settings = DIFFICULTY_SETTINGS[value];
        opts.height = settings.height;
        opts.width = settings.width;
        opts.hazards = settings.hazards;
        break;
      }
      case "--height":
        opts.height = parsePositiveInt("--height", argv[++i]);
        break;
      case "--width":
        opts.width = parsePositiveInt("--width", argv[++i]);
        break;
      case "--hazards":
        opts.hazards = parsePositiveInt("--hazards", argv[++i], true);
        break;
      case "--max-turns":
        opts.maxTurns = parsePositiveInt("--max-turns", argv[++i]);
        break;
      case "--script":
        opts.script = argv[++i] ?? null;
        break;
      case "--auto":
        opts.auto = true;
        break;
      case "--reveal":
        opts.reveal = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Output ───────────────────────────────────────────────────

/**
 * Emit the observation block to stdout, delimited for agent parsing.
 */
function emitObservation(state: GameState, reveal: boolean): void {
  console.log("===OBSERVATION_START===");
  console.log(renderObservationAsText(buildObservation(state, reveal)));
  console.log("===OBSERVATION_END===");
}

function printSummary(state: GameState): void {
  const kb = state.knowledge;
  const last = state.logs[state.logs.length - 1];

  console.log("");
  console.log("=== GAME OVER ===");
  console.log(`Result: ${state.victory ? "VICTORY" : state.gameOver ? "DEFEAT" : "UNFINISHED"}`);
  console.log(`Turns: ${state.turn}`);
  console.log(`Cells probed: ${kb.allProbed().length}/${state.field.height * state.field.width - state.field.hazards.size}`);
  console.log(`Hazards flagged: ${state.flags.size}/${state.field.hazards.size}`);
  if (state.exploded && last?.cell) {
    console.log(`Hit hazard at ${formatCell(last.cell)} on a ${last.kind} move`);
  }
  console.log("");
  console.log(renderMinefield(state.field));
}

/**
 * Play one parsed line. Returns false when the line was rejected.
 */
function playLine(state: GameState, line: string): boolean {
  const result = parseMove(line, state.field.height, state.field.width);
  if (typeof result === "object" && "error" in result) {
    console.log(`===ERROR=== ${result.error}`);
    return false;
  }
  if (result === "auto") {
    step(state);
    return true;
  }
  const rejection = rejectMove(state, result);
  if (rejection) {
    console.log(`===ERROR=== ${rejection}`);
    return false;
  }
  step(state, result);
  return true;
}

// ── Script mode ──────────────────────────────────────────────

function runScript(scriptPath: string, state: GameState, reveal: boolean, maxTurns: number): void {
  let rawLines: string[];
  try {
    const content = readFileSync(scriptPath, "utf-8");
    rawLines = content.split("\n").map(l => l.trim()).filter(l => l.length > 0 && !l.startsWith("//"));
  } catch (err) {
    console.error(`ERROR: Could not read script file "${scriptPath}": ${err}`);
    process.exit(1);
  }

  emitObservation(state, reveal);

  for (const line of rawLines) {
    if (state.gameOver) break;
    if (state.turn >= maxTurns) {
      console.log(`MAX TURNS (${maxTurns}) reached.`);
      break;
    }
    if (playLine(state, line)) emitObservation(state, reveal);
  }

  printSummary(state);
}

// ── Interactive stdin mode ───────────────────────────────────

async function runInteractive(state: GameState, reveal: boolean, maxTurns: number): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  emitObservation(state, reveal);

  for await (const line of rl) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;

    if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") {
      console.log("Player requested exit.");
      printSummary(state);
      process.exit(0);
    }

    playLine(state, trimmed);
    emitObservation(state, reveal);

    if (state.gameOver) {
      printSummary(state);
      process.exit(state.victory ? 0 : 1);
    }

    if (state.turn >= maxTurns) {
      console.log(`MAX TURNS (${maxTurns}) reached.`);
      printSummary(state);
      process.exit(1);
    }
  }

  // stdin closed (pipe ended)
  console.log("stdin closed.");
  printSummary(state);
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();

  console.log("Minefield Deduce v0.1");
  console.log(`Seed: ${args.seed}  Grid: ${args.height}x${args.width}  Hazards: ${args.hazards}  Max turns: ${args.maxTurns}`);
  if (args.script) {
    console.log(`Script: ${args.script}`);
  }
  console.log("");

  const state = createGame({ height: args.height, width: args.width, hazards: args.hazards, seed: args.seed });

  if (args.auto) {
    autoPlay(state, args.maxTurns);
    emitObservation(state, args.reveal);
    printSummary(state);
    process.exit(state.victory ? 0 : 1);
  } else if (args.script) {
    runScript(args.script, state, args.reveal, args.maxTurns);
  } else {
    await runInteractive(state, args.reveal, args.maxTurns);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
