/**
 * Observation renderer — flattens GameState into a HarnessObservation and
 * formats it as text for the CLI.
 */
import type { GameState, TurnRecord } from "../shared/types.js";
import { TurnOutcome } from "../shared/types.js";
import { RECENT_LOG_COUNT } from "../shared/constants.js";
import { formatCell } from "../shared/cells.js";
import { renderToString } from "../render/terminal.js";
import type { HarnessObservation } from "./types.js";

export function describeTurn(record: TurnRecord): string {
  if (record.outcome === TurnOutcome.Exhausted || !record.cell) {
    return `T${record.turn}: no move left`;
  }
  const where = formatCell(record.cell);
  if (record.outcome === TurnOutcome.Exploded) {
    return `T${record.turn}: ${record.kind} ${where} -> hazard`;
  }
  return `T${record.turn}: ${record.kind} ${where} -> ${record.count}`;
}

export function buildObservation(state: GameState, reveal = false): HarnessObservation {
  const kb = state.knowledge;
  return {
    turn: state.turn,
    seed: state.seed,
    height: state.field.height,
    width: state.field.width,
    hazardTotal: state.field.hazards.size,
    gameOver: state.gameOver,
    victory: state.victory,
    mapText: renderToString(state, reveal),
    flagged: kb.hazards().map(formatCell),
    safeMoves: kb.safesUnprobed().map(formatCell),
    constraints: kb.constraints().map(c => c.toString()),
    recentLogs: state.logs.slice(-RECENT_LOG_COUNT).map(describeTurn),
  };
}

export function renderObservationAsText(obs: HarnessObservation): string {
  const lines: string[] = [];

  lines.push(`=== TURN ${obs.turn} | SEED ${obs.seed} | ${obs.height}x${obs.width}, ${obs.hazardTotal} hazards ===`);
  if (obs.gameOver) {
    lines.push(obs.victory ? ">>> VICTORY <<<" : ">>> GAME OVER <<<");
  }

  lines.push("");
  lines.push(obs.mapText);

  lines.push("");
  lines.push(`FLAGGED: ${obs.flagged.length > 0 ? obs.flagged.join(" ") : "none"}`);
  lines.push(`SAFE MOVES: ${obs.safeMoves.length > 0 ? obs.safeMoves.join(" ") : "none"}`);

  if (obs.constraints.length > 0) {
    lines.push("");
    lines.push("CONSTRAINTS:");
    for (const c of obs.constraints) {
      lines.push(`  ${c}`);
    }
  }

  if (obs.recentLogs.length > 0) {
    lines.push("");
    lines.push("RECENT:");
    for (const log of obs.recentLogs) {
      lines.push(`  ${log}`);
    }
  }

  return lines.join("\n");
}
