// ── Harness types for scripted and interactive play ─────────

/**
 * Structured observation of game state.
 * Rendered from GameState via buildObservation().
 */
export interface HarnessObservation {
  turn: number;
  seed: number;
  height: number;
  width: number;
  hazardTotal: number;
  gameOver: boolean;
  victory: boolean;
  mapText: string;            // board from renderToString, status line included
  flagged: string[];          // "(r,c)" of inferred hazards
  safeMoves: string[];        // "(r,c)" of inferred safe cells not yet probed
  constraints: string[];      // live constraints, "{(r,c), ...} = n"
  recentLogs: string[];       // last few turn records
}

/**
 * A move submitted as JSON, e.g. {"row": 2, "col": 3}.
 */
export interface HarnessMove {
  row?: unknown;
  col?: unknown;
}
