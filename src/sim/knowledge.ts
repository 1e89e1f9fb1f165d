/**
 * Knowledge base — accumulated facts about one grid and the constraints
 * that produced them.
 *
 * `ingest` is the only mutating entry point. It turns an observation into a
 * constraint and saturates: simple facts (count 0 / count == size) and
 * pairwise subset resolution repeat until a full sweep changes nothing.
 * All mutation is forward inference; nothing is ever retracted.
 */
import type { Cell, CellKey } from "../shared/types.js";
import { cellKey, formatCell, inBounds, neighborsOf, sortedCells } from "../shared/cells.js";
import { Constraint } from "./constraint.js";
import { ConsistencyError, PreconditionError } from "./errors.js";

export class KnowledgeBase {
  readonly height: number;
  readonly width: number;

  private readonly probed = new Set<CellKey>();
  private readonly mines = new Set<CellKey>();
  private readonly safeCells = new Set<CellKey>();
  private knowledge: Constraint[] = [];

  constructor(height: number, width: number) {
    this.height = height;
    this.width = width;
  }

  // ── Ingest ─────────────────────────────────────────────────

  /**
   * Record that `cell` was probed and `observedCount` of its neighbours are
   * hazards, then infer everything that follows. Returns once saturated.
   */
  ingest(cell: Cell, observedCount: number): void {
    if (!inBounds(cell, this.height, this.width)) {
      throw new PreconditionError(`Cell ${formatCell(cell)} is outside the ${this.height}x${this.width} grid`);
    }
    const key = cellKey(cell);
    if (this.probed.has(key)) {
      throw new PreconditionError(`Cell ${formatCell(cell)} has already been probed`);
    }
    if (this.mines.has(key)) {
      throw new PreconditionError(`Cell ${formatCell(cell)} is a known hazard`);
    }
    if (!Number.isInteger(observedCount) || observedCount < 0) {
      throw new PreconditionError(`Observed count must be a non-negative integer, got ${observedCount}`);
    }

    // Partition neighbours by what is already known
    const undetermined = new Set<CellKey>();
    let knownHazards = 0;
    for (const n of neighborsOf(cell, this.height, this.width)) {
      const nk = cellKey(n);
      if (this.mines.has(nk)) knownHazards++;
      else if (!this.safeCells.has(nk)) undetermined.add(nk);
    }
    const count = observedCount - knownHazards;
    if (count < 0 || count > undetermined.size) {
      throw new PreconditionError(
        `Observed count ${observedCount} at ${formatCell(cell)} is inconsistent: ` +
        `${knownHazards} known hazard(s), ${undetermined.size} undetermined neighbour(s)`,
      );
    }

    this.probed.add(key);
    this.markSafe(key);
    this.addConstraint(new Constraint(undetermined, count));
    this.saturate();
  }

  /**
   * Run simple-fact propagation and subset resolution until neither changes
   * anything. Returns whether this call learnt something; after a completed
   * `ingest` it always returns false.
   */
  saturate(): boolean {
    let changed = false;
    for (;;) {
      const simple = this.propagate();
      const derived = this.resolveSubsets();
      if (!simple && !derived) return changed;
      changed = true;
    }
  }

  // ── Snapshots ──────────────────────────────────────────────

  hazards(): Cell[] {
    return sortedCells(this.mines);
  }

  safes(): Cell[] {
    return sortedCells(this.safeCells);
  }

  safesUnprobed(): Cell[] {
    return sortedCells([...this.safeCells].filter(k => !this.probed.has(k)));
  }

  allProbed(): Cell[] {
    return sortedCells(this.probed);
  }

  /** Copies of the live constraints, in insertion order. */
  constraints(): Constraint[] {
    return this.knowledge.map(c => c.clone());
  }

  isHazard(cell: Cell): boolean {
    return this.mines.has(cellKey(cell));
  }

  isSafe(cell: Cell): boolean {
    return this.safeCells.has(cellKey(cell));
  }

  isProbed(cell: Cell): boolean {
    return this.probed.has(cellKey(cell));
  }

  // ── Marking ────────────────────────────────────────────────
  // Constraints never hold a resolved cell, so a contradicting mark trips a
  // constraint's range check before either guard below can fire.

  /** Returns true if the cell was not already known to be a hazard. */
  private markHazard(key: CellKey): boolean {
    if (this.safeCells.has(key)) {
      throw new ConsistencyError(`Cell ${key} inferred as hazard but already known safe`);
    }
    if (this.mines.has(key)) return false;
    this.mines.add(key);
    for (const c of this.knowledge) c.resolveAsHazard(key);
    return true;
  }

  /** Returns true if the cell was not already known to be safe. */
  private markSafe(key: CellKey): boolean {
    if (this.mines.has(key)) {
      throw new ConsistencyError(`Cell ${key} inferred as safe but already known hazard`);
    }
    if (this.safeCells.has(key)) return false;
    this.safeCells.add(key);
    for (const c of this.knowledge) c.resolveAsSafe(key);
    return true;
  }

  // ── Inference ──────────────────────────────────────────────

  /** Strip already-resolved cells from a constraint built outside the broadcast. */
  private reconcile(c: Constraint): Constraint {
    for (const key of [...c.cells]) {
      if (this.mines.has(key)) c.resolveAsHazard(key);
      else if (this.safeCells.has(key)) c.resolveAsSafe(key);
    }
    return c;
  }

  private contains(c: Constraint): boolean {
    return this.knowledge.some(k => k.equals(c));
  }

  private addConstraint(c: Constraint): boolean {
    this.reconcile(c);
    if (c.size === 0 || this.contains(c)) return false;
    this.knowledge.push(c);
    return true;
  }

  /** Drop empty constraints and any that became equal to an earlier one. */
  private compact(): void {
    const kept: Constraint[] = [];
    for (const c of this.knowledge) {
      if (c.size === 0) continue;
      if (kept.some(k => k.equals(c))) continue;
      kept.push(c);
    }
    this.knowledge = kept;
  }

  /**
   * Mark every cell a constraint pins down, repeating until a full pass
   * marks nothing new.
   */
  private propagate(): boolean {
    let changed = false;
    let progress = true;
    while (progress) {
      progress = false;
      for (const c of [...this.knowledge]) {
        for (const key of c.knownHazards()) {
          if (this.markHazard(key)) progress = true;
        }
        for (const key of c.knownSafes()) {
          if (this.markSafe(key)) progress = true;
        }
      }
      if (progress) changed = true;
    }
    this.compact();
    return changed;
  }

  /**
   * One sweep of pairwise subset resolution over a snapshot of the
   * constraints. Single-cell differences are decided on the spot; larger
   * differences become new constraints, merged after the sweep.
   */
  private resolveSubsets(): boolean {
    const snapshot = [...this.knowledge];
    const pending: Constraint[] = [];
    let changed = false;

    for (let i = 0; i < snapshot.length; i++) {
      for (let j = i + 1; j < snapshot.length; j++) {
        const a = snapshot[i];
        const b = snapshot[j];
        // Earlier marks in this sweep may have emptied or merged either side
        if (a.size === 0 || b.size === 0) continue;
        if (!this.knowledge.includes(a) || !this.knowledge.includes(b)) continue;

        let small: Constraint;
        let big: Constraint;
        if (a.isSubsetOf(b)) {
          small = a;
          big = b;
        } else if (b.isSubsetOf(a)) {
          small = b;
          big = a;
        } else {
          continue;
        }

        const diff = big.difference(small);
        const diffCount = big.count - small.count;
        if (diffCount < 0 || diffCount > diff.size) {
          throw new ConsistencyError(`Constraints ${small.toString()} and ${big.toString()} contradict each other`);
        }
        if (diff.size === 0) continue;

        if (diff.size === 1) {
          const [key] = diff;
          const marked = diffCount === 0 ? this.markSafe(key) : this.markHazard(key);
          if (marked) {
            changed = true;
            this.propagate();
          }
          continue;
        }

        const derived = new Constraint(diff, diffCount);
        if (!this.contains(derived) && !pending.some(p => p.equals(derived))) {
          pending.push(derived);
        }
      }
    }

    for (const c of pending) {
      if (this.addConstraint(c)) changed = true;
    }
    this.compact();
    return changed;
  }
}
