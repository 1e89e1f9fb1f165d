import type { CellKey } from "../shared/types.js";
import { formatCell, sortedCells } from "../shared/cells.js";
import { ConsistencyError } from "./errors.js";

/**
 * "Exactly `count` of these cells are hazards."
 *
 * The cell set only ever holds cells whose status is still unknown; members
 * are removed as they resolve, and a resolved hazard takes one off the count.
 */
export class Constraint {
  private readonly members: Set<CellKey>;
  private remaining: number;

  constructor(cells: Iterable<CellKey>, count: number) {
    this.members = new Set(cells);
    this.remaining = count;
    this.check();
  }

  get count(): number {
    return this.remaining;
  }

  get size(): number {
    return this.members.size;
  }

  get cells(): ReadonlySet<CellKey> {
    return this.members;
  }

  has(key: CellKey): boolean {
    return this.members.has(key);
  }

  knownHazards(): Set<CellKey> {
    return this.members.size === this.remaining ? new Set(this.members) : new Set();
  }

  knownSafes(): Set<CellKey> {
    return this.remaining === 0 ? new Set(this.members) : new Set();
  }

  resolveAsHazard(key: CellKey): void {
    if (!this.members.delete(key)) return;
    this.remaining -= 1;
    this.check();
  }

  resolveAsSafe(key: CellKey): void {
    if (!this.members.delete(key)) return;
    this.check();
  }

  equals(other: Constraint): boolean {
    return this.remaining === other.remaining
      && this.members.size === other.members.size
      && this.isSubsetOf(other);
  }

  isSubsetOf(other: Constraint): boolean {
    if (this.members.size > other.members.size) return false;
    for (const key of this.members) {
      if (!other.members.has(key)) return false;
    }
    return true;
  }

  /** Cells of this constraint that `other` does not mention. */
  difference(other: Constraint): Set<CellKey> {
    const diff = new Set<CellKey>();
    for (const key of this.members) {
      if (!other.members.has(key)) diff.add(key);
    }
    return diff;
  }

  clone(): Constraint {
    return new Constraint(this.members, this.remaining);
  }

  toString(): string {
    const cells = sortedCells(this.members).map(formatCell).join(", ");
    return `{${cells}} = ${this.remaining}`;
  }

  private check(): void {
    if (!Number.isInteger(this.remaining) || this.remaining < 0 || this.remaining > this.members.size) {
      throw new ConsistencyError(`Constraint count out of range: ${this.toString()}`);
    }
  }
}
