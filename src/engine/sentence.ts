import type { Pos } from "./types";
import { comparePos, formatPos, posKey } from "./board";
import { ContradictionError } from "./errors";

/**
 * A set of cells and the exact number of mines among them.
 *
 * Cells are keyed by {@link posKey}, so two sentences built from different
 * position objects with the same coordinates compare equal.
 */
export class Sentence {
  private readonly members: Map<string, Pos>;
  private mines: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this.members = new Map();
    for (const p of cells) {
      this.members.set(posKey(p), { row: p.row, col: p.col });
    }
    this.mines = count;
    this.assertConsistent();
  }

  private assertConsistent(): void {
    if (!Number.isInteger(this.mines) || this.mines < 0 || this.mines > this.members.size) {
      throw new ContradictionError(
        `A sentence over ${this.members.size} cells cannot hold ${this.mines} mines: ${this.toString()}`,
      );
    }
  }

  get count(): number {
    return this.mines;
  }

  get size(): number {
    return this.members.size;
  }

  has(pos: Pos): boolean {
    return this.members.has(posKey(pos));
  }

  /** Fresh array, row-major */
  cells(): Pos[] {
    return Array.from(this.members.values()).sort(comparePos);
  }

  knownMines(): Pos[] {
    return this.size > 0 && this.mines === this.size ? this.cells() : [];
  }

  knownSafes(): Pos[] {
    return this.size > 0 && this.mines === 0 ? this.cells() : [];
  }

  markMine(pos: Pos): boolean {
    const key = posKey(pos);
    if (!this.members.has(key)) return false;
    if (this.mines === 0) {
      throw new ContradictionError(`${formatPos(pos)} is a mine but ${this.toString()} says it is safe.`);
    }
    this.members.delete(key);
    this.mines--;
    return true;
  }

  markSafe(pos: Pos): boolean {
    const key = posKey(pos);
    if (!this.members.has(key)) return false;
    if (this.mines === this.members.size) {
      throw new ContradictionError(`${formatPos(pos)} is safe but ${this.toString()} says it is a mine.`);
    }
    this.members.delete(key);
    return true;
  }

  isSubsetOf(other: Sentence): boolean {
    if (this.size > other.size) return false;
    for (const key of this.members.keys()) {
      if (!other.members.has(key)) return false;
    }
    return true;
  }

  sameCells(other: Sentence): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  equals(other: Sentence): boolean {
    return this.mines === other.mines && this.sameCells(other);
  }

  // (this - subset): the cells left over hold the mines the subset doesn't
  subtract(subset: Sentence): Sentence {
    const rest: Pos[] = [];
    for (const [key, pos] of this.members) {
      if (!subset.members.has(key)) rest.push(pos);
    }
    return new Sentence(rest, this.mines - subset.mines);
  }

  copy(): Sentence {
    return new Sentence(this.members.values(), this.mines);
  }

  toString(): string {
    return `{${this.cells().map(formatPos).join(", ")}} = ${this.mines}`;
  }
}
