import type { InferenceSummary, Pos, TraceFn } from "./types";
import { formatPos, posKey } from "./board";
import { Sentence } from "./sentence";
import { ContradictionError, InvariantViolationError } from "./errors";

/**
 * Live sentences plus the cells already proven safe or mined.
 *
 * Invariants:
 * - knownSafe and knownMine only grow and never share a cell;
 * - no live sentence mentions a cell from either set;
 * - no live sentence is empty, and no two are equal.
 */
export class KnowledgeBase {
  private readonly live: Sentence[] = [];
  private readonly safeByKey = new Map<string, Pos>();
  private readonly mineByKey = new Map<string, Pos>();
  private readonly trace?: TraceFn;

  constructor(trace?: TraceFn) {
    this.trace = trace;
  }

  get sentences(): readonly Sentence[] {
    return this.live;
  }

  get size(): number {
    return this.live.length;
  }

  /** In the order they were proven */
  get knownSafes(): Pos[] {
    return Array.from(this.safeByKey.values());
  }

  get knownMines(): Pos[] {
    return Array.from(this.mineByKey.values());
  }

  isKnownSafe(pos: Pos): boolean {
    return this.safeByKey.has(posKey(pos));
  }

  isKnownMine(pos: Pos): boolean {
    return this.mineByKey.has(posKey(pos));
  }

  has(sentence: Sentence): boolean {
    return this.live.some((s) => s.equals(sentence));
  }

  /** Returns true when the sentence was new. */
  addSentence(sentence: Sentence): boolean {
    if (sentence.size === 0 || this.has(sentence)) return false;
    this.live.push(sentence);
    return true;
  }

  /** Returns false when the cell was already a known mine. */
  markMine(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.safeByKey.has(key)) {
      throw new InvariantViolationError(`${formatPos(pos)} is already known safe; it cannot be a mine.`);
    }
    if (this.mineByKey.has(key)) return false;

    this.mineByKey.set(key, { row: pos.row, col: pos.col });
    for (const sentence of this.live) sentence.markMine(pos);
    this.trace?.({ type: "mine", pos });
    return true;
  }

  /** Returns false when the cell was already known safe. */
  markSafe(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.mineByKey.has(key)) {
      throw new InvariantViolationError(`${formatPos(pos)} is already known to be a mine; it cannot be safe.`);
    }
    if (this.safeByKey.has(key)) return false;

    this.safeByKey.set(key, { row: pos.row, col: pos.col });
    for (const sentence of this.live) sentence.markSafe(pos);
    this.trace?.({ type: "safe", pos });
    return true;
  }

  /**
   * Runs trivial resolution and subset inference in rounds until a round
   * changes nothing.
   *
   * Every round either classifies a cell or adds a sentence that was never
   * live before, and both are finite, so the loop ends. A derived sentence
   * only mentions unresolved cells, so it can never equal one that was
   * resolved and dropped earlier.
   */
  infer(): InferenceSummary {
    const summary: InferenceSummary = {
      rounds: 0,
      minesFound: 0,
      safesFound: 0,
      sentencesDerived: 0,
    };

    let changed = true;
    while (changed) {
      summary.rounds++;
      const resolved = this.resolveTrivial(summary);
      const derived = this.deriveSubsets(summary);
      changed = resolved || derived;
    }

    this.trace?.({ type: "fixpoint", rounds: summary.rounds });
    return summary;
  }

  // Resolution can empty a sentence or shrink it onto an existing one
  private prune(): void {
    const kept: Sentence[] = [];
    for (const sentence of this.live) {
      if (sentence.size === 0 || kept.some((s) => s.equals(sentence))) continue;
      kept.push(sentence);
    }
    this.live.splice(0, this.live.length, ...kept);
  }

  private resolveTrivial(summary: InferenceSummary): boolean {
    this.prune();
    let changed = false;

    // Marking mutates sentences in place, never the list itself
    for (const sentence of this.live.slice()) {
      for (const pos of sentence.knownMines()) {
        if (this.markMine(pos)) {
          summary.minesFound++;
          changed = true;
        }
      }
      for (const pos of sentence.knownSafes()) {
        if (this.markSafe(pos)) {
          summary.safesFound++;
          changed = true;
        }
      }
    }

    this.prune();
    return changed;
  }

  private deriveSubsets(summary: InferenceSummary): boolean {
    const snapshot = this.live.map((s) => s.copy());
    let changed = false;

    for (const sub of snapshot) {
      if (sub.size === 0) continue;
      for (const sup of snapshot) {
        if (sup === sub || !sub.isSubsetOf(sup)) continue;

        if (sub.size === sup.size) {
          if (sub.count !== sup.count) {
            throw new ContradictionError(`${sub.toString()} and ${sup.toString()} cover the same cells.`);
          }
          continue;
        }

        const derived = sup.subtract(sub);
        if (this.addSentence(derived)) {
          summary.sentencesDerived++;
          this.trace?.({ type: "derived", sentence: derived.toString() });
          changed = true;
        }
      }
    }

    return changed;
  }
}
