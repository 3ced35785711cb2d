import type { AgentOptions, InferenceSummary, Move, Pos, Rng } from "./types";
import { formatPos, inBounds, neighbours, posKey } from "./board";
import { pickRandom } from "./rng";
import { KnowledgeBase } from "./knowledge";
import { Sentence } from "./sentence";
import { ConfigurationError, InvalidMoveError } from "./errors";

const MAX_NEIGHBOURS = 8;

/**
 * Plays one game by deduction.
 *
 * The caller feeds every opened cell's count through {@link Agent.observe}, then asks
 * for {@link Agent.nextSafeMove} and falls back to
 * {@link Agent.nextFallbackMove} when nothing is certain. Calls are
 * synchronous and must not overlap.
 */
export class Agent {
  readonly rows: number;
  readonly cols: number;
  readonly knowledge: KnowledgeBase;
  private readonly moves = new Map<string, Pos>();
  private readonly rng: Rng;

  constructor(rows: number, cols: number, options: AgentOptions = {}) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new ConfigurationError(`Board dimensions must be positive integers, got ${rows}x${cols}.`);
    }
    this.rows = rows;
    this.cols = cols;
    this.rng = options.rng ?? Math.random;
    this.knowledge = new KnowledgeBase(options.trace);
  }

  get movesMade(): Pos[] {
    return Array.from(this.moves.values());
  }

  get knownMines(): Pos[] {
    return this.knowledge.knownMines;
  }

  get knownSafes(): Pos[] {
    return this.knowledge.knownSafes;
  }

  hasMoved(pos: Pos): boolean {
    return this.moves.has(posKey(pos));
  }

  /**
   * Records that `pos` was opened safely and has `count` mines around it,
   * then propagates to a fixed point.
   */
  observe(pos: Pos, count: number): InferenceSummary {
    if (!inBounds(pos, this.rows, this.cols)) {
      throw new InvalidMoveError(`${formatPos(pos)} is outside a ${this.rows}x${this.cols} board.`);
    }
    if (!Number.isInteger(count) || count < 0 || count > MAX_NEIGHBOURS) {
      throw new InvalidMoveError(`${formatPos(pos)} cannot have ${count} neighbouring mines.`);
    }

    const cell = { row: pos.row, col: pos.col };
    const unknown: Pos[] = [];
    let remaining = count;
    for (const n of neighbours(cell.row, cell.col, this.rows, this.cols)) {
      if (this.knowledge.isKnownSafe(n)) continue;
      if (this.knowledge.isKnownMine(n)) {
        remaining--;
        continue;
      }
      unknown.push(n);
    }

    // Built before any state changes: an impossible count throws here
    const sentence = new Sentence(unknown, remaining);
    this.knowledge.markSafe(cell);
    this.moves.set(posKey(cell), cell);
    this.knowledge.addSentence(sentence);
    return this.knowledge.infer();
  }

  nextSafeMove(): Pos | null {
    for (const pos of this.knowledge.knownSafes) {
      if (!this.hasMoved(pos)) return pos;
    }
    return null;
  }

  // Uniform over the whole board minus known mines and moves already made
  nextFallbackMove(rows: number = this.rows, cols: number = this.cols): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        const p = { row: r, col: c };
        if (this.hasMoved(p) || this.knowledge.isKnownMine(p)) continue;
        candidates.push(p);
      }
    }
    return pickRandom(candidates, this.rng);
  }

  nextMove(): Move | null {
    const safe = this.nextSafeMove();
    if (safe) return { pos: safe, certain: true };
    const fallback = this.nextFallbackMove();
    return fallback ? { pos: fallback, certain: false } : null;
  }
}
