import { GameStatus, DEFAULT_CONFIG } from "./types";
import type { Cell, GameConfig, Pos } from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  formatPos,
  inBounds,
  posKey,
} from "./board";
import { ConfigurationError, InvalidMoveError } from "./errors";

/**
 * The puzzle board: owns the mine layout and answers queries about it.
 *
 * It never consults the agent; the game loop carries counts from here into
 * {@link Agent.observe} and moves back.
 */
export class Game {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  readonly grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private readonly mineKeys = new Set<string>();
  private readonly flaggedKeys = new Set<string>();

  constructor(config: Partial<GameConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    if (!Number.isInteger(this.rows) || !Number.isInteger(this.cols) || this.rows <= 0 || this.cols <= 0) {
      throw new ConfigurationError(`Board dimensions must be positive integers, got ${this.rows}x${this.cols}.`);
    }

    this.grid = createEmptyGrid(this.rows, this.cols);
    placeMines(this.grid, this.config);
    computeHints(this.grid, this.rows, this.cols);

    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.grid[r][c].mine) this.mineKeys.add(posKey({ row: r, col: c }));
      }
    }
  }

  private checkBounds(pos: Pos): void {
    if (!inBounds(pos, this.rows, this.cols)) {
      throw new InvalidMoveError(`${formatPos(pos)} is outside a ${this.rows}x${this.cols} board.`);
    }
  }

  get minesTotal(): number {
    return this.mineKeys.size;
  }

  /** Mine positions in row-major order */
  get mines(): Pos[] {
    const out: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.grid[r][c].mine) out.push({ row: r, col: c });
      }
    }
    return out;
  }

  get flagged(): Pos[] {
    return this.mines.filter((p) => this.flaggedKeys.has(posKey(p)));
  }

  isMine(pos: Pos): boolean {
    this.checkBounds(pos);
    return this.grid[pos.row][pos.col].mine;
  }

  nearbyMines(pos: Pos): number {
    this.checkBounds(pos);
    return this.grid[pos.row][pos.col].hint;
  }

  /**
   * Open a cell. Returns its neighbour count, or null when it was a mine.
   * Throws once the game is won or lost.
   */
  open(pos: Pos): number | null {
    this.checkBounds(pos);
    if (this.status !== GameStatus.Playing) {
      throw new InvalidMoveError(`Cannot open ${formatPos(pos)}: the game is ${this.status}.`);
    }

    const cell = this.grid[pos.row][pos.col];
    cell.opened = true;
    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row: pos.row, col: pos.col };
      return null;
    }
    if (this.won()) this.status = GameStatus.Won;
    return cell.hint;
  }

  /** Record a cell the player believes is a mine. */
  flag(pos: Pos): void {
    this.checkBounds(pos);
    if (this.status !== GameStatus.Playing) return;
    const cell = this.grid[pos.row][pos.col];
    if (cell.opened || cell.flagged) return;
    cell.flagged = true;
    this.flaggedKeys.add(posKey(pos));
    if (this.won()) this.status = GameStatus.Won;
  }

  // Won when the flags sit exactly on the mines
  won(): boolean {
    if (this.flaggedKeys.size !== this.mineKeys.size) return false;
    for (const key of this.flaggedKeys) {
      if (!this.mineKeys.has(key)) return false;
    }
    return true;
  }

  toString(): string {
    const rule = "--".repeat(this.cols) + "-";
    const lines: string[] = [];
    for (const row of this.grid) {
      lines.push(rule);
      lines.push(row.map((cell) => (cell.mine ? "|X" : "| ")).join("") + "|");
    }
    lines.push(rule);
    return lines.join("\n");
  }
}
