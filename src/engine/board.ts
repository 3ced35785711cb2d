import type { Cell, GameConfig, Pos, Rng } from "./types";
import { createRng } from "./rng";
import { ConfigurationError } from "./errors";

interface Bucket {
  items: Pos[];
  indexByKey: Map<string, number>;
}

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

// Row-major order
export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function formatPos(pos: Pos): string {
  return `(${pos.row},${pos.col})`;
}

export function inBounds(pos: Pos, rows: number, cols: number): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < rows &&
    pos.col >= 0 &&
    pos.col < cols
  );
}

function addToBucket(bucket: Bucket, pos: Pos): void {
  const key = posKey(pos);
  if (bucket.indexByKey.has(key)) return;
  bucket.indexByKey.set(key, bucket.items.length);
  bucket.items.push(pos);
}

function removeFromBucket(bucket: Bucket, pos: Pos): void {
  const key = posKey(pos);
  const idx = bucket.indexByKey.get(key);
  if (idx === undefined) return;

  const lastIndex = bucket.items.length - 1;
  const last = bucket.items[lastIndex];
  bucket.items[idx] = last;
  bucket.indexByKey.set(posKey(last), idx);
  bucket.items.pop();
  bucket.indexByKey.delete(key);
}

function pickRandomFromBucket(bucket: Bucket, rng: Rng): Pos {
  return bucket.items[Math.floor(rng() * bucket.items.length)];
}

/** The bounds-clipped 8-neighbourhood, in row-major order. */
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, hint: 0, opened: false, flagged: false });
    }
    grid.push(row);
  }
  return grid;
}

// Seeded placement: each mine lands on a cell drawn uniformly from the
// cells still free. An explicit layout in config.mines bypasses the draw.
export function placeMines(grid: Cell[][], config: GameConfig): Cell[][] {
  const { rows, cols } = config;

  if (config.mines) {
    for (const p of config.mines) {
      if (!inBounds(p, rows, cols)) {
        throw new ConfigurationError(`Mine ${formatPos(p)} is outside a ${rows}x${cols} board.`);
      }
      if (grid[p.row][p.col].mine) {
        throw new ConfigurationError(`Mine ${formatPos(p)} appears twice in the layout.`);
      }
      grid[p.row][p.col].mine = true;
    }
    return grid;
  }

  const free: Bucket = { items: [], indexByKey: new Map() };
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      addToBucket(free, { row: r, col: c });
    }
  }

  if (config.minesTotal < 0 || config.minesTotal > free.items.length) {
    throw new ConfigurationError(
      `Cannot place ${config.minesTotal} mines on ${free.items.length} free cells.`,
    );
  }

  const rng = createRng(config.seed);
  for (let placed = 0; placed < config.minesTotal; placed++) {
    const target = pickRandomFromBucket(free, rng);
    grid[target.row][target.col].mine = true;
    removeFromBucket(free, target);
  }

  return grid;
}

// hint = number of mines among the neighbours, the cell itself excluded
export function computeHints(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let sum = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) sum++;
      }
      grid[r][c].hint = sum;
    }
  }
}
