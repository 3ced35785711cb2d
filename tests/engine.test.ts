// ─── Engine tests ───────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  Game,
  GameStatus,
  createRng,
  pickRandom,
  neighbours,
  createEmptyGrid,
  placeMines,
  computeHints,
  inBounds,
  posKey,
  comparePos,
  ConfigurationError,
  InvalidMoveError,
} from "../src/engine/index";

// ─── RNG determinism ────────────────────────────────────────────────────────

describe("createRng", () => {
  it("produces deterministic sequences", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("different seeds give different sequences", () => {
    const a = createRng(1);
    const b = createRng(2);
    let same = true;
    for (let i = 0; i < 20; i++) {
      if (a() !== b()) same = false;
    }
    expect(same).toBe(false);
  });

  it("stays in [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("pickRandom", () => {
  it("returns null for an empty list", () => {
    expect(pickRandom([], () => 0.5)).toBeNull();
  });

  it("maps the generator onto an index", () => {
    expect(pickRandom(["a", "b", "c", "d"], () => 0)).toBe("a");
    expect(pickRandom(["a", "b", "c", "d"], () => 0.5)).toBe("c");
    expect(pickRandom(["a", "b", "c", "d"], () => 0.999)).toBe("d");
  });
});

// ─── Positions ──────────────────────────────────────────────────────────────

describe("positions", () => {
  it("keys by row and column", () => {
    expect(posKey({ row: 3, col: 11 })).toBe("3,11");
  });

  it("orders row-major", () => {
    const sorted = [
      { row: 1, col: 0 },
      { row: 0, col: 2 },
      { row: 0, col: 1 },
    ].sort(comparePos);
    expect(sorted).toEqual([
      { row: 0, col: 1 },
      { row: 0, col: 2 },
      { row: 1, col: 0 },
    ]);
  });

  it("checks bounds", () => {
    expect(inBounds({ row: 0, col: 0 }, 2, 3)).toBe(true);
    expect(inBounds({ row: 1, col: 2 }, 2, 3)).toBe(true);
    expect(inBounds({ row: 2, col: 0 }, 2, 3)).toBe(false);
    expect(inBounds({ row: 0, col: -1 }, 2, 3)).toBe(false);
    expect(inBounds({ row: 0.5, col: 0 }, 2, 3)).toBe(false);
  });
});

// ─── Neighbours ─────────────────────────────────────────────────────────────

describe("neighbours", () => {
  it("returns 8 neighbours for a centre cell", () => {
    expect(neighbours(5, 5, 10, 10)).toHaveLength(8);
  });

  it("returns 3 neighbours for a corner cell", () => {
    expect(neighbours(0, 0, 10, 10)).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });

  it("returns 5 neighbours for an edge cell", () => {
    expect(neighbours(0, 5, 10, 10)).toHaveLength(5);
  });

  it("clips a single row", () => {
    expect(neighbours(0, 0, 1, 3)).toEqual([{ row: 0, col: 1 }]);
  });
});

// ─── Mine placement ─────────────────────────────────────────────────────────

describe("placeMines", () => {
  const config = { rows: 8, cols: 8, minesTotal: 10, seed: 777 };

  function countMines(rows: number, cols: number, seed: number, total: number): number {
    const grid = createEmptyGrid(rows, cols);
    placeMines(grid, { rows, cols, minesTotal: total, seed });
    let n = 0;
    for (const row of grid) for (const cell of row) if (cell.mine) n++;
    return n;
  }

  it("places the requested number of mines", () => {
    expect(countMines(10, 10, 42, 30)).toBe(30);
    expect(countMines(3, 3, 1, 9)).toBe(9);
  });

  it("is deterministic for the same seed", () => {
    const g1 = createEmptyGrid(8, 8);
    placeMines(g1, config);
    const g2 = createEmptyGrid(8, 8);
    placeMines(g2, config);
    for (let r = 0; r < 8; r++) {
      for (let c = 0; c < 8; c++) {
        expect(g1[r][c].mine).toBe(g2[r][c].mine);
      }
    }
  });

  it("uses an explicit layout", () => {
    const grid = createEmptyGrid(2, 2);
    placeMines(grid, { rows: 2, cols: 2, minesTotal: 0, seed: 1, mines: [{ row: 1, col: 0 }] });
    expect(grid.map((row) => row.map((c) => c.mine))).toEqual([
      [false, false],
      [true, false],
    ]);
  });

  it("rejects more mines than free cells", () => {
    const grid = createEmptyGrid(2, 2);
    expect(() => placeMines(grid, { rows: 2, cols: 2, minesTotal: 5, seed: 1 })).toThrow(ConfigurationError);
  });

  it("rejects a layout outside the board", () => {
    const grid = createEmptyGrid(2, 2);
    expect(() =>
      placeMines(grid, { rows: 2, cols: 2, minesTotal: 0, seed: 1, mines: [{ row: 2, col: 0 }] }),
    ).toThrow(ConfigurationError);
  });

  it("rejects a layout that names a cell twice", () => {
    const grid = createEmptyGrid(1, 1);
    expect(() =>
      placeMines(grid, {
        rows: 1,
        cols: 1,
        minesTotal: 0,
        seed: 1,
        mines: [{ row: 0, col: 0 }, { row: 0, col: 0 }],
      }),
    ).toThrow(ConfigurationError);
    expect(() => new Game({ rows: 1, cols: 1, mines: [{ row: 0, col: 0 }, { row: 0, col: 0 }] })).toThrow(
      ConfigurationError,
    );
  });
});

// ─── Hints ──────────────────────────────────────────────────────────────────

describe("computeHints", () => {
  it("counts neighbouring mines, not the cell itself", () => {
    const grid = createEmptyGrid(3, 3);
    grid[0][0].mine = true;
    grid[0][2].mine = true;
    computeHints(grid, 3, 3);
    expect(grid[1][1].hint).toBe(2);
    expect(grid[0][1].hint).toBe(2);
    expect(grid[1][0].hint).toBe(1);
    expect(grid[2][2].hint).toBe(0);
    expect(grid[0][0].hint).toBe(0);
  });
});

// ─── Game ───────────────────────────────────────────────────────────────────

describe("Game", () => {
  it("answers isMine and nearbyMines", () => {
    const game = new Game({ rows: 3, cols: 3, mines: [{ row: 0, col: 0 }, { row: 2, col: 2 }] });
    expect(game.isMine({ row: 0, col: 0 })).toBe(true);
    expect(game.isMine({ row: 1, col: 1 })).toBe(false);
    expect(game.nearbyMines({ row: 1, col: 1 })).toBe(2);
    expect(game.nearbyMines({ row: 0, col: 2 })).toBe(0);
    expect(game.minesTotal).toBe(2);
    expect(game.mines).toEqual([{ row: 0, col: 0 }, { row: 2, col: 2 }]);
  });

  it("places seeded mines from the config", () => {
    const game = new Game({ rows: 8, cols: 8, minesTotal: 8, seed: 3 });
    expect(game.mines).toHaveLength(8);
    expect(new Game({ rows: 8, cols: 8, minesTotal: 8, seed: 3 }).mines).toEqual(game.mines);
  });

  it("rejects out-of-bounds queries", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [] });
    expect(() => game.isMine({ row: 2, col: 0 })).toThrow(InvalidMoveError);
    expect(() => game.nearbyMines({ row: 0, col: -1 })).toThrow(InvalidMoveError);
  });

  it("rejects non-positive dimensions", () => {
    expect(() => new Game({ rows: 0, cols: 3, mines: [] })).toThrow(ConfigurationError);
  });

  it("opening a mine loses", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    expect(game.open({ row: 0, col: 1 })).toBeNull();
    expect(game.status).toBe(GameStatus.Lost);
    expect(game.explodedPos).toEqual({ row: 0, col: 1 });
  });

  it("refuses to open once the game is over", () => {
    const lost = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    lost.open({ row: 0, col: 1 });
    expect(() => lost.open({ row: 0, col: 0 })).toThrow(InvalidMoveError);
    expect(lost.grid[0][0].opened).toBe(false);

    const won = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    won.flag({ row: 0, col: 1 });
    expect(won.status).toBe(GameStatus.Won);
    expect(() => won.open({ row: 1, col: 1 })).toThrow(InvalidMoveError);
  });

  it("opening a safe cell returns its count", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    expect(game.open({ row: 1, col: 0 })).toBe(1);
    expect(game.status).toBe(GameStatus.Playing);
  });

  it("wins once the flags match the mines", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }, { row: 1, col: 1 }] });
    game.flag({ row: 0, col: 1 });
    expect(game.won()).toBe(false);
    expect(game.status).toBe(GameStatus.Playing);
    game.flag({ row: 1, col: 1 });
    expect(game.won()).toBe(true);
    expect(game.status).toBe(GameStatus.Won);
    expect(game.flagged).toEqual([{ row: 0, col: 1 }, { row: 1, col: 1 }]);
  });

  it("a wrong flag blocks the win", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    game.flag({ row: 0, col: 0 });
    game.flag({ row: 0, col: 1 });
    expect(game.won()).toBe(false);
    expect(game.status).toBe(GameStatus.Playing);
  });

  it("renders the layout as text", () => {
    const game = new Game({ rows: 2, cols: 2, mines: [{ row: 0, col: 1 }] });
    expect(game.toString()).toBe(["-----", "| |X|", "-----", "| | |", "-----"].join("\n"));
  });
});
