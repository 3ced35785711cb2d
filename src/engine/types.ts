export interface Pos {
  row: number;
  col: number;
}

export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
  // Explicit mine layout; replaces seeded placement and minesTotal when given
  mines?: Pos[];
}

export interface Cell {
  mine: boolean;
  hint: number;    // mines among the bounds-clipped neighbours
  opened: boolean;
  flagged: boolean;
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export type Rng = () => number;

export type TraceEvent =
  | { type: "mine"; pos: Pos }
  | { type: "safe"; pos: Pos }
  | { type: "derived"; sentence: string }
  | { type: "fixpoint"; rounds: number };

export type TraceFn = (event: TraceEvent) => void;

export interface AgentOptions {
  rng?: Rng;
  trace?: TraceFn;
}

export interface InferenceSummary {
  rounds: number;
  minesFound: number;
  safesFound: number;
  sentencesDerived: number;
}

export interface Move {
  pos: Pos;
  certain: boolean;
}

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
};
