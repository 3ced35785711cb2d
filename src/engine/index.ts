export { Agent } from "./agent";
export { KnowledgeBase } from "./knowledge";
export { Sentence } from "./sentence";
export { Game } from "./game";
export { playGame } from "./autoplay";
export type { PlayOptions, PlayResult } from "./autoplay";
export {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  inBounds,
  posKey,
  comparePos,
  formatPos,
} from "./board";
export { createRng, pickRandom } from "./rng";
export {
  MinesweeperError,
  InvalidMoveError,
  ContradictionError,
  InvariantViolationError,
  ConfigurationError,
} from "./errors";
export type {
  AgentOptions,
  Cell,
  GameConfig,
  InferenceSummary,
  Move,
  Pos,
  Rng,
  TraceEvent,
  TraceFn,
} from "./types";
export { GameStatus, DEFAULT_CONFIG } from "./types";
