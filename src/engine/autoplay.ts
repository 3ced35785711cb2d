import { GameStatus } from "./types";
import type { Move, Pos } from "./types";
import type { Game } from "./game";
import type { Agent } from "./agent";

export interface PlayOptions {
  maxMoves?: number;
  onMove?: (move: Move, count: number | null) => void;
}

export interface PlayResult {
  status: GameStatus;
  moves: number;
  guesses: number;
  knownMines: Pos[];
}

/**
 * Drives one game to the end: certain moves first, a fallback guess when
 * deduction stalls. Every mine the agent proves is flagged on the board, so
 * the game is won once all mines are known.
 */
export function playGame(game: Game, agent: Agent, options: PlayOptions = {}): PlayResult {
  const maxMoves = options.maxMoves ?? game.rows * game.cols;
  let moves = 0;
  let guesses = 0;

  while (game.status === GameStatus.Playing && moves < maxMoves) {
    const move = agent.nextMove();
    if (!move) break;

    moves++;
    if (!move.certain) guesses++;

    const count = game.open(move.pos);
    options.onMove?.(move, count);
    if (count === null) break;

    agent.observe(move.pos, count);
    for (const mine of agent.knownMines) game.flag(mine);
  }

  return {
    status: game.status,
    moves,
    guesses,
    knownMines: agent.knownMines,
  };
}
