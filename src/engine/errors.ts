/**
 * Base class for every error the engine raises.
 */
export class MinesweeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MinesweeperError";
  }
}

/**
 * A position outside the board, or an observation that no board could report.
 */
export class InvalidMoveError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMoveError";
  }
}

/**
 * The observations fed to the knowledge base cannot all be true.
 */
export class ContradictionError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ContradictionError";
  }
}

/**
 * A cell was about to be classified both safe and mine.
 */
export class InvariantViolationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export class ConfigurationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
