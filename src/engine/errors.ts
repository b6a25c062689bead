import type { Pos } from "./types";

export type SweeperErrorCode =
  | "INVARIANT_VIOLATION" // sentence count outside [0, |cells|]
  | "INVALID_CONFIG"      // board dimensions or mine count rejected
  | "OUT_OF_BOUNDS"       // cell outside the board
  | "GAME_OVER";          // move attempted after the game ended

export interface SweeperError {
  code: SweeperErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/** Thrown by the engine; `error` holds the code and any details. */
export class SweeperException extends Error {
  public readonly error: SweeperError;

  constructor(error: SweeperError) {
    super(error.message);
    this.name = "SweeperException";
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SweeperException);
    }
  }

  get code(): SweeperErrorCode {
    return this.error.code;
  }

  toJSON(): SweeperError {
    return this.error;
  }
}

export function createInvariantViolation(cells: Pos[], count: number): SweeperException {
  return new SweeperException({
    code: "INVARIANT_VIOLATION",
    message: `Sentence count ${count} is outside [0, ${cells.length}]`,
    details: { cells, count },
  });
}

export function createConfigError(issues: string[]): SweeperException {
  return new SweeperException({
    code: "INVALID_CONFIG",
    message: `Invalid board config: ${issues.join("; ")}`,
    details: { issues },
  });
}

export function createOutOfBoundsError(pos: Pos, rows: number, cols: number): SweeperException {
  return new SweeperException({
    code: "OUT_OF_BOUNDS",
    message: `Cell (${pos.row}, ${pos.col}) is outside the ${rows}x${cols} board`,
    details: { pos, rows, cols },
  });
}

export function createGameOverError(status: string): SweeperException {
  return new SweeperException({
    code: "GAME_OVER",
    message: `Game is already ${status}`,
    details: { status },
  });
}

export function isSweeperException(e: unknown): e is SweeperException {
  return e instanceof SweeperException;
}

export function createConflictError(pos: Pos, known: "mine" | "safe"): SweeperException {
  return new SweeperException({
    code: "INVARIANT_VIOLATION",
    message: `Cell (${pos.row}, ${pos.col}) is already known ${known === "mine" ? "to be a mine" : "to be safe"}`,
    details: { pos, known },
  });
}
