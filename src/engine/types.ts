export interface Pos {
  row: number;
  col: number;
}

export interface BoardConfig {
  height: number;
  width: number;
  mines: number;
  seed: number;
  // Place mines after the first move so that move can never lose
  firstMoveSafe: boolean;
}

export type InferenceMode = "single-pass" | "fixed-point";

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
  Stuck = "stuck",
}

export type MoveKind = "safe" | "random";

export interface MoveRecord extends Pos {
  kind: MoveKind;
  // Adjacent mine count reported by the board; null when the move hit a mine
  count: number | null;
}

export interface GameResult {
  status: GameStatus;
  moves: MoveRecord[];
  safeMoves: number;
  randomMoves: number;
  minesFlagged: number;
}

/** Default config */
export const DEFAULT_CONFIG: BoardConfig = {
  height: 8,
  width: 8,
  mines: 8,
  seed: Date.now(),
  firstMoveSafe: false,
};
