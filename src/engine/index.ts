export { Game } from "./game";
export type { GameOptions } from "./game";
export { KnowledgeAgent } from "./agent";
export type { AgentOptions } from "./agent";
export { Sentence } from "./sentence";
export {
  Board,
  createEmptyGrid,
  placeMines,
  computeHints,
} from "./board";
export type { BoardCell } from "./board";
export {
  CellSet,
  posKey,
  parsePosKey,
  samePos,
  formatPos,
  inBounds,
  neighbours,
} from "./pos";
export { createRng, sequenceRng, pickRandom, shuffle } from "./rng";
export type { RandomSource } from "./rng";
export {
  BoardConfigSchema,
  InferenceModeSchema,
  parseBoardConfig,
  parseInferenceMode,
} from "./config";
export {
  SweeperException,
  createInvariantViolation,
  createConfigError,
  createOutOfBoundsError,
  createGameOverError,
  createConflictError,
  isSweeperException,
} from "./errors";
export type { SweeperError, SweeperErrorCode } from "./errors";
export { InferenceLog, formatEntry, formatCells } from "./log";
export type { LogEntry, LogKind, LogSink } from "./log";
export type {
  BoardConfig,
  GameResult,
  InferenceMode,
  MoveKind,
  MoveRecord,
  Pos,
} from "./types";
export { GameStatus, DEFAULT_CONFIG } from "./types";
