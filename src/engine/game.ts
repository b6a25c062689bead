import {
  type BoardConfig,
  type GameResult,
  GameStatus,
  type MoveKind,
  type MoveRecord,
  type Pos,
} from "./types";
import { Board } from "./board";
import { KnowledgeAgent, type AgentOptions } from "./agent";
import { parseBoardConfig } from "./config";
import { createRng } from "./rng";
import { createGameOverError } from "./errors";

export interface GameOptions extends AgentOptions {
  // Play on a prepared board instead of generating one from the config
  board?: Board;
}

/**
 * One game: a board, one agent, and the loop between them. Each game owns
 * its agent, so games never share knowledge.
 */
export class Game {
  readonly config: BoardConfig;
  readonly board: Board;
  readonly agent: KnowledgeAgent;
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private readonly history: MoveRecord[] = [];

  constructor(config: Partial<BoardConfig> = {}, options: GameOptions = {}) {
    const { board, ...agentOptions } = options;
    this.config = board
      ? parseBoardConfig({
          ...config,
          height: board.height,
          width: board.width,
          mines: board.mineCount,
          firstMoveSafe: false,
        })
      : parseBoardConfig(config);
    this.board = board ?? new Board(this.config, createRng(this.config.seed));
    this.agent = new KnowledgeAgent(this.config.height, this.config.width, {
      rng: createRng(this.config.seed + 1),
      ...agentOptions,
    });
  }

  get moves(): MoveRecord[] {
    return this.history.slice();
  }

  /** Plays one move; null once no move is left. */
  step(): MoveRecord | null {
    if (this.status !== GameStatus.Playing) throw createGameOverError(this.status);

    let kind: MoveKind = "safe";
    let pos = this.agent.makeSafeMove();
    if (pos === null) {
      kind = "random";
      pos = this.agent.makeRandomMove();
    }
    if (pos === null) {
      this.status = GameStatus.Stuck;
      return null;
    }

    this.board.ensureMines([pos]);
    this.agent.log.played(this.agent.moveCount + 1, pos, kind);

    if (this.board.isMine(pos)) {
      this.board.reveal(pos);
      this.status = GameStatus.Lost;
      this.explodedPos = pos;
      const lost: MoveRecord = { ...pos, kind, count: null };
      this.history.push(lost);
      return lost;
    }

    const count = this.board.nearbyMines(pos);
    this.board.reveal(pos);
    this.agent.addKnowledge(pos, count);
    for (const m of this.agent.mines) this.board.flag(m);

    const record: MoveRecord = { ...pos, kind, count };
    this.history.push(record);
    this.checkWin();
    return record;
  }

  play(maxSteps = this.config.height * this.config.width): GameResult {
    let steps = 0;
    while (this.status === GameStatus.Playing && steps < maxSteps) {
      this.step();
      steps++;
    }
    return this.result();
  }

  result(): GameResult {
    return {
      status: this.status,
      moves: this.moves,
      safeMoves: this.history.filter((m) => m.kind === "safe").length,
      randomMoves: this.history.filter((m) => m.kind === "random").length,
      minesFlagged: this.board.flagged.length,
    };
  }

  private checkWin(): void {
    if (this.board.isWon() || this.board.allSafeRevealed()) {
      this.status = GameStatus.Won;
    }
  }
}
