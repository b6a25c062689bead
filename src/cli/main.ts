import chalk from "chalk";
import { Game } from "../engine/game";
import { InferenceLog } from "../engine/log";
import { isSweeperException } from "../engine/errors";
import { HELP, parseArgs } from "./args";
import { exitCodeFor, renderBoard, renderEntry, renderSummary } from "./render";

function main(argv: string[]): number {
  const opts = parseArgs(argv);
  if (opts.help) {
    console.log(HELP);
    return 0;
  }

  const log = new InferenceLog((entry) => {
    if (opts.verbose || entry.kind === "move") console.log(renderEntry(entry));
  });
  const game = new Game(opts.config, { inference: opts.inference, log });
  const { height, width, mines, seed } = game.config;

  console.log(chalk.bold(`Board ${height}x${width}, ${mines} mines, seed ${seed}, ${opts.inference} inference`));
  if (game.board.minesPlaced) {
    console.log(chalk.dim(game.board.render()));
  }

  const result = game.play();

  console.log();
  console.log(renderBoard(game.board, { exploded: game.explodedPos, revealMines: true }));
  console.log();
  console.log(renderSummary(result));
  return exitCodeFor(result.status);
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (e) {
  if (isSweeperException(e)) {
    console.error(chalk.red(`Error: ${e.message}`));
    process.exitCode = 1;
  } else {
    throw e;
  }
}
