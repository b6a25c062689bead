import type { BoardConfig, InferenceMode } from "../engine/types";
import { parseBoardConfig, parseInferenceMode } from "../engine/config";
import { createConfigError } from "../engine/errors";

export const HELP = `
Usage:
  npm run play -- [options]

Options:
  --height <n>         Board rows (default 8)
  --width <n>          Board columns (default 8)
  --mines <n>          Number of mines (default 8)
  --seed <n>           Seed for mine placement and random moves
  --first-move-safe    Place mines after the first move
  --inference <mode>   single-pass (default) or fixed-point
  --fixed-point        Same as --inference fixed-point
  --verbose, -v        Print every inference step
  --help, -h           Show this help
`;

export interface CliOptions {
  config: BoardConfig;
  inference: InferenceMode;
  verbose: boolean;
  help: boolean;
}

const NUMERIC_FLAGS = ["height", "width", "mines", "seed"] as const;
type NumericFlag = (typeof NUMERIC_FLAGS)[number];

function isNumericFlag(name: string): name is NumericFlag {
  return (NUMERIC_FLAGS as readonly string[]).includes(name);
}

function toInteger(flag: string, raw: string | undefined): number {
  const n = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isInteger(n)) {
    throw createConfigError([`--${flag} expects an integer, got ${raw ?? "nothing"}`]);
  }
  return n;
}

export function parseArgs(argv: string[]): CliOptions {
  const partial: Partial<BoardConfig> = {};
  let inference: InferenceMode = "single-pass";
  let verbose = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
      continue;
    }
    if (arg === "--fixed-point") {
      inference = "fixed-point";
      continue;
    }
    if (arg === "--first-move-safe") {
      partial.firstMoveSafe = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw createConfigError([`unexpected argument ${arg}`]);
    }

    // --name=value or --name value
    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }

    if (isNumericFlag(name)) {
      partial[name] = toInteger(name, value);
    } else if (name === "inference") {
      inference = parseInferenceMode(value ?? "");
    } else {
      throw createConfigError([`unknown option --${name}`]);
    }
  }

  return { config: parseBoardConfig(partial), inference, verbose, help };
}
