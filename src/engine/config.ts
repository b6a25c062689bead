import { z } from "zod";
import { type BoardConfig, DEFAULT_CONFIG, type InferenceMode } from "./types";
import { createConfigError } from "./errors";

export const BoardConfigSchema = z
  .object({
    height: z.number().int().positive(),
    width: z.number().int().positive(),
    mines: z.number().int().positive(),
    seed: z.number().int(),
    firstMoveSafe: z.boolean(),
  })
  .superRefine((cfg, ctx) => {
    // Dimensions already reported
    if (!Number.isInteger(cfg.height) || !Number.isInteger(cfg.width)) return;
    if (cfg.height <= 0 || cfg.width <= 0) return;
    // At least one cell must stay safe for the first move
    if (cfg.mines >= cfg.height * cfg.width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mines"],
        message: `must be less than height x width (${cfg.height * cfg.width})`,
      });
    }
  });

export const InferenceModeSchema = z.enum(["single-pass", "fixed-point"]);

export function parseBoardConfig(input: Partial<BoardConfig> = {}): BoardConfig {
  const result = BoardConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...input });
  if (!result.success) {
    throw createConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`),
    );
  }
  return result.data;
}

export function parseInferenceMode(value: string): InferenceMode {
  const result = InferenceModeSchema.safeParse(value);
  if (!result.success) {
    throw createConfigError([`inference must be one of ${InferenceModeSchema.options.join(", ")}`]);
  }
  return result.data;
}
