import { z } from "zod";
import type { HandClassifierOptions } from "@hand-pointer/gesture-core";
import type { ControlMapperOptions } from "./types";

const positive = () => z.number().finite().positive();

export const HandPointerConfigSchema = z
  .object({
    dominantHand: z.enum(["Left", "Right"]).default("Right"),
    pinchDistanceThreshold: positive().default(0.05),
    pinchScrollThreshold: positive().default(0.3),
    debounceFrames: z.number().int().min(1).default(5),
    scrollStableFrames: z.number().int().min(1).default(5),
    dampingDeadzoneSq: z.number().finite().nonnegative().default(25),
    dampingLinearLimitSq: positive().default(900),
    dampingGain: positive().default(0.07),
    flickGain: positive().default(2.1),
    extendedRatio: z.number().finite().default(0.5),
    spreadRatio: positive().default(1.7),
    closedDepthThreshold: positive().default(0.1),
    scrollAmount: z.number().int().positive().default(120),
  })
  .strict()
  .refine((config) => config.dampingLinearLimitSq >= config.dampingDeadzoneSq, {
    message: "dampingLinearLimitSq must not be below dampingDeadzoneSq",
    path: ["dampingLinearLimitSq"],
  });

export type HandPointerConfigInput = z.input<typeof HandPointerConfigSchema>;
export type HandPointerConfig = z.output<typeof HandPointerConfigSchema>;

export class HandPointerConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid hand pointer config: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "HandPointerConfigError";
  }
}

export function resolveHandPointerConfig(input: unknown = {}): HandPointerConfig {
  const parsed = HandPointerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new HandPointerConfigError(parsed.error.issues);
  }
  return parsed.data;
}

export function toClassifierOptions(config: HandPointerConfig): HandClassifierOptions {
  return {
    pinchThreshold: config.pinchDistanceThreshold,
    debounceFrames: config.debounceFrames,
    extendedRatio: config.extendedRatio,
    spreadRatio: config.spreadRatio,
    closedDepthThreshold: config.closedDepthThreshold,
  };
}

export function toControlMapperOptions(config: HandPointerConfig): ControlMapperOptions {
  return {
    damping: {
      deadzoneSq: config.dampingDeadzoneSq,
      linearLimitSq: config.dampingLinearLimitSq,
      gain: config.dampingGain,
      flickGain: config.flickGain,
    },
    pinchScroll: {
      threshold: config.pinchScrollThreshold,
      stableFrames: config.scrollStableFrames,
    },
    scrollAmount: config.scrollAmount,
  };
}
