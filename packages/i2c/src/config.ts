import { readFileSync } from "node:fs";
import { z } from "zod";
import { FIRST_ACK_STATE } from "./bus.js";
import { ConfigError } from "./errors.js";
import { ADDR_WIDTH, DATA_WIDTH, type Range } from "./transaction.js";

/** A [min, max] range whose bounds fit a field of `width` bits. */
const rangeSchema = (width: number) => {
  const bound = z.number().int().nonnegative().max(2 ** width - 1);
  return z
    .object({ min: bound, max: bound })
    .refine((r) => r.min <= r.max, { message: "min must not exceed max" });
};

const constraintsSchema = (addr: Range, data: Range) =>
  z.object({
    addr: rangeSchema(ADDR_WIDTH).default(addr),
    data: rangeSchema(DATA_WIDTH).default(data),
  });

export const BenchConfigSchema = z.object({
  /** Seed for stimulus randomization; unset draws a fresh one per run. */
  seed: z.number().int().optional(),
  clockPeriod: z.number().int().positive().default(10),
  resetCycles: z.number().int().nonnegative().default(5),
  /** Total edges simulated, reset included. */
  runCycles: z.number().int().positive().default(4000),
  stretchCycles: z.number().int().positive().default(1200),
  ackState: z.number().int().min(0).max(15).default(FIRST_ACK_STATE),
  /** Class-level field constraints. */
  transaction: constraintsSchema({ min: 0, max: 10 }, { min: 0, max: 10 }).default({}),
  /** Generator-level ranges, applied on top of `transaction`. */
  generator: constraintsSchema({ min: 0, max: 10 }, { min: 1, max: 5 }).default({}),
  controller: z
    .object({
      bitCycles: z.number().int().positive().default(4),
      absentTargets: z.array(z.number().int().min(0).max(127)).default([]),
    })
    .default({}),
  /** Write a VCD waveform here when the run ends. */
  vcd: z.string().min(1).optional(),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;

/** Validate a configuration object and fill in defaults. */
export function parseConfig(input: unknown): BenchConfig {
  const result = BenchConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      "Invalid bench configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Read a JSON configuration file and validate it. */
export function loadConfig(path: string): BenchConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read bench configuration '${path}'`, [reason]);
  }
  return parseConfig(raw);
}
