import { z } from "zod";
import { ConfigError } from "./errors.js";

/** One clock of the device */
export const ClockConfigSchema = z.object({
  /** Clock pin name (e.g., "clk_wr") */
  name: z.string().min(1),
  /** Distance between rising edges, in time units */
  period: z.number().int().positive(),
  /** Offset of the first edge train (default: 0) */
  initialDelay: z.number().int().nonnegative().default(0),
});

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

/** Reset pulse shape */
export const ResetConfigSchema = z.object({
  /** Lockstep iterations with both resets asserted (default: 4) */
  holdCycles: z.number().int().positive().default(4),
  /** Lockstep iterations after release before flags are trusted (default: 4) */
  settleCycles: z.number().int().nonnegative().default(4),
});

/** Top-level harness configuration */
export const HarnessConfigSchema = z.object({
  clocks: z
    .object({
      write: ClockConfigSchema.default({ name: "clk_wr", period: 10 }),
      read: ClockConfigSchema.default({ name: "clk_rd", period: 14 }),
    })
    .default({}),
  reset: ResetConfigSchema.default({}),
  driver: z
    .object({
      /** Edges a driver polls `full`/`empty` before giving up (default: 1000) */
      maxWaitEdges: z.number().int().positive().default(1000),
    })
    .default({}),
  /** Kernel step budget for one `run()` (default: 1000000) */
  maxSteps: z.number().int().positive().default(1_000_000),
  logLevel: LogLevelSchema.default("info"),
});

export type ClockConfig = z.infer<typeof ClockConfigSchema>;
export type ResetConfig = z.infer<typeof ResetConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

/** Environment variable that overrides `logLevel`. */
export const LOG_LEVEL_ENV = "FIFO_VERIFY_LOG_LEVEL";

/**
 * Parse a harness configuration, filling defaults.
 * `FIFO_VERIFY_LOG_LEVEL` in `env` takes precedence over `input.logLevel`.
 */
export function loadConfig(
  input: HarnessConfigInput = {},
  env: Record<string, string | undefined> = process.env,
): HarnessConfig {
  const override = env[LOG_LEVEL_ENV];
  const merged = override === undefined ? input : { ...input, logLevel: override };
  const result = HarnessConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  if (result.data.clocks.write.name === result.data.clocks.read.name) {
    throw new ConfigError([
      `clocks: write and read clocks share the name '${result.data.clocks.write.name}'`,
    ]);
  }
  return result.data;
}

/** `path: message` per issue, as listed by ConfigError. */
export function formatIssues(error: z.ZodError, prefix: readonly string[] = []): string[] {
  return error.issues.map(
    (issue) => `${[...prefix, ...issue.path].join(".") || "(root)"}: ${issue.message}`,
  );
}
