/**
 * Error classes raised by the kernel and the verification components.
 *
 * Data-integrity mismatches are not errors: the scoreboard accumulates
 * them and only `assertPassed()` turns them into a `ScoreboardError`.
 */

// ---------------------------------------------------------------------------
// Kernel
// ---------------------------------------------------------------------------

/**
 * Thrown when a simulation helper exceeds its step budget.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly steps: number;

  constructor(message: string, time: number, steps: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.steps = steps;
  }
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

/**
 * Thrown when a driver waited `edges` edges for `full`/`empty` to clear.
 * A stuck device and a slow one look the same; the bound decides.
 */
export class BackpressureTimeoutError extends Error {
  readonly side: "write" | "read";
  readonly edges: number;

  constructor(side: "write" | "read", edges: number) {
    const flag = side === "write" ? "full" : "empty";
    super(`${side}: '${flag}' still asserted after ${edges} edges`);
    this.name = "BackpressureTimeoutError";
    this.side = side;
    this.edges = edges;
  }
}

// ---------------------------------------------------------------------------
// Scoreboard
// ---------------------------------------------------------------------------

/** A read compared against the head of the reference queue. */
export interface Mismatch {
  /** 0-based index of the read among all reads of the run. */
  readonly index: number;
  readonly expected: number;
  readonly actual: number;
}

/**
 * Thrown when the device completes a read the reference model has no
 * pending write for. Fatal.
 */
export class ProtocolViolationError extends Error {
  readonly data: number;
  readonly index: number;

  constructor(data: number, index: number) {
    super(
      `read #${index} returned ${hex(data)} but no write is pending`,
    );
    this.name = "ProtocolViolationError";
    this.data = data;
    this.index = index;
  }
}

/** Thrown by `Scoreboard.assertPassed()` when mismatches were recorded. */
export class ScoreboardError extends Error {
  readonly mismatches: readonly Mismatch[];

  constructor(mismatches: readonly Mismatch[]) {
    const lines = mismatches.map(
      (m) => `  read #${m.index}: expected ${hex(m.expected)}, got ${hex(m.actual)}`,
    );
    super(`${mismatches.length} data mismatch(es):\n${lines.join("\n")}`);
    this.name = "ScoreboardError";
    this.mismatches = mismatches;
  }
}

// ---------------------------------------------------------------------------
// Transactions / configuration
// ---------------------------------------------------------------------------

export class SequencerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequencerError";
  }
}

export class TransactionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransactionError";
  }
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid harness configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Format a byte the way every log line and message in the harness does. */
export function hex(value: number): string {
  return `0x${value.toString(16).padStart(2, "0")}`;
}
