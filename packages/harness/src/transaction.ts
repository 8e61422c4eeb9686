/**
 * Transactions: what a scenario intends the FIFO to do, one operation at a
 * time. Records are frozen at construction and consumed once by a driver.
 */

import { z } from "zod";
import { TransactionError, hex } from "./errors.js";

export interface WriteTransaction {
  readonly kind: "write";
  readonly payload: number;
}

export interface ReadTransaction {
  readonly kind: "read";
}

export type Transaction = WriteTransaction | ReadTransaction;

const DEFAULT_WIDTH = 8;

export function write(payload: number, dataWidth = DEFAULT_WIDTH): WriteTransaction {
  const max = 2 ** dataWidth - 1;
  if (!Number.isInteger(payload) || payload < 0 || payload > max) {
    throw new TransactionError(
      `write payload must be an integer in 0..${max}, got ${payload}`,
    );
  }
  return Object.freeze({ kind: "write", payload });
}

export function read(): ReadTransaction {
  return Object.freeze({ kind: "read" });
}

const TransactionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("write"), payload: z.number() }),
  z.object({ kind: z.literal("read") }),
]);

/**
 * Validate an untyped record (e.g. scenario data read from JSON).
 * Unknown kinds and out-of-range payloads fail here, not in the driver.
 */
export function parseTransaction(value: unknown, dataWidth = DEFAULT_WIDTH): Transaction {
  const result = TransactionSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new TransactionError(
      `invalid transaction ${JSON.stringify(value)}: ${issue?.message ?? "unrecognised"}`,
    );
  }
  const tx = result.data;
  return tx.kind === "write" ? write(tx.payload, dataWidth) : read();
}

// ---------------------------------------------------------------------------
// Sequence builders
// ---------------------------------------------------------------------------

export function writes(values: Iterable<number>, dataWidth = DEFAULT_WIDTH): WriteTransaction[] {
  return Array.from(values, (v) => write(v, dataWidth));
}

export function reads(count: number): ReadTransaction[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new TransactionError(`read count must be a non-negative integer, got ${count}`);
  }
  return Array.from({ length: count }, () => read());
}

/** Every write first, then one read per write. */
export function writeThenRead(values: Iterable<number>, dataWidth = DEFAULT_WIDTH): Transaction[] {
  const ws = writes(values, dataWidth);
  return [...ws, ...reads(ws.length)];
}

/** Write, read, write, read, ... */
export function interleave(values: Iterable<number>, dataWidth = DEFAULT_WIDTH): Transaction[] {
  return writes(values, dataWidth).flatMap((w) => [w, read()]);
}

export function describeTransaction(tx: Transaction): string {
  switch (tx.kind) {
    case "write":
      return `write(${hex(tx.payload)})`;
    case "read":
      return "read()";
  }
}
