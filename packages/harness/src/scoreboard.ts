/**
 * Scoreboard: reference model of the FIFO's contents.
 *
 * Write and read events arrive from two independently timed observers.
 * Only their relative order within each stream matters: the n-th read
 * accepted since a reset must return the n-th write accepted since that
 * reset. Events are never paired by time or edge index.
 */

import type { Logger } from "pino";
import {
  ProtocolViolationError,
  ScoreboardError,
  hex,
  type Mismatch,
} from "./errors.js";
import type { Domain, FifoEvent } from "./monitor.js";

export interface ScoreboardReport {
  readonly passed: boolean;
  /** Accepted writes over the whole run. */
  readonly writes: number;
  /** Accepted reads over the whole run. */
  readonly reads: number;
  /** Entries in the reference queue right now. */
  readonly pending: number;
  readonly mismatches: readonly Mismatch[];
}

export class Scoreboard {
  private readonly _expected: number[] = [];
  private readonly _mismatches: Mismatch[] = [];
  private readonly _history: FifoEvent[] = [];
  private _writes = 0;
  private _reads = 0;

  constructor(private readonly _logger?: Logger) {}

  /**
   * Check one event against the reference queue.
   *
   * @throws ProtocolViolationError on a read with nothing pending.
   */
  process(event: FifoEvent): void {
    this._history.push(event);
    switch (event.kind) {
      case "write":
        this._expected.push(event.data);
        this._writes++;
        return;
      case "read":
        this.checkRead(event.data);
        return;
      case "reset":
        this.clear(event.domain);
        return;
    }
  }

  /** Consume `events` until the stream ends. */
  async run(events: AsyncIterable<FifoEvent>): Promise<void> {
    for await (const event of events) {
      this.process(event);
    }
  }

  report(): ScoreboardReport {
    return {
      passed: this._mismatches.length === 0,
      writes: this._writes,
      reads: this._reads,
      pending: this._expected.length,
      mismatches: [...this._mismatches],
    };
  }

  /** Copy of the reference queue, oldest first. */
  pending(): readonly number[] {
    return [...this._expected];
  }

  /** Every event consumed so far, in arrival order. */
  history(): readonly FifoEvent[] {
    return [...this._history];
  }

  /** @throws ScoreboardError listing every recorded mismatch. */
  assertPassed(): void {
    if (this._mismatches.length > 0) {
      throw new ScoreboardError([...this._mismatches]);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private checkRead(actual: number): void {
    const index = this._reads++;
    const expected = this._expected.shift();
    if (expected === undefined) {
      this._logger?.fatal({ index, data: hex(actual) }, "read completed with nothing pending");
      throw new ProtocolViolationError(actual, index);
    }
    if (expected !== actual) {
      this._mismatches.push({ index, expected, actual });
      this._logger?.error(
        { index, expected: hex(expected), actual: hex(actual) },
        "data mismatch",
      );
    }
  }

  private clear(domain: Domain): void {
    const discarded = this._expected.length;
    this._expected.length = 0;
    this._logger?.info({ domain, discarded }, "reference queue cleared by reset");
  }
}
