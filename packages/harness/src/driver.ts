/**
 * Drivers translate transactions into pin-level handshakes.
 *
 * The write side only touches `wr`/`data_in` and only moves on write-clock
 * edges; the read side only touches `rd` and only moves on read-clock
 * edges. `FifoDriver` runs both behind one sequential loop; scenarios that
 * need overlapping writes and reads run `writer` and `reader` from two
 * separate tasks instead.
 */

import type { Logger } from "pino";
import type { EdgeSource } from "./types.js";
import type { ReadPins, WritePins } from "./pins.js";
import { BackpressureTimeoutError, hex } from "./errors.js";
import type { Sequencer } from "./sequencer.js";
import type { Transaction } from "./transaction.js";

export interface DriverOptions {
  /** Edges to poll `full`/`empty` before throwing BackpressureTimeoutError. */
  maxWaitEdges: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Write side
// ---------------------------------------------------------------------------

export class WriteDriver {
  constructor(
    private readonly _pins: WritePins,
    private readonly _clock: EdgeSource<unknown>,
    private readonly _opts: DriverOptions,
  ) {}

  /** Wait for `full` to clear, then pulse `wr` for one edge with `payload`. */
  async write(payload: number): Promise<void> {
    let waited = 0;
    while (this._pins.full === 1) {
      if (waited >= this._opts.maxWaitEdges) {
        throw new BackpressureTimeoutError("write", waited);
      }
      await this._clock.risingEdge();
      waited++;
    }
    this._pins.data_in = payload;
    this._pins.wr = 1;
    await this._clock.risingEdge();
    this._pins.wr = 0;
    this._opts.logger?.debug({ data: hex(payload), waited }, "drove write");
  }
}

// ---------------------------------------------------------------------------
// Read side
// ---------------------------------------------------------------------------

export class ReadDriver {
  constructor(
    private readonly _pins: ReadPins,
    private readonly _clock: EdgeSource<unknown>,
    private readonly _opts: DriverOptions,
  ) {}

  /** Wait for `empty` to clear, then pulse `rd` for one edge. */
  async read(): Promise<void> {
    let waited = 0;
    while (this._pins.empty === 1) {
      if (waited >= this._opts.maxWaitEdges) {
        throw new BackpressureTimeoutError("read", waited);
      }
      await this._clock.risingEdge();
      waited++;
    }
    this._pins.rd = 1;
    await this._clock.risingEdge();
    this._pins.rd = 0;
    this._opts.logger?.debug({ waited }, "drove read");
  }
}

// ---------------------------------------------------------------------------
// Sequential driver
// ---------------------------------------------------------------------------

export class FifoDriver {
  readonly writer: WriteDriver;
  readonly reader: ReadDriver;
  private _current: Transaction | undefined;

  constructor(
    pins: WritePins & ReadPins,
    clocks: { write: EdgeSource<unknown>; read: EdgeSource<unknown> },
    opts: DriverOptions,
  ) {
    this.writer = new WriteDriver(pins, clocks.write, opts);
    this.reader = new ReadDriver(pins, clocks.read, opts);
  }

  /** The transaction being driven, if any. */
  get current(): Transaction | undefined {
    return this._current;
  }

  async drive(tx: Transaction): Promise<void> {
    this._current = tx;
    switch (tx.kind) {
      case "write":
        await this.writer.write(tx.payload);
        break;
      case "read":
        await this.reader.read();
        break;
      default:
        return assertNever(tx);
    }
    this._current = undefined;
  }

  /**
   * Pull transactions from `sequencer` until its stream ends or `signal`
   * aborts. The signal is checked between transactions only.
   */
  async run(sequencer: Sequencer, signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const tx = await sequencer.next();
      if (!tx || signal?.aborted) return;
      await this.drive(tx);
      sequencer.complete(tx);
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled transaction: ${JSON.stringify(value)}`);
}
