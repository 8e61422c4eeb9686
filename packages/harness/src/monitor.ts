/**
 * Passive observers, one per clock domain.
 *
 * Each observer waits on its own clock and inspects the sample carried by
 * the edge (the values the device saw at that edge), never the live pins.
 * The two observers share nothing but the sink they publish to, so the
 * interleaving of write and read events reflects scheduler order only.
 */

import type { Logger } from "pino";
import type { EdgeSource } from "./types.js";
import type { FifoPins } from "./pins.js";
import { hex } from "./errors.js";

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type Domain = "write" | "read";

/** A transfer the device accepted. */
export interface TransferEvent {
  readonly kind: Domain;
  readonly data: number;
  /** Edge index on the observing clock. Diagnostics only. */
  readonly edge: number;
}

/** First sampled edge of a reset pulse in one domain. */
export interface ResetEvent {
  readonly kind: "reset";
  readonly domain: Domain;
  readonly edge: number;
}

export type FifoEvent = TransferEvent | ResetEvent;

export interface EventSink {
  put(event: FifoEvent): void;
}

// ---------------------------------------------------------------------------
// Read-side alignment
// ---------------------------------------------------------------------------

type ReadSample = Pick<FifoPins, "rst_rd" | "rd" | "empty" | "data_out">;

/**
 * Bridges a read request at edge N to the data sampled at edge N+1.
 */
export class ReadAlignment {
  private _prevRd = 0;
  private _prevEmpty = 1;

  /** True if the previous edge carried an accepted read request. */
  get pending(): boolean {
    return this._prevRd === 1 && this._prevEmpty === 0;
  }

  reset(): void {
    this._prevRd = 0;
    this._prevEmpty = 1;
  }

  /**
   * Consume one edge's sample.
   *
   * @returns The completed read's data, or `undefined` if none completed.
   */
  advance(sample: Readonly<ReadSample>): number | undefined {
    if (sample.rst_rd === 1) {
      this.reset();
      return undefined;
    }
    const data = this.pending ? sample.data_out : undefined;
    this._prevRd = sample.rd;
    this._prevEmpty = sample.empty;
    return data;
  }
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export class FifoMonitor {
  readonly alignment = new ReadAlignment();

  constructor(
    private readonly _clocks: { write: EdgeSource<FifoPins>; read: EdgeSource<FifoPins> },
    private readonly _sink: EventSink,
    private readonly _logger?: Logger,
  ) {}

  /** Observe `clk_wr` until `signal` aborts. Zero-latency acceptance. */
  async observeWrites(signal?: AbortSignal): Promise<void> {
    let inReset = false;
    while (!signal?.aborted) {
      const { sample, index } = await this._clocks.write.risingEdge();
      if (signal?.aborted) return;

      if (sample.rst_wr === 1) {
        if (!inReset) {
          inReset = true;
          this._logger?.info({ edge: index }, "write domain in reset");
          this._sink.put({ kind: "reset", domain: "write", edge: index });
        }
        continue;
      }
      inReset = false;

      if (sample.wr === 1 && sample.full === 0) {
        this._logger?.debug({ data: hex(sample.data_in), edge: index }, "observed write");
        this._sink.put({ kind: "write", data: sample.data_in, edge: index });
      }
    }
  }

  /** Observe `clk_rd` until `signal` aborts. Data lags the request by one edge. */
  async observeReads(signal?: AbortSignal): Promise<void> {
    let inReset = false;
    while (!signal?.aborted) {
      const { sample, index } = await this._clocks.read.risingEdge();
      if (signal?.aborted) return;

      if (sample.rst_rd === 1) {
        this.alignment.reset();
        if (!inReset) {
          inReset = true;
          this._logger?.info({ edge: index }, "read domain in reset");
          this._sink.put({ kind: "reset", domain: "read", edge: index });
        }
        continue;
      }
      inReset = false;

      const data = this.alignment.advance(sample);
      if (data !== undefined) {
        this._logger?.debug({ data: hex(data), edge: index }, "observed read");
        this._sink.put({ kind: "read", data, edge: index });
      }
    }
  }
}
