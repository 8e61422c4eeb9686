/**
 * Behavioural model of a dual-clock FIFO.
 *
 * Gray-coded pointers cross between domains through two-flop
 * synchronisers, so `empty` falls a few read edges after a write and
 * `full` falls a few write edges after a read. Both flags and `data_out`
 * are registered: `data_out` is loaded by the edge that accepts a read
 * and is valid from the next edge on. Resets are synchronous and active
 * high; they clear pointers, synchronisers and flags but not the storage.
 */

import {
  fifoPorts,
  READ_CLOCK,
  WRITE_CLOCK,
  type DeviceDefinition,
  type DeviceHandle,
  type FifoPins,
  type SignalAccess,
} from "@fifo-verify/harness";
import { binToGray, grayToBin } from "./gray.js";

export interface AsyncFifoOptions {
  /** Number of entries; a power of two >= 2. Default: 8. */
  depth?: number;
  /** Word width in bits. Default: 8. */
  dataWidth?: number;
}

/** Register state, for tests and debugging. */
export interface AsyncFifoState {
  /** Write pointer (binary, one extra wrap bit). */
  readonly writePointer: number;
  readonly readPointer: number;
  /** Read pointer as currently seen by the write domain. */
  readonly syncedReadPointer: number;
  /** Write pointer as currently seen by the read domain. */
  readonly syncedWritePointer: number;
  readonly full: boolean;
  readonly empty: boolean;
}

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

class AsyncFifoModel implements DeviceHandle {
  private readonly _mem: Uint32Array;
  private readonly _addrMask: number;
  private readonly _ptrMask: number;
  /** Top two bits of a Gray pointer; inverted when comparing for full. */
  private readonly _fullMask: number;

  // write domain
  private _wbin = 0;
  private _wgray = 0;
  private _wq1Rgray = 0;
  private _wq2Rgray = 0;

  // read domain
  private _rbin = 0;
  private _rgray = 0;
  private _rq1Wgray = 0;
  private _rq2Wgray = 0;

  constructor(
    private readonly _signals: SignalAccess,
    depth: number,
  ) {
    const addrBits = Math.log2(depth);
    this._mem = new Uint32Array(depth);
    this._addrMask = depth - 1;
    this._ptrMask = (depth << 1) - 1;
    this._fullMask = 0b11 << (addrBits - 1);
    // power-on flags match the reset state
    this._signals.write("full", 0);
    this._signals.write("empty", 1);
  }

  tick(event: string): void {
    if (event === WRITE_CLOCK) {
      this.writeEdge();
    } else if (event === READ_CLOCK) {
      this.readEdge();
    } else {
      throw new Error(`AsyncFifo has no clock '${event}'`);
    }
  }

  dispose(): void {
    this._mem.fill(0);
  }

  state(): AsyncFifoState {
    return {
      writePointer: this._wbin,
      readPointer: this._rbin,
      syncedReadPointer: grayToBin(this._wq2Rgray),
      syncedWritePointer: grayToBin(this._rq2Wgray),
      full: this._signals.read("full") === 1,
      empty: this._signals.read("empty") === 1,
    };
  }

  private writeEdge(): void {
    const s = this._signals;
    if (s.read("rst_wr") === 1) {
      this._wbin = 0;
      this._wgray = 0;
      this._wq1Rgray = 0;
      this._wq2Rgray = 0;
      s.write("full", 0);
      return;
    }

    const accept = s.read("wr") === 1 && s.read("full") === 0;
    if (accept) {
      this._mem[this._wbin & this._addrMask] = s.read("data_in");
    }
    const wbinNext = (this._wbin + (accept ? 1 : 0)) & this._ptrMask;
    const wgrayNext = binToGray(wbinNext);
    // compared against the synchroniser output from before this edge
    const full = wgrayNext === (this._wq2Rgray ^ this._fullMask);

    this._wq2Rgray = this._wq1Rgray;
    this._wq1Rgray = this._rgray;
    this._wbin = wbinNext;
    this._wgray = wgrayNext;
    s.write("full", full ? 1 : 0);
  }

  private readEdge(): void {
    const s = this._signals;
    if (s.read("rst_rd") === 1) {
      this._rbin = 0;
      this._rgray = 0;
      this._rq1Wgray = 0;
      this._rq2Wgray = 0;
      s.write("empty", 1);
      s.write("data_out", 0);
      return;
    }

    const accept = s.read("rd") === 1 && s.read("empty") === 0;
    if (accept) {
      s.write("data_out", this._mem[this._rbin & this._addrMask]);
    }
    const rbinNext = (this._rbin + (accept ? 1 : 0)) & this._ptrMask;
    const rgrayNext = binToGray(rbinNext);
    const empty = rgrayNext === this._rq2Wgray;

    this._rq2Wgray = this._rq1Wgray;
    this._rq1Wgray = this._wgray;
    this._rbin = rbinNext;
    this._rgray = rgrayNext;
    s.write("empty", empty ? 1 : 0);
  }
}

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

export interface AsyncFifoDevice extends DeviceDefinition<FifoPins> {
  readonly depth: number;
  readonly dataWidth: number;
  /** Register state of the most recently instantiated model. */
  inspect(): AsyncFifoState;
}

/**
 * Create a dual-clock FIFO device definition.
 *
 * ```ts
 * const sim = Simulation.create(createAsyncFifo({ depth: 8 }));
 * ```
 */
export function createAsyncFifo(options?: AsyncFifoOptions): AsyncFifoDevice {
  const depth = options?.depth ?? 8;
  const dataWidth = options?.dataWidth ?? 8;
  if (!Number.isInteger(depth) || depth < 2 || (depth & (depth - 1)) !== 0) {
    throw new Error(`AsyncFifo depth must be a power of two >= 2, got ${depth}`);
  }
  if (!Number.isInteger(dataWidth) || dataWidth < 1 || dataWidth > 32) {
    throw new Error(`AsyncFifo dataWidth must be 1..32, got ${dataWidth}`);
  }

  let model: AsyncFifoModel | undefined;
  return {
    name: "AsyncFifo",
    ports: fifoPorts(dataWidth),
    events: [WRITE_CLOCK, READ_CLOCK],
    depth,
    dataWidth,
    instantiate(signals) {
      model = new AsyncFifoModel(signals, depth);
      return model;
    },
    inspect() {
      if (!model) {
        throw new Error("AsyncFifo has not been instantiated");
      }
      return model.state();
    },
  };
}
