/**
 * Pin contract of the dual-clock FIFO. Clock pins are absent: they are
 * owned by the simulation's clocks.
 */

import type { PortInfo } from "./types.js";

export interface FifoPins {
  /** Write-domain reset, active high. */
  rst_wr: number;
  /** Write strobe, one-edge pulse. */
  wr: number;
  /** Write payload, valid while `wr` is asserted. */
  data_in: number;
  readonly full: number;

  /** Read-domain reset, active high. */
  rst_rd: number;
  /** Read strobe, one-edge pulse. */
  rd: number;
  /** Read payload, valid one edge after an accepted read request. */
  readonly data_out: number;
  readonly empty: number;
}

/** Write-side sub-interface: the only pins a write driver touches. */
export type WritePins = Pick<FifoPins, "rst_wr" | "wr" | "data_in" | "full">;

/** Read-side sub-interface. */
export type ReadPins = Pick<FifoPins, "rst_rd" | "rd" | "data_out" | "empty">;

export const WRITE_CLOCK = "clk_wr";
export const READ_CLOCK = "clk_rd";

/** Port table for a FIFO carrying `dataWidth`-bit words. */
export function fifoPorts(dataWidth: number): Record<string, PortInfo> {
  return {
    clk_wr:   { direction: "input", type: "clock", width: 1 },
    rst_wr:   { direction: "input", type: "reset", width: 1 },
    wr:       { direction: "input", type: "logic", width: 1 },
    data_in:  { direction: "input", type: "logic", width: dataWidth },
    full:     { direction: "output", type: "logic", width: 1 },
    clk_rd:   { direction: "input", type: "clock", width: 1 },
    rst_rd:   { direction: "input", type: "reset", width: 1 },
    rd:       { direction: "input", type: "logic", width: 1 },
    data_out: { direction: "output", type: "logic", width: dataWidth },
    empty:    { direction: "output", type: "logic", width: 1 },
  };
}
