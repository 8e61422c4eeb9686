/**
 * Reset coordinator for the two clock domains.
 *
 * `resetting`: both resets high, strobes low, payload zero, for
 * `holdCycles` lockstep iterations (one write edge, then one read edge).
 * `operational`: both resets released, then `settleCycles` more lockstep
 * iterations before `full`/`empty` are trusted.
 *
 * The coordinator does not stop drivers or monitors. A scenario that
 * resets mid-run stops handing out transactions first.
 */

import type { Logger } from "pino";
import type { EdgeSource } from "./types.js";
import type { FifoPins } from "./pins.js";
import { ResetConfigSchema, formatIssues } from "./config.js";
import { ConfigError } from "./errors.js";

export type ResetState = "resetting" | "operational";

export interface ResetOptions {
  holdCycles: number;
  settleCycles: number;
}

type ResetPins = Pick<FifoPins, "rst_wr" | "rst_rd" | "wr" | "rd" | "data_in">;

export class ResetCoordinator {
  private _state: ResetState = "resetting";
  private _resets = 0;

  constructor(
    private readonly _pins: ResetPins,
    private readonly _clocks: { write: EdgeSource<unknown>; read: EdgeSource<unknown> },
    private readonly _defaults: ResetOptions,
    private readonly _logger?: Logger,
  ) {}

  /** `resetting` until the first reset completes. */
  get state(): ResetState {
    return this._state;
  }

  /** Number of completed resets. */
  get count(): number {
    return this._resets;
  }

  /**
   * Run one reset pulse. Per-call options override the defaults.
   *
   * @throws ConfigError if the merged options are out of range; no pin is touched.
   */
  async reset(opts?: Partial<ResetOptions>): Promise<void> {
    const parsed = ResetConfigSchema.safeParse({
      holdCycles: opts?.holdCycles ?? this._defaults.holdCycles,
      settleCycles: opts?.settleCycles ?? this._defaults.settleCycles,
    });
    if (!parsed.success) {
      throw new ConfigError(formatIssues(parsed.error, ["reset"]));
    }
    const { holdCycles, settleCycles } = parsed.data;

    this._state = "resetting";
    this._logger?.info({ holdCycles, settleCycles }, "asserting reset");
    this._pins.rst_wr = 1;
    this._pins.rst_rd = 1;
    this._pins.wr = 0;
    this._pins.rd = 0;
    this._pins.data_in = 0;
    await this.lockstep(holdCycles);

    this._pins.rst_wr = 0;
    this._pins.rst_rd = 0;
    await this.lockstep(settleCycles);

    this._state = "operational";
    this._resets++;
    this._logger?.info({ resets: this._resets }, "operational");
  }

  private async lockstep(iterations: number): Promise<void> {
    for (let i = 0; i < iterations; i++) {
      await this._clocks.write.risingEdge();
      await this._clocks.read.risingEdge();
    }
  }
}
