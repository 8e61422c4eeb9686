/**
 * Verification environment: one simulation, one set of components.
 *
 * Every component gets the DUT accessor and the clock handles it needs by
 * constructor injection; nothing reaches for a shared device handle.
 */

import type { Logger } from "pino";
import type { ClockDomain, DeviceDefinition, Task } from "./types.js";
import { Simulation } from "./simulation.js";
import { Channel } from "./channel.js";
import { loadConfig, type HarnessConfig, type HarnessConfigInput } from "./config.js";
import { componentLogger, createLogger } from "./logger.js";
import type { FifoPins } from "./pins.js";
import { Sequencer } from "./sequencer.js";
import { FifoDriver } from "./driver.js";
import { FifoMonitor, type FifoEvent } from "./monitor.js";
import { Scoreboard, type ScoreboardReport } from "./scoreboard.js";
import { ResetCoordinator, type ResetOptions } from "./reset.js";
import type { Transaction } from "./transaction.js";

export class FifoEnv {
  readonly sim: Simulation<FifoPins>;
  readonly config: HarnessConfig;
  readonly logger: Logger;
  readonly clocks: { readonly write: ClockDomain<FifoPins>; readonly read: ClockDomain<FifoPins> };
  readonly events = new Channel<FifoEvent>();
  readonly sequencer: Sequencer;
  readonly driver: FifoDriver;
  readonly monitor: FifoMonitor;
  readonly scoreboard: Scoreboard;
  readonly resetter: ResetCoordinator;

  private readonly _abort = new AbortController();
  private _tasks: Task<void>[] = [];

  private constructor(sim: Simulation<FifoPins>, config: HarnessConfig, logger: Logger) {
    this.sim = sim;
    this.config = config;
    this.logger = logger;
    this.clocks = {
      write: sim.addClock(config.clocks.write.name, config.clocks.write),
      read: sim.addClock(config.clocks.read.name, config.clocks.read),
    };

    const dut = sim.dut;
    this.sequencer = new Sequencer(componentLogger(logger, "sequencer"));
    this.driver = new FifoDriver(dut, this.clocks, {
      maxWaitEdges: config.driver.maxWaitEdges,
      logger: componentLogger(logger, "driver"),
    });
    this.monitor = new FifoMonitor(this.clocks, this.events, componentLogger(logger, "monitor"));
    this.scoreboard = new Scoreboard(componentLogger(logger, "scoreboard"));
    this.resetter = new ResetCoordinator(
      dut,
      this.clocks,
      config.reset,
      componentLogger(logger, "reset"),
    );
  }

  /**
   * Build a simulation of `device`, start both clocks and wire the
   * components.
   *
   * ```ts
   * const env = FifoEnv.create(createAsyncFifo(), { logLevel: "silent" });
   * env.start();
   * await env.run(async () => {
   *   await env.reset();
   *   await env.play(writeThenRead([0x11, 0x22]));
   *   await env.quiesce();
   * });
   * env.scoreboard.assertPassed();
   * ```
   */
  static create(
    device: DeviceDefinition<FifoPins>,
    input?: HarnessConfigInput,
    logger?: Logger,
  ): FifoEnv {
    const config = loadConfig(input);
    const root = logger ?? createLogger(config.logLevel);
    const sim = Simulation.create(device, {
      maxSteps: config.maxSteps,
      logger: componentLogger(root, "kernel"),
    });
    return new FifoEnv(sim, config, root);
  }

  get dut(): FifoPins {
    return this.sim.dut;
  }

  /** Fork both observers, the scoreboard consumer and the driver loop. */
  start(): void {
    if (this._tasks.length > 0) {
      throw new Error("FifoEnv already started");
    }
    const signal = this._abort.signal;
    this._tasks = [
      this.sim.fork("monitor.write", () => this.monitor.observeWrites(signal)),
      this.sim.fork("monitor.read", () => this.monitor.observeReads(signal)),
      this.sim.fork("scoreboard", () => this.scoreboard.run(this.events)),
      this.sim.fork("driver", () => this.driver.run(this.sequencer, signal)),
    ];
  }

  /** Run `body` on the kernel until it settles. */
  run<T>(body: () => Promise<T>): Promise<T> {
    return this.sim.run(body, { maxSteps: this.config.maxSteps });
  }

  reset(opts?: Partial<ResetOptions>): Promise<void> {
    return this.resetter.reset(opts);
  }

  /** Hand `items` to the driver loop and wait until all are completed. */
  async play(items: Iterable<Transaction>): Promise<void> {
    this.sequencer.enqueue(...items);
    await this.sequencer.drained();
  }

  /**
   * Wait `cycles` edges on each clock so a read accepted on the last edge
   * has its data sampled and every event has reached the scoreboard.
   */
  async quiesce(cycles = 2): Promise<void> {
    await this.clocks.write.cycles(cycles);
    await this.clocks.read.cycles(cycles);
  }

  report(): ScoreboardReport {
    return this.scoreboard.report();
  }

  /**
   * Tear the loops down. Observers and the driver leave at their next
   * resumption; the scoreboard drains what is buffered and ends.
   */
  stop(): void {
    this._abort.abort();
    this.sequencer.finish();
    this.events.close();
  }
}
