/**
 * Time-based Simulation.
 *
 * Owns the signal buffer of one device, a set of free-running clocks and
 * the cooperative tasks that wait on their edges. Tasks only ever suspend
 * on `risingEdge()` or on a channel; the kernel fires one edge, then lets
 * every resumed task run until it suspends again before firing the next.
 */

import { setImmediate as nextMacrotask } from "node:timers/promises";
import type { Logger } from "pino";
import type {
  ClockDomain,
  ClockOptions,
  DeviceDefinition,
  DeviceHandle,
  Edge,
  PortInfo,
  SignalLayout,
  Task,
} from "./types.js";
import { SimulationTimeoutError } from "./errors.js";
import { buildLayout, createDut, createSignalAccess, snapshotDut } from "./dut.js";

export interface SimulationOptions {
  /** Default step budget for `run()` and `waitUntil()`. */
  maxSteps?: number;
  logger?: Logger;
}

const DEFAULT_MAX_STEPS = 1_000_000;

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

class Clock<P> implements ClockDomain<P> {
  private _count = 0;
  private _waiters: Array<(edge: Edge<P>) => void> = [];
  /** Absolute time of the next rising edge. */
  nextTime: number;

  constructor(
    readonly name: string,
    readonly period: number,
    initialDelay: number,
    /** Registration order; breaks ties between coincident edges. */
    readonly order: number,
  ) {
    this.nextTime = initialDelay + period;
  }

  edges(): number {
    return this._count;
  }

  risingEdge(): Promise<Edge<P>> {
    return new Promise((resolve) => {
      this._waiters.push(resolve);
    });
  }

  async cycles(count: number): Promise<Edge<P>> {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(`cycles: count must be a positive integer, got ${count}`);
    }
    let edge = await this.risingEdge();
    for (let i = 1; i < count; i++) {
      edge = await this.risingEdge();
    }
    return edge;
  }

  /** Advance the edge train and resume everything waiting on it. */
  fire(sample: Readonly<P>): Edge<P> {
    this._count++;
    const edge: Edge<P> = {
      clock: this.name,
      index: this._count,
      time: this.nextTime,
      sample,
    };
    this.nextTime += this.period;
    const waiters = this._waiters;
    this._waiters = [];
    for (const resolve of waiters) {
      resolve(edge);
    }
    return edge;
  }
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export class Simulation<P = Record<string, unknown>> {
  private readonly _handle: DeviceHandle;
  private readonly _dut: P;
  private readonly _buffer: ArrayBuffer;
  private readonly _layout: Record<string, SignalLayout>;
  private readonly _ports: Record<string, PortInfo>;
  private readonly _events: readonly string[];
  private readonly _clocks = new Map<string, Clock<P>>();
  private readonly _faults: Array<{ task: string; error: unknown }> = [];
  private readonly _maxSteps: number;
  private readonly _logger: Logger | undefined;
  private _time = 0;
  private _disposed = false;

  private constructor(
    device: DeviceDefinition<P>,
    options: SimulationOptions,
  ) {
    const { layout, size } = buildLayout(device.ports);
    this._buffer = new ArrayBuffer(size);
    this._layout = layout;
    this._ports = device.ports;
    this._events = device.events;
    this._handle = device.instantiate(createSignalAccess(this._buffer, layout));
    this._dut = createDut<P>(this._buffer, layout, device.ports);
    this._maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this._logger = options.logger;
  }

  /**
   * Create a Simulation for the given device.
   *
   * ```ts
   * const sim = Simulation.create(createAsyncFifo({ depth: 8 }));
   * sim.addClock("clk_wr", { period: 10 });
   * sim.addClock("clk_rd", { period: 14 });
   * ```
   */
  static create<P>(
    device: DeviceDefinition<P>,
    options?: SimulationOptions,
  ): Simulation<P> {
    return new Simulation<P>(device, options ?? {});
  }

  /** The DUT accessor object (read/write pins as plain properties). */
  get dut(): P {
    return this._dut;
  }

  /**
   * Register a periodic clock. The first rising edge is at
   * `initialDelay + period`.
   *
   * @param name    Clock event name (must match a `clock` port).
   */
  addClock(name: string, opts: ClockOptions): ClockDomain<P> {
    this.ensureAlive();
    if (!this._events.includes(name)) {
      throw new Error(
        `Unknown event '${name}'. Available: ${this._events.join(", ")}`,
      );
    }
    if (this._clocks.has(name)) {
      throw new Error(`Clock '${name}' is already running`);
    }
    if (!(opts.period > 0)) {
      throw new Error(`Clock '${name}': period must be positive, got ${opts.period}`);
    }
    const clock = new Clock<P>(
      name,
      opts.period,
      opts.initialDelay ?? 0,
      this._events.indexOf(name),
    );
    this._clocks.set(name, clock);
    return clock;
  }

  /** Look up a clock registered with `addClock()`. */
  clock(name: string): ClockDomain<P> {
    const clock = this._clocks.get(name);
    if (!clock) {
      throw new Error(
        `Clock '${name}' has not been added. Running: ${[...this._clocks.keys()].join(", ")}`,
      );
    }
    return clock;
  }

  /**
   * Start a cooperative task. A task that throws fails the whole run: the
   * error is rethrown from the next `step()`.
   */
  fork<T>(name: string, body: () => Promise<T>): Task<T> {
    this.ensureAlive();
    let settled = false;
    const done = body().then(
      (value) => {
        settled = true;
        return value;
      },
      (error: unknown) => {
        settled = true;
        throw error;
      },
    );
    done.catch((error: unknown) => {
      this._faults.push({ task: name, error });
      this._logger?.error({ task: name, err: error }, "task failed");
    });
    return { name, done, settled: () => settled };
  }

  /**
   * Fire the next rising edge and let every resumed task settle.
   *
   * @returns The time of the processed edge, or `null` if no clock runs.
   */
  async step(): Promise<number | null> {
    this.ensureAlive();
    this.raiseFault();
    const clock = this.nextClock();
    if (!clock) return null;

    const time = clock.nextTime;
    this._time = time;
    // Values stable at the edge, before the device updates its registers.
    const sample = snapshotDut<P>(this._buffer, this._layout, this._ports);
    this._handle.tick(clock.name);
    clock.fire(sample);

    await this.settle();
    return time;
  }

  /**
   * Run `main` as a task and fire edges until it settles.
   *
   * @throws SimulationTimeoutError if `maxSteps` edges pass first.
   */
  async run<T>(
    main: () => Promise<T>,
    opts?: { maxSteps?: number },
  ): Promise<T> {
    this.ensureAlive();
    const max = opts?.maxSteps ?? this._maxSteps;
    const task = this.fork("main", main);
    await this.settle();
    let steps = 0;
    while (!task.settled()) {
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `run: main task still running after ${max} steps at time ${this._time}`,
          this._time,
          steps,
        );
      }
      const t = await this.step();
      if (t === null) {
        throw new Error("run: no clock is running; main task cannot make progress");
      }
      steps++;
    }
    return task.done;
  }

  /**
   * Fire every edge up to and including `endTime`.
   *
   * @throws SimulationTimeoutError if `maxSteps` is exceeded.
   */
  async runUntil(endTime: number, opts?: { maxSteps?: number }): Promise<void> {
    this.ensureAlive();
    const max = opts?.maxSteps ?? this._maxSteps;
    let steps = 0;
    for (;;) {
      const next = this.nextEventTime();
      if (next === null || next > endTime) break;
      await this.step();
      steps++;
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `runUntil: exceeded ${max} steps at time ${this._time} (target ${endTime})`,
          this._time,
          steps,
        );
      }
    }
    this._time = Math.max(this._time, endTime);
  }

  /**
   * Step until `condition()` returns true.
   *
   * @returns The simulation time when the condition became true.
   * @throws SimulationTimeoutError if `maxSteps` is exceeded.
   */
  async waitUntil(
    condition: () => boolean,
    opts?: { maxSteps?: number },
  ): Promise<number> {
    this.ensureAlive();
    const max = opts?.maxSteps ?? this._maxSteps;
    let steps = 0;
    while (!condition()) {
      const t = await this.step();
      if (t === null) break;
      steps++;
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `waitUntil: condition not met after ${max} steps at time ${this._time}`,
          this._time,
          steps,
        );
      }
    }
    return this._time;
  }

  /** Current simulation time. */
  time(): number {
    return this._time;
  }

  /**
   * Peek at the time of the next rising edge without advancing.
   *
   * @returns The time of the next edge, or `null` if no clock runs.
   */
  nextEventTime(): number | null {
    return this.nextClock()?.nextTime ?? null;
  }

  /** Release the device model. */
  dispose(): void {
    if (!this._disposed) {
      this._disposed = true;
      this._handle.dispose();
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private nextClock(): Clock<P> | undefined {
    let best: Clock<P> | undefined;
    for (const clock of this._clocks.values()) {
      if (
        !best ||
        clock.nextTime < best.nextTime ||
        (clock.nextTime === best.nextTime && clock.order < best.order)
      ) {
        best = clock;
      }
    }
    return best;
  }

  /**
   * Yield to the macrotask queue. Every promise continuation queued by the
   * edge (and every continuation those queue) runs before this resolves.
   */
  private async settle(): Promise<void> {
    await nextMacrotask();
    this.raiseFault();
  }

  private raiseFault(): void {
    const fault = this._faults.shift();
    if (fault) {
      this._faults.length = 0;
      throw fault.error;
    }
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulation has been disposed");
    }
  }
}
