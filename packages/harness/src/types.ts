/**
 * @fifo-verify/harness: core type definitions
 *
 * These types define the contract between:
 *   - a device model: produces a DeviceDefinition and a DeviceHandle
 *   - the simulation kernel: owns signal storage and clock edges
 *   - verification components: read samples, drive pins
 */

// ---------------------------------------------------------------------------
// Device definition
// ---------------------------------------------------------------------------

/**
 * A device descriptor. The type parameter `Ports` carries the pin
 * interface (e.g. `FifoPins`) so that `Simulation.create(device)` returns
 * a correctly-typed DUT accessor.
 */
export interface DeviceDefinition<Ports = Record<string, unknown>> {
  readonly name: string;
  readonly ports: Record<string, PortInfo>;
  /** Clock port names, in the order coincident edges are processed. */
  readonly events: readonly string[];
  /** Bind the device's behaviour to the kernel's signal storage. */
  instantiate(signals: SignalAccess): DeviceHandle;
  /** Phantom field, never set at runtime. Carries the `Ports` type. */
  readonly __ports?: Ports;
}

/** Metadata for a single pin. */
export interface PortInfo {
  readonly direction: "input" | "output";
  readonly type: "clock" | "reset" | "logic";
  readonly width: number;
}

/**
 * Handle returned by `DeviceDefinition.instantiate()`.
 * @internal
 */
export interface DeviceHandle {
  /** Update every register clocked by `event` for one rising edge. */
  tick(event: string): void;
  dispose(): void;
}

/**
 * Unchecked pin access handed to a device model. Unlike the DUT accessor,
 * a device may write its own outputs.
 */
export interface SignalAccess {
  read(name: string): number;
  write(name: string, value: number): void;
}

// ---------------------------------------------------------------------------
// Signal layout
// ---------------------------------------------------------------------------

/**
 * Byte-level location of a signal inside the simulation buffer.
 * @internal
 */
export interface SignalLayout {
  readonly offset: number;
  /** Bit width of the signal. */
  readonly width: number;
  /** Number of bytes occupied (ceil(width/8)). */
  readonly byteSize: number;
  readonly direction: "input" | "output";
}

// ---------------------------------------------------------------------------
// Clock domains
// ---------------------------------------------------------------------------

export interface ClockOptions {
  /** Distance between rising edges, in time units. */
  period: number;
  /** Offset of the whole edge train. Default: 0. */
  initialDelay?: number;
}

/** One rising edge as seen by the tasks waiting on it. */
export interface Edge<P> {
  readonly clock: string;
  /** 1-based edge count on this clock. */
  readonly index: number;
  readonly time: number;
  /** Pin values the device sampled at this edge. Read-only. */
  readonly sample: Readonly<P>;
}

/** Anything that can be awaited for the next rising edge. */
export interface EdgeSource<P> {
  risingEdge(): Promise<Edge<P>>;
}

export interface ClockDomain<P> extends EdgeSource<P> {
  readonly name: string;
  readonly period: number;
  /** Number of edges fired so far. */
  edges(): number;
  /** Wait for `count` rising edges and return the last one. */
  cycles(count: number): Promise<Edge<P>>;
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

/** A cooperative task started with `Simulation.fork()`. */
export interface Task<T> {
  readonly name: string;
  readonly done: Promise<T>;
  /** True once `done` has resolved or rejected. */
  settled(): boolean;
}
