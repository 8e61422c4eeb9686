import {
  FifoEnv,
  READ_CLOCK,
  type DeviceDefinition,
  type FifoEvent,
  type FifoPins,
  type HarnessConfigInput,
  type Logger,
} from "@fifo-verify/harness";
import { createAsyncFifo } from "@fifo-verify/fifo-model";

/** A started environment around a fresh model, logging nothing. */
export function startEnv(
  config: HarnessConfigInput = {},
  device: DeviceDefinition<FifoPins> = createAsyncFifo(),
  logger?: Logger,
): FifoEnv {
  const env = FifoEnv.create(device, { logLevel: "silent", ...config }, logger);
  env.start();
  return env;
}

export function transfers(events: readonly FifoEvent[], kind: "write" | "read"): number[] {
  const out: number[] = [];
  for (const event of events) {
    if (event.kind === kind) out.push(event.data);
  }
  return out;
}

/** Largest reference-queue depth reached over `events`. */
export function peakOccupancy(events: readonly FifoEvent[]): number {
  let depth = 0;
  let peak = 0;
  for (const event of events) {
    if (event.kind === "write") depth++;
    else if (event.kind === "read") depth--;
    else depth = 0;
    peak = Math.max(peak, depth);
  }
  return peak;
}

/** Wraps a device so the read accepted `nth` (0-based) returns inverted data. */
export function corruptRead(inner: DeviceDefinition<FifoPins>, nth: number): DeviceDefinition<FifoPins> {
  return {
    name: "CorruptingFifo",
    ports: inner.ports,
    events: inner.events,
    instantiate(signals) {
      const handle = inner.instantiate(signals);
      let reads = 0;
      return {
        tick(event) {
          const accepting =
            event === READ_CLOCK &&
            signals.read("rst_rd") === 0 &&
            signals.read("rd") === 1 &&
            signals.read("empty") === 0;
          handle.tick(event);
          if (accepting && reads++ === nth) {
            signals.write("data_out", signals.read("data_out") ^ 0xff);
          }
        },
        dispose: () => handle.dispose(),
      };
    },
  };
}

/** Wraps a device so `empty` never asserts. */
export function neverEmpty(inner: DeviceDefinition<FifoPins>): DeviceDefinition<FifoPins> {
  return {
    name: "NeverEmptyFifo",
    ports: inner.ports,
    events: inner.events,
    instantiate(signals) {
      const handle = inner.instantiate(signals);
      signals.write("empty", 0);
      return {
        tick(event) {
          handle.tick(event);
          signals.write("empty", 0);
        },
        dispose: () => handle.dispose(),
      };
    },
  };
}
