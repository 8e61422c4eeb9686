/**
 * DUT (Device Under Test) accessor factory.
 *
 * Builds a plain object with Object.defineProperty getter/setters that
 * read and write directly via DataView on the simulation buffer.
 * No Proxy is used; every pin becomes a concrete property.
 */

import type { PortInfo, SignalAccess, SignalLayout } from "./types.js";

// ---------------------------------------------------------------------------
// DataView helpers
// ---------------------------------------------------------------------------

/** Read an unsigned integer of the given byte-size (little-endian), masked to width. */
function readNumber(view: DataView, offset: number, width: number): number {
  if (width <= 8) {
    const raw = view.getUint8(offset);
    return width === 8 ? raw : raw & ((1 << width) - 1);
  }
  if (width <= 16) {
    const raw = view.getUint16(offset, true);
    return width === 16 ? raw : raw & ((1 << width) - 1);
  }
  const raw = view.getUint32(offset, true);
  return width === 32 ? raw : (raw & ((1 << width) - 1)) >>> 0;
}

/** Write an unsigned integer of the given byte-size (little-endian). */
function writeNumber(
  view: DataView,
  offset: number,
  width: number,
  value: number,
): void {
  if (width <= 8) {
    view.setUint8(offset, value & ((1 << width) - 1));
  } else if (width <= 16) {
    view.setUint16(offset, value & ((1 << width) - 1), true);
  } else if (width < 32) {
    view.setUint32(offset, (value & ((1 << width) - 1)) >>> 0, true);
  } else {
    view.setUint32(offset, value >>> 0, true);
  }
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/** Widest pin the buffer stores as a plain number. */
export const MAX_PIN_WIDTH = 32;

/**
 * Assign every non-clock pin a byte range in declaration order.
 * Returns the layout and the total buffer size.
 */
export function buildLayout(ports: Record<string, PortInfo>): {
  layout: Record<string, SignalLayout>;
  size: number;
} {
  const layout: Record<string, SignalLayout> = {};
  let offset = 0;
  for (const [name, port] of Object.entries(ports)) {
    if (port.type === "clock") continue;
    if (!Number.isInteger(port.width) || port.width < 1 || port.width > MAX_PIN_WIDTH) {
      throw new Error(
        `Port '${name}' has width ${port.width}; supported widths are 1..${MAX_PIN_WIDTH}`,
      );
    }
    const byteSize = port.width <= 8 ? 1 : port.width <= 16 ? 2 : 4;
    layout[name] = { offset, width: port.width, byteSize, direction: port.direction };
    offset += byteSize;
  }
  return { layout, size: offset };
}

/** Raw access used by device models; no direction checks. */
export function createSignalAccess(
  buffer: ArrayBuffer,
  layout: Record<string, SignalLayout>,
): SignalAccess {
  const view = new DataView(buffer);
  const lookup = (name: string): SignalLayout => {
    const sig = layout[name];
    if (!sig) {
      throw new Error(
        `Unknown signal '${name}'. Available: ${Object.keys(layout).join(", ")}`,
      );
    }
    return sig;
  };
  return {
    read(name) {
      const sig = lookup(name);
      return readNumber(view, sig.offset, sig.width);
    },
    write(name, value) {
      const sig = lookup(name);
      writeNumber(view, sig.offset, sig.width, value);
    },
  };
}

// ---------------------------------------------------------------------------
// DUT factory
// ---------------------------------------------------------------------------

export interface DutOptions {
  /** Reject every write. Used for edge samples. */
  frozen?: boolean;
}

/**
 * Create a DUT accessor object with defineProperty-based getters/setters.
 *
 * @param buffer    Simulation buffer (or a copy of it, for samples)
 * @param layout    Per-signal byte layout within the buffer
 * @param portDefs  Port metadata from the DeviceDefinition
 */
export function createDut<P>(
  buffer: ArrayBuffer,
  layout: Record<string, SignalLayout>,
  portDefs: Record<string, PortInfo>,
  options?: DutOptions,
): P {
  const view = new DataView(buffer);
  const obj: object = Object.create(null);
  const frozen = options?.frozen ?? false;

  for (const [name, port] of Object.entries(portDefs)) {
    // Clock ports are driven by addClock()
    if (port.type === "clock") continue;

    const sig = layout[name];
    if (!sig) continue;

    defineSignalProperty(obj, name, view, sig, frozen);
  }

  return obj as P;
}

/**
 * Copy the current pin values into a frozen accessor. Later writes to the
 * live buffer do not show through.
 */
export function snapshotDut<P>(
  buffer: ArrayBuffer,
  layout: Record<string, SignalLayout>,
  portDefs: Record<string, PortInfo>,
): Readonly<P> {
  return createDut<P>(buffer.slice(0), layout, portDefs, { frozen: true });
}

/** Define a single scalar signal property on the target object. */
function defineSignalProperty(
  target: object,
  name: string,
  view: DataView,
  sig: SignalLayout,
  frozen: boolean,
): void {
  const isOutput = sig.direction === "output";

  Object.defineProperty(target, name, {
    get(): number {
      return readNumber(view, sig.offset, sig.width);
    },

    set(value: number) {
      if (frozen) {
        throw new Error(`Cannot write to sampled port '${name}'`);
      }
      if (isOutput) {
        throw new Error(`Cannot write to output port '${name}'`);
      }
      if (!Number.isInteger(value) || value < 0) {
        throw new Error(`Port '${name}' takes a non-negative integer, got ${value}`);
      }
      writeNumber(view, sig.offset, sig.width, value);
    },

    enumerable: true,
    configurable: false,
  });
}
