import { describe, test, expect } from "vitest";
import { buildLayout, createDut, createSignalAccess, snapshotDut } from "./dut.js";
import type { PortInfo } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface MixedPorts {
  a: number;
  b: number;
  wide: number;
  readonly y: number;
}

const ports: Record<string, PortInfo> = {
  clk:  { direction: "input", type: "clock", width: 1 },
  a:    { direction: "input", type: "logic", width: 8 },
  b:    { direction: "input", type: "logic", width: 12 },
  wide: { direction: "input", type: "logic", width: 32 },
  y:    { direction: "output", type: "logic", width: 4 },
};

function setup() {
  const { layout, size } = buildLayout(ports);
  const buffer = new ArrayBuffer(size);
  const dut = createDut<MixedPorts>(buffer, layout, ports);
  const signals = createSignalAccess(buffer, layout);
  return { layout, size, buffer, dut, signals };
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

describe("buildLayout", () => {
  test("skips clocks and packs pins in declaration order", () => {
    const { layout, size } = buildLayout(ports);
    expect(Object.keys(layout)).toEqual(["a", "b", "wide", "y"]);
    expect(layout.a).toEqual({ offset: 0, width: 8, byteSize: 1, direction: "input" });
    expect(layout.b).toEqual({ offset: 1, width: 12, byteSize: 2, direction: "input" });
    expect(layout.wide).toEqual({ offset: 3, width: 32, byteSize: 4, direction: "input" });
    expect(layout.y).toEqual({ offset: 7, width: 4, byteSize: 1, direction: "output" });
    expect(size).toBe(8);
  });

  test("rejects pins wider than 32 bits", () => {
    expect(() =>
      buildLayout({ big: { direction: "input", type: "logic", width: 33 } }),
    ).toThrow("Port 'big' has width 33; supported widths are 1..32");
  });
});

// ---------------------------------------------------------------------------
// Scalar read/write
// ---------------------------------------------------------------------------

describe("createDut scalar ports", () => {
  test("write and read 8-bit input", () => {
    const { dut } = setup();
    dut.a = 42;
    expect(dut.a).toBe(42);
  });

  test("values are masked to the port width", () => {
    const { dut } = setup();
    dut.a = 0x1ff;
    dut.b = 0xabcd;
    expect(dut.a).toBe(0xff);
    expect(dut.b).toBe(0xbcd);
  });

  test("write and read 32-bit input", () => {
    const { dut } = setup();
    dut.wide = 0xdead_beef;
    expect(dut.wide).toBe(0xdead_beef);
  });

  test("clock ports are not exposed", () => {
    const { dut } = setup();
    expect(Object.keys(dut)).toEqual(["a", "b", "wide", "y"]);
  });

  test("writing an output port throws", () => {
    const { dut } = setup();
    expect(() => Reflect.set(dut, "y", 1)).toThrow("Cannot write to output port 'y'");
  });

  test("rejects negative and fractional values", () => {
    const { dut } = setup();
    expect(() => {
      dut.a = -1;
    }).toThrow("Port 'a' takes a non-negative integer, got -1");
    expect(() => {
      dut.a = 1.5;
    }).toThrow("Port 'a' takes a non-negative integer, got 1.5");
  });

  test("outputs written through signal access are visible on the DUT", () => {
    const { dut, signals } = setup();
    signals.write("y", 0x1f);
    expect(dut.y).toBe(0xf);
    dut.a = 7;
    expect(signals.read("a")).toBe(7);
  });

  test("signal access rejects unknown names", () => {
    const { signals } = setup();
    expect(() => signals.read("nope")).toThrow(
      "Unknown signal 'nope'. Available: a, b, wide, y",
    );
  });
});

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

describe("snapshotDut", () => {
  test("captures values at the time of the call", () => {
    const { buffer, layout, dut } = setup();
    dut.a = 1;
    const snap = snapshotDut<MixedPorts>(buffer, layout, ports);
    dut.a = 2;
    expect(snap.a).toBe(1);
    expect(dut.a).toBe(2);
  });

  test("rejects writes", () => {
    const { buffer, layout } = setup();
    const snap = snapshotDut<MixedPorts>(buffer, layout, ports);
    expect(() => Reflect.set(snap, "a", 3)).toThrow("Cannot write to sampled port 'a'");
  });
});
