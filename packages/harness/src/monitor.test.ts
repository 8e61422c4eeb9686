import { describe, test, expect } from "vitest";
import { FifoMonitor, ReadAlignment, type FifoEvent } from "./monitor.js";
import type { FifoPins } from "./pins.js";
import type { Edge, EdgeSource } from "./types.js";

// ---------------------------------------------------------------------------
// Scripted clocks
// ---------------------------------------------------------------------------

const IDLE: FifoPins = {
  rst_wr: 0,
  wr: 0,
  data_in: 0,
  full: 0,
  rst_rd: 0,
  rd: 0,
  data_out: 0,
  empty: 1,
};

function at(pins: Partial<FifoPins>): FifoPins {
  return { ...IDLE, ...pins };
}

/** Plays `samples` one per edge, then aborts. */
function scripted(
  clock: string,
  samples: FifoPins[],
  abort: AbortController,
): EdgeSource<FifoPins> {
  let index = 0;
  return {
    async risingEdge(): Promise<Edge<FifoPins>> {
      const sample = samples[index] ?? IDLE;
      index++;
      if (index > samples.length) {
        abort.abort();
      }
      return { clock, index, time: index * 10, sample };
    },
  };
}

const idle: EdgeSource<FifoPins> = {
  risingEdge: () => new Promise<Edge<FifoPins>>(() => undefined),
};

async function observeWrites(samples: FifoPins[]): Promise<FifoEvent[]> {
  const events: FifoEvent[] = [];
  const abort = new AbortController();
  const monitor = new FifoMonitor(
    { write: scripted("clk_wr", samples, abort), read: idle },
    { put: (e) => events.push(e) },
  );
  await monitor.observeWrites(abort.signal);
  return events;
}

async function observeReads(samples: FifoPins[]): Promise<FifoEvent[]> {
  const events: FifoEvent[] = [];
  const abort = new AbortController();
  const monitor = new FifoMonitor(
    { write: idle, read: scripted("clk_rd", samples, abort) },
    { put: (e) => events.push(e) },
  );
  await monitor.observeReads(abort.signal);
  return events;
}

// ---------------------------------------------------------------------------
// Write side
// ---------------------------------------------------------------------------

describe("FifoMonitor writes", () => {
  test("records a write on the edge that accepts it", async () => {
    const events = await observeWrites([
      at({ wr: 1, data_in: 0x11 }),
      at({ wr: 0, data_in: 0x22 }),
      at({ wr: 1, data_in: 0x33, full: 1 }),
      at({ wr: 1, data_in: 0x44 }),
    ]);

    expect(events).toEqual([
      { kind: "write", data: 0x11, edge: 1 },
      { kind: "write", data: 0x44, edge: 4 },
    ]);
  });

  test("emits one reset marker per reset pulse and ignores strobes during reset", async () => {
    const events = await observeWrites([
      at({ rst_wr: 1, wr: 1, data_in: 5 }),
      at({ rst_wr: 1 }),
      at({ wr: 1, data_in: 6 }),
      at({ rst_wr: 1 }),
    ]);

    expect(events).toEqual([
      { kind: "reset", domain: "write", edge: 1 },
      { kind: "write", data: 6, edge: 3 },
      { kind: "reset", domain: "write", edge: 4 },
    ]);
  });

  test("returns immediately when the signal is already aborted", async () => {
    const abort = new AbortController();
    abort.abort();
    const events: FifoEvent[] = [];
    const monitor = new FifoMonitor(
      { write: idle, read: idle },
      { put: (e) => events.push(e) },
    );
    await monitor.observeWrites(abort.signal);
    await monitor.observeReads(abort.signal);
    expect(events).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Read side
// ---------------------------------------------------------------------------

describe("FifoMonitor reads", () => {
  test("data is taken from the edge after the request", async () => {
    const events = await observeReads([
      at({ rd: 1, empty: 0, data_out: 0xee }),
      at({ empty: 0, data_out: 0x5a }),
    ]);

    expect(events).toEqual([{ kind: "read", data: 0x5a, edge: 2 }]);
  });

  test("back-to-back reads complete on consecutive edges", async () => {
    const events = await observeReads([
      at({ rd: 1, empty: 0 }),
      at({ rd: 1, empty: 0, data_out: 1 }),
      at({ rd: 0, empty: 1, data_out: 2 }),
      at({ data_out: 3 }),
    ]);

    expect(events).toEqual([
      { kind: "read", data: 1, edge: 2 },
      { kind: "read", data: 2, edge: 3 },
    ]);
  });

  test("a request while empty is not a read", async () => {
    const events = await observeReads([
      at({ rd: 1, empty: 1 }),
      at({ data_out: 9 }),
    ]);
    expect(events).toEqual([]);
  });

  test("reset drops a request awaiting its data", async () => {
    const events = await observeReads([
      at({ rd: 1, empty: 0 }),
      at({ rst_rd: 1, data_out: 7 }),
      at({ empty: 0, data_out: 8 }),
    ]);

    expect(events).toEqual([{ kind: "reset", domain: "read", edge: 2 }]);
  });
});

describe("ReadAlignment", () => {
  test("pending reflects the previous edge", () => {
    const align = new ReadAlignment();
    expect(align.pending).toBe(false);

    expect(align.advance(at({ rd: 1, empty: 0 }))).toBeUndefined();
    expect(align.pending).toBe(true);

    expect(align.advance(at({ data_out: 0x33 }))).toBe(0x33);
    expect(align.pending).toBe(false);
  });

  test("reset clears a pending request", () => {
    const align = new ReadAlignment();
    align.advance(at({ rd: 1, empty: 0 }));
    align.reset();
    expect(align.pending).toBe(false);
    expect(align.advance(at({ data_out: 1 }))).toBeUndefined();
  });
});
