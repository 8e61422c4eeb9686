import { describe, test, expect } from "vitest";
import { Scoreboard } from "./scoreboard.js";
import { Channel } from "./channel.js";
import { ProtocolViolationError, ScoreboardError } from "./errors.js";
import type { FifoEvent } from "./monitor.js";

const w = (data: number, edge = 1): FifoEvent => ({ kind: "write", data, edge });
const r = (data: number, edge = 1): FifoEvent => ({ kind: "read", data, edge });

describe("Scoreboard", () => {
  test("reads matching writes in order pass", () => {
    const sb = new Scoreboard();
    for (const e of [w(0x11), w(0x22), r(0x11), w(0x33), r(0x22), r(0x33)]) {
      sb.process(e);
    }

    expect(sb.report()).toEqual({
      passed: true,
      writes: 3,
      reads: 3,
      pending: 0,
      mismatches: [],
    });
    expect(() => sb.assertPassed()).not.toThrow();
  });

  test("a mismatch is recorded and checking continues", () => {
    const sb = new Scoreboard();
    for (const e of [w(0x10), w(0x20), w(0x30), r(0x10), r(0x99), r(0x30)]) {
      sb.process(e);
    }

    const report = sb.report();
    expect(report.passed).toBe(false);
    expect(report.reads).toBe(3);
    expect(report.mismatches).toEqual([{ index: 1, expected: 0x20, actual: 0x99 }]);
    expect(() => sb.assertPassed()).toThrow(
      new ScoreboardError([{ index: 1, expected: 0x20, actual: 0x99 }]),
    );
  });

  test("assertPassed lists every mismatch", () => {
    const sb = new Scoreboard();
    for (const e of [w(1), w(2), r(3), r(4)]) {
      sb.process(e);
    }
    expect(() => sb.assertPassed()).toThrow(
      "2 data mismatch(es):\n  read #0: expected 0x01, got 0x03\n  read #1: expected 0x02, got 0x04",
    );
  });

  test("a read with nothing pending is a protocol violation", () => {
    const sb = new Scoreboard();
    sb.process(w(1));
    sb.process(r(1));

    let caught: unknown;
    try {
      sb.process(r(0x7f));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProtocolViolationError);
    if (caught instanceof ProtocolViolationError) {
      expect(caught.index).toBe(1);
      expect(caught.data).toBe(0x7f);
      expect(caught.message).toBe("read #1 returned 0x7f but no write is pending");
    }
  });

  test("a reset marker clears the reference queue", () => {
    const sb = new Scoreboard();
    sb.process(w(0x60));
    sb.process(w(0x61));
    expect(sb.pending()).toEqual([0x60, 0x61]);

    sb.process({ kind: "reset", domain: "write", edge: 3 });
    expect(sb.pending()).toEqual([]);

    sb.process(w(0xcc));
    sb.process(r(0xcc));
    expect(sb.report()).toEqual({
      passed: true,
      writes: 3,
      reads: 1,
      pending: 0,
      mismatches: [],
    });
  });

  test("history keeps every event in arrival order", () => {
    const sb = new Scoreboard();
    const events = [w(5), { kind: "reset", domain: "read", edge: 2 } as const, w(6)];
    for (const e of events) {
      sb.process(e);
    }
    expect(sb.history()).toEqual(events);
  });

  test("run() consumes a channel until it closes", async () => {
    const sb = new Scoreboard();
    const events = new Channel<FifoEvent>();
    const done = sb.run(events);

    events.put(w(0xa1));
    events.put(w(0xa2));
    events.put(r(0xa1));
    events.close();
    await done;

    expect(sb.pending()).toEqual([0xa2]);
    expect(sb.report().writes).toBe(2);
  });

  test("run() rejects on a protocol violation", async () => {
    const sb = new Scoreboard();
    const events = new Channel<FifoEvent>();
    events.put(r(0x01));
    events.close();

    await expect(sb.run(events)).rejects.toThrow(ProtocolViolationError);
  });
});
