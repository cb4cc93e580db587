import { describe, expect, test } from "vitest";
import { Minstd0 } from "../lib/prng";
import {
  createNonReceiveEvent,
  createReceiveEvent,
  createTestEvent,
} from "../test-utils/fixtures/events";
import { Domain } from "./domain";

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function populationStdDev(values: number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

describe("Domain", () => {
  describe("construction", () => {
    test("starts empty from a bare name", () => {
      const domain = new Domain("example.com");

      expect(domain.rank).toBe(0);
      expect(domain.name).toBe("example.com");
      expect(domain.queryTimeAvg).toBe(0);
      expect(domain.queryTimeStdDev).toBe(0);
      expect(domain.queryCount).toBe(0);
      expect(domain.timeFirst).toBe(0);
      expect(domain.timeLast).toBe(0);
      expect(domain.pendingEvents).toEqual([]);
    });

    test("restores persisted statistics", () => {
      const domain = Domain.fromRecord({
        rank: 7,
        name: "example.org",
        queryTimeAvg: 15,
        queryTimeStdDev: 5,
        queryCount: 2,
        timeFirst: 100,
        timeLast: 200,
      });

      expect(domain.snapshot()).toEqual({
        rank: 7,
        name: "example.org",
        queryTimeAvg: 15,
        queryTimeStdDev: 5,
        queryCount: 2,
        timeFirst: 100,
        timeLast: 200,
      });
    });
  });

  describe("update", () => {
    test("tracks mean and deviation for 10, 20, 30", () => {
      const domain = new Domain("example.com");

      expect(domain.update(createReceiveEvent(10))).toBe(true);
      expect(domain.queryTimeAvg).toBe(10);
      expect(domain.queryTimeStdDev).toBe(0);

      domain.update(createReceiveEvent(20));
      expect(domain.queryTimeAvg).toBe(15);
      expect(domain.queryTimeStdDev).toBe(5);

      domain.update(createReceiveEvent(30));
      expect(domain.queryTimeAvg).toBe(20);
      expect(domain.queryTimeStdDev).toBeCloseTo(8.165, 3);
      expect(domain.queryCount).toBe(3);
    });

    test("matches full recomputation after every step", () => {
      const rng = new Minstd0(1234);
      const domain = new Domain("example.net");
      const history: number[] = [];

      for (let i = 0; i < 200; i++) {
        const duration = rng.uniformInt(1, 5000) / 10;
        history.push(duration);
        domain.update(createReceiveEvent(duration));

        expect(domain.queryCount).toBe(history.length);
        expect(domain.queryTimeAvg).toBeCloseTo(mean(history), 6);
        expect(domain.queryTimeStdDev).toBeCloseTo(populationStdDev(history), 6);
      }
    });

    test.each(["SendRequest", "Timeout", "Error"] as const)(
      "%s events are queued without touching statistics",
      (kind) => {
        const domain = new Domain("example.com");
        domain.update(createReceiveEvent(10, 100));
        const before = domain.snapshot();

        const event = createNonReceiveEvent(kind, 500);
        expect(domain.update(event)).toBe(false);

        expect(domain.snapshot()).toEqual(before);
        expect(domain.pendingEvents).toHaveLength(2);
        expect(domain.pendingEvents[1]).toBe(event);
      },
    );

    test("sets timeFirst once and timeLast on every receive", () => {
      const domain = new Domain("example.com");

      domain.update(createNonReceiveEvent("SendRequest", 50));
      expect(domain.timeFirst).toBe(0);

      domain.update(createReceiveEvent(10, 100));
      expect(domain.timeFirst).toBe(100);
      expect(domain.timeLast).toBe(100);

      domain.update(createReceiveEvent(10, 150));
      domain.update(createReceiveEvent(10, 175));
      expect(domain.timeFirst).toBe(100);
      expect(domain.timeLast).toBe(175);
    });

    test("keeps a persisted timeFirst", () => {
      const domain = new Domain("example.com", {
        rank: 1,
        queryTimeAvg: 10,
        queryCount: 1,
        timeFirst: 100,
        timeLast: 100,
      });

      domain.update(createReceiveEvent(20, 300));

      expect(domain.timeFirst).toBe(100);
      expect(domain.timeLast).toBe(300);
      expect(domain.queryTimeAvg).toBe(15);
    });
  });

  describe("generateProbeTarget", () => {
    test("yields 4 to 10 lowercase letters and digits", () => {
      const domain = new Domain("example.com");

      for (let i = 0; i < 500; i++) {
        expect(domain.generateProbeTarget()).toMatch(/^[a-z0-9]{4,10}$/);
      }
    });

    test("is reproducible for the same name", () => {
      const a = new Domain("example.com");
      const b = new Domain("example.com");

      const first = Array.from({ length: 20 }, () => a.generateProbeTarget());
      const second = Array.from({ length: 20 }, () => b.generateProbeTarget());

      expect(first).toEqual(second);
    });

    test("matches the recorded sequence for example.com", () => {
      const domain = new Domain("example.com");

      expect(domain.generateProbeTarget()).toBe("eq52");
      expect(domain.generateProbeTarget()).toBe("4rrq8jo");
      expect(domain.generateProbeTarget()).toBe("dxgk8v");
    });

    test("does not depend on persisted statistics", () => {
      const fresh = new Domain("test.org");
      const loaded = new Domain("test.org", { rank: 3, queryCount: 9, queryTimeAvg: 4 });

      expect(fresh.generateProbeTarget()).toBe(loaded.generateProbeTarget());
      expect(fresh.generateProbeTarget()).toBe("d24ylk4");
    });
  });

  describe("pending events", () => {
    test("drainEvents returns events in order and empties the queue", () => {
      const domain = new Domain("example.com");
      const events = [
        createTestEvent({ target: "a.example.com" }),
        createTestEvent({ target: "b.example.com", kind: "SendRequest" }),
        createTestEvent({ target: "c.example.com" }),
      ];
      for (const event of events) domain.update(event);

      expect(domain.drainEvents()).toEqual(events);
      expect(domain.pendingEvents).toEqual([]);
      expect(domain.drainEvents()).toEqual([]);
    });

    test("requeueEvents puts events back ahead of newer ones", () => {
      const domain = new Domain("example.com");
      const older = createTestEvent({ target: "old.example.com" });
      const newer = createTestEvent({ target: "new.example.com" });

      domain.update(older);
      const drained = domain.drainEvents();
      domain.update(newer);
      domain.requeueEvents(drained);

      expect(domain.pendingEvents).toEqual([older, newer]);
    });
  });
});
