import { describe, expect, test } from "vitest";
import { Domain } from "../domain";
import { createReceiveEvent, createTestEvent } from "../test-utils/fixtures/events";
import { domainToRow, eventToRow, rowsToDomains, rowToDomain } from "./mapping";
import type { DomainRow } from "./schema";

describe("rowToDomain", () => {
  test("converts columns and timestamps", () => {
    const domain = rowToDomain({
      rank: 3,
      name: "example.com",
      queryTimeAvg: 12.5,
      queryTimeStdDev: 1.5,
      queryCount: 8,
      timeFirst: new Date(1_700_000_000_000),
      timeLast: new Date(1_700_000_060_500),
    });

    expect(domain.snapshot()).toEqual({
      rank: 3,
      name: "example.com",
      queryTimeAvg: 12.5,
      queryTimeStdDev: 1.5,
      queryCount: 8,
      timeFirst: 1_700_000_000,
      timeLast: 1_700_000_060,
    });
  });

  test("treats NULL columns as zero", () => {
    const domain = rowToDomain({
      rank: 1,
      name: "example.org",
      queryTimeAvg: null,
      queryTimeStdDev: null,
      queryCount: null,
      timeFirst: null,
      timeLast: null,
    });

    expect(domain.queryCount).toBe(0);
    expect(domain.queryTimeAvg).toBe(0);
    expect(domain.timeFirst).toBe(0);
  });

  test("rejects corrupt rows", () => {
    expect(() =>
      rowToDomain({
        rank: 1,
        name: "",
        queryTimeAvg: -1,
        queryTimeStdDev: 0,
        queryCount: 0,
        timeFirst: null,
        timeLast: null,
      }),
    ).toThrow();
  });
});

describe("rowsToDomains", () => {
  const row = (rank: number, name: string): DomainRow => ({
    rank,
    name,
    queryTimeAvg: null,
    queryTimeStdDev: null,
    queryCount: null,
    timeFirst: null,
    timeLast: null,
  });

  test("keeps valid rows when one row is corrupt", () => {
    const domains = rowsToDomains([row(1, "good.example"), row(2, ""), row(3, "also.example")]);

    expect(domains.map((d) => [d.rank, d.name])).toEqual([
      [1, "good.example"],
      [3, "also.example"],
    ]);
  });

  test("returns nothing when every row is corrupt", () => {
    expect(rowsToDomains([row(1, "")])).toEqual([]);
  });
});

describe("domainToRow", () => {
  test("stores unset times as NULL", () => {
    expect(domainToRow(new Domain("example.com"))).toEqual({
      name: "example.com",
      queryTimeAvg: 0,
      queryTimeStdDev: 0,
      queryCount: 0,
      timeFirst: null,
      timeLast: null,
    });
  });

  test("writes current statistics", () => {
    const domain = new Domain("example.com", { rank: 2 });
    domain.update(createReceiveEvent(10, 1_700_000_000));
    domain.update(createReceiveEvent(20, 1_700_000_005));

    expect(domainToRow(domain)).toEqual({
      name: "example.com",
      queryTimeAvg: 15,
      queryTimeStdDev: 5,
      queryCount: 2,
      timeFirst: new Date(1_700_000_000_000),
      timeLast: new Date(1_700_000_005_000),
    });
  });
});

describe("eventToRow", () => {
  test.each([
    ["SendRequest", 0],
    ["ReceiveData", 1],
    ["Timeout", 2],
    ["Error", 3],
  ] as const)("stores %s as type %i", (kind, code) => {
    const row = eventToRow(createTestEvent({ kind }), 9);
    expect(row.type).toBe(code);
  });

  test("keeps target, time, duration and rank", () => {
    const row = eventToRow(
      createTestEvent({ target: "q1w2.example.com", timestamp: 1_700_000_123, durationMs: null }),
      4,
    );

    expect(row).toEqual({
      time: new Date(1_700_000_123_000),
      target: "q1w2.example.com",
      type: 1,
      durationMs: null,
      domainRank: 4,
    });
  });
});
