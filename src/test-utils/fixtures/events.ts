/**
 * Event fixtures for testing
 */

import { createEvent, type Event, type EventKind } from "../../types";

export function createTestEvent(overrides: Partial<Event> = {}): Event {
  return createEvent({
    timestamp: 1_700_000_000,
    target: "abcd.example.com",
    kind: "ReceiveData",
    durationMs: 12.5,
    ...overrides,
  });
}

export function createReceiveEvent(durationMs: number, timestamp = 1_700_000_000): Event {
  return createTestEvent({ kind: "ReceiveData", durationMs, timestamp });
}

export function createNonReceiveEvent(kind: Exclude<EventKind, "ReceiveData">, timestamp = 1_700_000_000): Event {
  return createTestEvent({ kind, durationMs: kind === "SendRequest" ? 2000 : null, timestamp });
}
