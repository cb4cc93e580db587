import { z } from "zod";

/**
 * Kinds of probe observations, in persisted code order (0..3)
 */
export const EVENT_KINDS = ["SendRequest", "ReceiveData", "Timeout", "Error"] as const;

export const EventKindSchema = z.enum(EVENT_KINDS);

export type EventKind = z.infer<typeof EventKindSchema>;

// A single probe observation
export const EventSchema = z.object({
  timestamp: z.number().int().nonnegative(), // seconds since epoch
  target: z.string().min(1),
  kind: EventKindSchema,
  durationMs: z.number().nullable(),
});

export type Event = Readonly<z.infer<typeof EventSchema>>;

/**
 * Outcome of one remote query before it is folded into a domain
 */
export type Reply = Event;

export function createEvent(fields: z.infer<typeof EventSchema>): Event {
  return Object.freeze({ ...fields });
}

export function eventKindToCode(kind: EventKind): number {
  return EVENT_KINDS.indexOf(kind);
}

/**
 * Current time in whole seconds since epoch
 */
export function nowSeconds(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}
