import { logger } from "../lib/logger";
import { Minstd0, xorFold } from "../lib/prng";
import type { DomainRecord, Event } from "../types";
import { foldLatency } from "./statistics";

const TARGET_MIN_LENGTH = 4;
const TARGET_MAX_LENGTH = 10;
const ALPHABET_SIZE = 26;
const CHARSET_SIZE = 36;

/**
 * A zone under continuous latency measurement
 */
export class Domain {
  readonly rank: number;
  readonly name: string;

  private stats: { avg: number; stdDev: number; count: number };
  private first: number;
  private last: number;
  private events: Event[] = [];
  private readonly rng: Minstd0;

  constructor(name: string, record: Partial<Omit<DomainRecord, "name">> = {}) {
    this.name = name;
    this.rank = record.rank ?? 0;
    this.stats = {
      avg: record.queryTimeAvg ?? 0,
      stdDev: record.queryTimeStdDev ?? 0,
      count: record.queryCount ?? 0,
    };
    this.first = record.timeFirst ?? 0;
    this.last = record.timeLast ?? 0;
    this.rng = new Minstd0(xorFold(name));

    logger.debug(
      {
        domain: name,
        rank: this.rank,
        queryTimeAvg: this.stats.avg,
        queryTimeStdDev: this.stats.stdDev,
        queryCount: this.stats.count,
        timeFirst: this.first,
        timeLast: this.last,
      },
      "Domain constructed",
    );
  }

  /**
   * Create a domain from a persisted record
   */
  static fromRecord(record: DomainRecord): Domain {
    return new Domain(record.name, record);
  }

  get queryTimeAvg(): number {
    return this.stats.avg;
  }

  get queryTimeStdDev(): number {
    return this.stats.stdDev;
  }

  get queryCount(): number {
    return this.stats.count;
  }

  get timeFirst(): number {
    return this.first;
  }

  get timeLast(): number {
    return this.last;
  }

  get pendingEvents(): readonly Event[] {
    return this.events;
  }

  /**
   * Enqueue an event and fold it into the statistics if it carries a latency
   * @returns true when the statistics changed
   */
  update(event: Event): boolean {
    this.events.push(event);

    if (event.kind !== "ReceiveData") return false;

    if (!this.first) this.first = event.timestamp;
    this.last = event.timestamp;

    this.stats = foldLatency(this.stats, event.durationMs ?? 0);
    return true;
  }

  /**
   * Random label of 4 to 10 lowercase letters and digits
   */
  generateProbeTarget(): string {
    let label = "";
    for (
      let length = this.rng.uniformInt(TARGET_MIN_LENGTH, TARGET_MAX_LENGTH);
      length > 0;
      length--
    ) {
      const c = this.rng.uniformInt(0, CHARSET_SIZE - 1);
      label +=
        c < ALPHABET_SIZE
          ? String.fromCharCode(97 + c) // a-z
          : String.fromCharCode(48 + c - ALPHABET_SIZE); // 0-9
    }
    return label;
  }

  /**
   * Hand over every pending event and empty the queue
   */
  drainEvents(): Event[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  /**
   * Put undelivered events back in front of anything queued since the drain
   */
  requeueEvents(events: readonly Event[]): void {
    if (events.length === 0) return;
    this.events = [...events, ...this.events];
  }

  snapshot(): DomainRecord {
    return {
      rank: this.rank,
      name: this.name,
      queryTimeAvg: this.stats.avg,
      queryTimeStdDev: this.stats.stdDev,
      queryCount: this.stats.count,
      timeFirst: this.first,
      timeLast: this.last,
    };
  }
}

export type Domains = Domain[];
