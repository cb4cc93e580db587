import { Domain } from "../domain";
import { errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { DomainRecordSchema, type Event, eventKindToCode } from "../types";
import type { DomainRow, NewDomainRow, NewMeasurementRow } from "./schema";

function toSeconds(date: Date | null): number {
  return date ? Math.floor(date.getTime() / 1000) : 0;
}

// 0 means "never"
function toDate(seconds: number): Date | null {
  return seconds > 0 ? new Date(seconds * 1000) : null;
}

export function rowToDomain(row: DomainRow): Domain {
  const record = DomainRecordSchema.parse({
    rank: row.rank,
    name: row.name,
    queryTimeAvg: row.queryTimeAvg ?? 0,
    queryTimeStdDev: row.queryTimeStdDev ?? 0,
    queryCount: row.queryCount ?? 0,
    timeFirst: toSeconds(row.timeFirst),
    timeLast: toSeconds(row.timeLast),
  });
  return Domain.fromRecord(record);
}

/**
 * Map stored rows to domains, skipping rows that fail validation
 */
export function rowsToDomains(rows: readonly DomainRow[]): Domain[] {
  const domains: Domain[] = [];
  for (const row of rows) {
    try {
      domains.push(rowToDomain(row));
    } catch (error) {
      logger.warn(
        { rank: row.rank, name: row.name, error: errorMessage(error) },
        "Skipping invalid domain row",
      );
    }
  }
  return domains;
}

/**
 * Statistics columns of a domain; the rank is assigned by the database
 */
export function domainToRow(domain: Domain): Omit<NewDomainRow, "rank"> {
  return {
    name: domain.name,
    queryTimeAvg: domain.queryTimeAvg,
    queryTimeStdDev: domain.queryTimeStdDev,
    queryCount: domain.queryCount,
    timeFirst: toDate(domain.timeFirst),
    timeLast: toDate(domain.timeLast),
  };
}

export function eventToRow(event: Event, domainRank: number): NewMeasurementRow {
  return {
    time: new Date(event.timestamp * 1000),
    target: event.target,
    type: eventKindToCode(event.kind),
    durationMs: event.durationMs,
    domainRank,
  };
}
