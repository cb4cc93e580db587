import { bigint, double, mysqlTable, timestamp, varchar } from "drizzle-orm/mysql-core";

export const domains = mysqlTable("domain", {
  rank: bigint("rank", { mode: "number" }).autoincrement().primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  queryTimeAvg: double("query_time_avg"),
  queryTimeStdDev: double("query_time_stddev"),
  queryCount: bigint("query_count", { mode: "number" }),
  timeFirst: timestamp("time_first", { mode: "date" }),
  timeLast: timestamp("time_last", { mode: "date" }),
});

export type DomainRow = typeof domains.$inferSelect;
export type NewDomainRow = typeof domains.$inferInsert;
