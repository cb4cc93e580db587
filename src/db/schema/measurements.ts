import { bigint, double, index, int, mysqlTable, timestamp, varchar } from "drizzle-orm/mysql-core";
import { domains } from "./domains";

export const measurements = mysqlTable(
  "measurement",
  {
    id: bigint("id", { mode: "number" }).autoincrement().primaryKey(),
    time: timestamp("time", { mode: "date" }).notNull(),
    target: varchar("target", { length: 255 }).notNull(),
    type: int("type").notNull(), // event kind code
    durationMs: double("duration_ms"),
    domainRank: bigint("domain_rank", { mode: "number" })
      .notNull()
      .references(() => domains.rank, { onDelete: "cascade", onUpdate: "cascade" }),
  },
  (table) => ({
    domainRankIdx: index("domain_rank_idx").on(table.domainRank),
  }),
);

export type MeasurementRow = typeof measurements.$inferSelect;
export type NewMeasurementRow = typeof measurements.$inferInsert;
