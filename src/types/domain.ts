import { z } from "zod";

// Persisted statistics of one tracked domain
export const DomainRecordSchema = z.object({
  rank: z.number().int().nonnegative(),
  name: z.string().min(1).max(255),
  queryTimeAvg: z.number().nonnegative(),
  queryTimeStdDev: z.number().nonnegative(),
  queryCount: z.number().int().nonnegative(),
  timeFirst: z.number().int().nonnegative(),
  timeLast: z.number().int().nonnegative(),
});

export type DomainRecord = z.infer<typeof DomainRecordSchema>;
