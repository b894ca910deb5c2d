/**
 * Zod schemas for reference-rate API responses.
 */

import { z } from "zod";

/** `{ "USD": "United States Dollar", ... }` */
export const CurrenciesSchema = z.record(z.string());

export const TimeSeriesSchema = z.object({
  base: z.string(),
  /** date → quote currency → rate */
  rates: z.record(z.record(z.number())),
});

export type TimeSeries = z.infer<typeof TimeSeriesSchema>;

export const LatestSchema = z.object({
  base: z.string(),
  date: z.string(),
  rates: z.record(z.number()),
});

export type Latest = z.infer<typeof LatestSchema>;
