import { z } from "zod";

/** The only sampling interval a SeriesV1 may declare. */
export const SERIES_INTERVAL_V1 = "minute" as const;

export type SeriesIntervalV1 = typeof SERIES_INTERVAL_V1;

export const CoordinationSignalsV1Schema = z.object({
  burst_score: z.number(), // 0..1
  synchrony_index: z.number(), // 0..1
  duplication_clusters: z.number().int(), // count
});

export const PointV1Schema = z.object({
  interval_start: z.date(),
  volume: z.number().int(), // count
  reshare_ratio: z.number(), // 0..1
  recycled_content_rate: z.number(), // 0..1
  coordination_signals: CoordinationSignalsV1Schema,
});

export const SeriesV1Schema = z.object({
  topic: z.string(),
  generated_at: z.date(),
  interval: z.string(),
  points: z.array(PointV1Schema),
});

export type CoordinationSignalsV1 = z.infer<typeof CoordinationSignalsV1Schema>;
export type PointV1 = z.infer<typeof PointV1Schema>;
export type SeriesV1 = z.infer<typeof SeriesV1Schema>;

/**
 * A timestamp counts as unset when it is not a valid Date or sits at the Unix
 * epoch (the zero value of `new Date(0)`).
 */
export function isUnsetTimestamp(d: Date): boolean {
  const ms = d.getTime();
  return Number.isNaN(ms) || ms === 0;
}
