import { z } from 'zod';

/**
 * 1つのパラメータ値・1つのメトリクスについての箱ひげ図用統計量
 */
export const MetricStatisticsSchema = z.object({
  value: z.number(),
  count: z.number().int(),
  mean: z.number(),
  std: z.number(),
  min: z.number(),
  q1: z.number(),
  median: z.number(),
  q3: z.number(),
  max: z.number(),
});

// summary.json の形: メトリクスごとに、パラメータ値の順で統計量を並べる
export const SampleSummarySchema = z.object({
  parameterName: z.string(),
  metrics: z.record(z.string(), z.array(MetricStatisticsSchema)),
});

export type MetricStatistics = z.infer<typeof MetricStatisticsSchema>;
export type SampleSummary = z.infer<typeof SampleSummarySchema>;
