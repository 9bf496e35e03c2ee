import { z } from 'zod';
import { EvaluationRequestSchema, MetricNameSchema } from './sweep';

/**
 * `sweep_config.toml` の構造
 *
 * キーは TOML 側の表記（スネークケース）のまま受け取る。
 */
export const BinariesConfigSchema = z.object({
  simulator: z.string().min(1).default('build/Release/simulate'),
  reconciler: z.string().min(1).default('build/Release/super_reconciliation'),
  timeout_ms: z.number().int().min(0).default(0), // 0 ならタイムアウトなし
});

export const SweepSectionSchema = z.object({
  sample_size: z.number().int().positive().default(500),
  param_name: z.string().default('length'),
  // 値の表記（"1,5" や "[1:10:2]"）または数値の配列
  param_values: z.union([z.string(), z.array(z.number())]).default('1,5'),
  jobs: z.number().int().min(0).default(0),
  metrics: z.array(MetricNameSchema).nonempty().default(['scoredif']),
});

export const ExperimentConfigSchema = z.object({
  binaries: BinariesConfigSchema.default({}),
  sweep: SweepSectionSchema.default({}),
  defaults: EvaluationRequestSchema.default({}),
});

export type BinariesConfig = z.infer<typeof BinariesConfigSchema>;
export type ExperimentConfig = z.infer<typeof ExperimentConfigSchema>;
