import { z } from 'zod';

/**
 * 評価できるメトリクス
 * - scoredif: 元の木と再構成木の DL スコア差
 * - duration: 再構成呼び出しのみの所要時間（秒）
 * - distance: 元の木と再構成木の木編集距離
 */
export const MetricNameSchema = z.enum(['scoredif', 'duration', 'distance']);

/**
 * シミュレータに渡すパラメータ名（位置引数の順）
 */
export const SIMULATION_PARAMETERS = [
  'seed',
  'length',
  'event_depth',
  'duplication_probability',
  'loss_probability',
  'loss_length_rate',
] as const;

// synteny_size は length の別名
export const SweepParameterNameSchema = z.preprocess(
  (value) => (value === 'synteny_size' ? 'length' : value),
  z.enum(SIMULATION_PARAMETERS),
);

const probability = z.number().min(0).max(1);

export const EvaluationRequestSchema = z.object({
  seed: z.number().int().min(0).default(0), // 0 ならシミュレータ側でランダムに決める
  length: z.number().int().min(1).default(10),
  event_depth: z.number().int().min(1).default(5),
  duplication_probability: probability.default(0.5),
  loss_probability: probability.default(0.5),
  loss_length_rate: probability.default(0.5),
});

export const EvaluationResultSchema = z.record(MetricNameSchema, z.number());

export const SweepConfigurationSchema = z.object({
  sampleSize: z.number().int().positive(),
  parameterName: SweepParameterNameSchema,
  parameterValues: z.array(z.number()).nonempty(),
  workerPoolSize: z.number().int().min(0).default(0), // 0 なら利用可能な並列数
  metrics: z
    .array(MetricNameSchema)
    .nonempty()
    .refine((metrics) => new Set(metrics).size === metrics.length, 'メトリクスが重複しています'),
  baseRequest: EvaluationRequestSchema,
});

export const SweepStatusSchema = z.enum(['IDLE', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED']);

export const SweepRecordSchema = z.object({
  id: z.string(),
  status: SweepStatusSchema,
  startTime: z.string(),
  endTime: z.string().nullable(),
  parameterName: z.enum(SIMULATION_PARAMETERS),
  parameterValues: z.array(z.number()),
  sampleSize: z.number().int(),
  metrics: z.array(MetricNameSchema),
  completedValues: z.number().int(),
  errorMessage: z.string().nullable(),
});

// results.json の形: { "<値>": [{ "<メトリクス>": 数値 }, ...] }
export const SampleSetJsonSchema = z.record(z.string(), z.array(EvaluationResultSchema));

export const LogMessageSchema = z.object({
  timestamp: z.string(),
  message: z.string(),
});

// ===== イベントペイロード =====
export const SweepProgressEventSchema = z.object({
  sweepId: z.string(),
  completed: z.number().int(),
  total: z.number().int(),
  parameterName: z.enum(SIMULATION_PARAMETERS),
  value: z.number(),
});

export const SweepStatusEventSchema = z.object({
  sweepId: z.string(),
  status: SweepStatusSchema,
  record: SweepRecordSchema,
});

export const SweepLogEventSchema = z.object({
  sweepId: z.string(),
  log: LogMessageSchema,
});

export type MetricName = z.infer<typeof MetricNameSchema>;
export type SweepParameterName = (typeof SIMULATION_PARAMETERS)[number];
export type EvaluationRequest = z.infer<typeof EvaluationRequestSchema>;
export type EvaluationResult = z.infer<typeof EvaluationResultSchema>;
export type SweepConfiguration = z.infer<typeof SweepConfigurationSchema>;
export type SweepStatus = z.infer<typeof SweepStatusSchema>;
export type SweepRecord = z.infer<typeof SweepRecordSchema>;
export type SampleSetJson = z.infer<typeof SampleSetJsonSchema>;
export type LogMessage = z.infer<typeof LogMessageSchema>;
export type SweepProgressEvent = z.infer<typeof SweepProgressEventSchema>;
export type SweepStatusEvent = z.infer<typeof SweepStatusEventSchema>;
export type SweepLogEvent = z.infer<typeof SweepLogEventSchema>;

/**
 * パラメータ値ごとの評価結果
 * 各配列は sampleSize 件で、呼び出し順に並ぶ。
 */
export type SampleSet = Map<number, EvaluationResult[]>;
