import { z } from 'zod';
import { EvaluationRequestSchema, EvaluationResultSchema, MetricNameSchema } from './sweep';

/**
 * ワーカースレッドで評価を行うときに渡す設定（workerData）
 */
export const SampleWorkerOptionsSchema = z.object({
  simulatorPath: z.string().min(1),
  reconcilerPath: z.string().min(1),
  timeoutMs: z.number().int().min(0),
});

// スレッド境界を越えるエラー。独自プロパティは構造化複製で失われるので明示的に持つ
const ErrorFieldsSchema = z.object({
  name: z.string(),
  message: z.string(),
  diagnostic: z.string().optional(),
  exitCode: z.number().int().nullable().optional(),
  executable: z.string().optional(),
  timeoutMs: z.number().optional(),
  offset: z.number().int().optional(),
});

export const SerializedErrorSchema = ErrorFieldsSchema.extend({
  cause: ErrorFieldsSchema.optional(),
});

// ===== メインスレッド → ワーカー =====
export const WorkerRequestSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('run'),
    sampleSize: z.number().int().positive(),
    metrics: z.array(MetricNameSchema),
    request: EvaluationRequestSchema,
  }),
  z.object({ type: z.literal('cancel') }),
]);

// ===== ワーカー → メインスレッド =====
export const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), results: z.array(EvaluationResultSchema) }),
  z.object({ type: z.literal('error'), error: SerializedErrorSchema }),
]);

export type SampleWorkerOptions = z.infer<typeof SampleWorkerOptionsSchema>;
export type SerializedErrorFields = z.infer<typeof ErrorFieldsSchema>;
export type SerializedError = z.infer<typeof SerializedErrorSchema>;
export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;
export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
