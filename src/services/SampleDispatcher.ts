import { CancellationError } from '../errors';
import type { EvaluationRequest, EvaluationResult, MetricName } from '../schemas/sweep';
import type { IEvaluationProtocol } from './EvaluationService';

/**
 * 1つのパラメータ値分の試行を実行する単位
 * プロセス内で動くものとワーカースレッドで動くものがある。
 */
export interface ISampleDispatcher {
  runSamples(
    sampleSize: number,
    metrics: readonly MetricName[],
    request: EvaluationRequest,
    signal?: AbortSignal,
  ): Promise<EvaluationResult[]>;

  /** 使い終わったら呼ぶ。以後 runSamples は呼ばない */
  close(): Promise<void>;
}

/**
 * 1つのパラメータ値について sampleSize 回の試行を順に実行する
 *
 * 結果は呼び出し順に並ぶ。どれか1つでも失敗したら残りは実行せず、
 * それまでの結果も返さずにエラーを伝播する。
 */
export class SampleDispatcher implements ISampleDispatcher {
  constructor(private readonly protocol: IEvaluationProtocol) {}

  async runSamples(
    sampleSize: number,
    metrics: readonly MetricName[],
    request: EvaluationRequest,
    signal?: AbortSignal,
  ): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];

    for (let i = 0; i < sampleSize; i++) {
      if (signal?.aborted) {
        throw new CancellationError(`Sampling cancelled after ${i} of ${sampleSize} trials`);
      }
      results.push(await this.protocol.evaluate(metrics, request, signal));
    }

    return results;
  }

  // 同じスレッドで動くので解放するものはない
  async close(): Promise<void> {}
}
