import { max, mean, median, min, quantileSeq, std } from 'mathjs';
import type { MetricName, SampleSet } from '../schemas/sweep';
import type { MetricStatistics, SampleSummary } from '../schemas/summary';

// mathjs の戻り値は型上 number 以外も含むので実行時に確認する
function toNumber(value: unknown, label: string): number {
  if (typeof value !== 'number') {
    throw new Error(`Expected a number for ${label}, got ${String(value)}`);
  }
  return value;
}

/**
 * サンプル集合の統計分析を担当するサービス
 * 可視化（箱ひげ図）に必要な統計量をパラメータ値ごとに算出する。
 */
export class SampleAnalysisService {
  /**
   * 1つのメトリクスの値列から統計量を計算する
   */
  describe(value: number, samples: number[]): MetricStatistics {
    if (samples.length === 0) {
      throw new Error(`No samples for parameter value ${value}`);
    }

    return {
      value,
      count: samples.length,
      mean: toNumber(mean(samples), 'mean'),
      std: samples.length > 1 ? toNumber(std(samples, 'unbiased'), 'std') : 0,
      min: toNumber(min(samples), 'min'),
      q1: toNumber(quantileSeq(samples, 0.25), 'q1'),
      median: toNumber(median(samples), 'median'),
      q3: toNumber(quantileSeq(samples, 0.75), 'q3'),
      max: toNumber(max(samples), 'max'),
    };
  }

  /**
   * SampleSet 全体を要約する
   * @throws Error 要求したメトリクスが欠けている試行がある場合
   */
  summarize(
    sampleSet: SampleSet,
    parameterName: string,
    metrics: readonly MetricName[],
  ): SampleSummary {
    const summary: SampleSummary = { parameterName, metrics: {} };

    for (const metric of metrics) {
      summary.metrics[metric] = [...sampleSet].map(([value, results]) =>
        this.describe(
          value,
          results.map((result, index) => {
            const sample = result[metric];
            if (sample === undefined) {
              throw new Error(`Sample ${index} for ${parameterName}=${value} lacks metric ${metric}`);
            }
            return sample;
          }),
        ),
      );
    }

    return summary;
  }
}
