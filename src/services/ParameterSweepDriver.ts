import * as os from 'os';
import { CancellationError, errorMessage } from '../errors';
import {
  EvaluationRequestSchema,
  type EvaluationRequest,
  type EvaluationResult,
  type SampleSet,
  type SweepConfiguration,
  type SweepParameterName,
} from '../schemas/sweep';
import { validateRequest } from '../schemas/validators';
import type { ISampleDispatcher } from './SampleDispatcher';

export interface SweepProgress {
  completed: number;
  total: number;
  parameterName: SweepParameterName;
  value: number;
}

export interface SweepRunOptions {
  /** パラメータ値1つ分の試行が終わるたびに呼ばれる。結果には影響しない */
  onProgress?: (progress: SweepProgress) => void;
  signal?: AbortSignal;
}

interface DispatchUnit {
  value: number;
  request: EvaluationRequest;
}

/**
 * プールの各ワーカーが使う SampleDispatcher を作る
 * workerCount はプール全体のワーカー数。
 */
export type DispatcherFactory = (workerCount: number) => ISampleDispatcher;

/** 0 なら利用可能な並列数 */
export function resolveWorkerCount(workerPoolSize: number): number {
  return workerPoolSize > 0 ? workerPoolSize : Math.max(1, os.availableParallelism());
}

/**
 * パラメータ値の列を走査し、値ごとの試行をワーカープールに割り振る
 *
 * 各ワーカーは1つの値の全試行を終えてから次の値を取る。完了順は不定だが、
 * 結果は値ごとに正しく格納され、設定された値の順で SampleSet にまとめられる。
 * 1つでも失敗したら新しい値は開始せず、実行中の子プロセスを中断し、
 * 全ワーカーの終了を待ってから最初のエラーを投げる。
 * 各ワーカーは createDispatcher で得た SampleDispatcher を専有し、終了時に close する。
 */
export class ParameterSweepDriver {
  constructor(private readonly createDispatcher: DispatcherFactory) {}

  async run(config: SweepConfiguration, options: SweepRunOptions = {}): Promise<SampleSet> {
    const units = this.buildUnits(config);
    const workerCount = Math.min(resolveWorkerCount(config.workerPoolSize), units.length);

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const results = new Array<EvaluationResult[] | undefined>(units.length);
    const failures: unknown[] = [];
    let nextIndex = 0;
    let completed = 0;

    const runUnits = async (dispatcher: ISampleDispatcher) => {
      while (!controller.signal.aborted) {
        const index = nextIndex;
        nextIndex += 1;
        if (index >= units.length) {
          return;
        }

        const unit = units[index];
        try {
          results[index] = await dispatcher.runSamples(
            config.sampleSize,
            config.metrics,
            unit.request,
            controller.signal,
          );
        } catch (error) {
          failures.push(error);
          controller.abort(error);
          return;
        }

        completed += 1;
        this.reportProgress(options.onProgress, {
          completed,
          total: units.length,
          parameterName: config.parameterName,
          value: unit.value,
        });
      }
    };

    const worker = async () => {
      const dispatcher = this.createDispatcher(workerCount);
      try {
        await runUnits(dispatcher);
      } finally {
        await dispatcher.close();
      }
    };

    try {
      await Promise.all(Array.from({ length: workerCount }, worker));
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    const sampleSet: SampleSet = new Map();
    units.forEach((unit, index) => {
      const samples = results[index];
      if (!samples) {
        // 外部からの中断で一部の値が未実行のまま終わった
        throw new CancellationError(
          `Sweep stopped before ${config.parameterName}=${unit.value} was evaluated`,
        );
      }
      sampleSet.set(unit.value, samples);
    });
    return sampleSet;
  }

  /**
   * 値ごとのリクエストを組み立てて検証する。重複した値は最初の1つだけ残す
   */
  private buildUnits(config: SweepConfiguration): DispatchUnit[] {
    const units: DispatchUnit[] = [];
    const seen = new Set<number>();

    for (const value of config.parameterValues) {
      if (seen.has(value)) continue;
      seen.add(value);

      const request = validateRequest(EvaluationRequestSchema, {
        ...config.baseRequest,
        [config.parameterName]: value,
      });
      units.push({ value, request });
    }
    return units;
  }

  private reportProgress(
    onProgress: SweepRunOptions['onProgress'],
    progress: SweepProgress,
  ): void {
    if (!onProgress) return;
    try {
      onProgress(progress);
    } catch (error) {
      console.warn(`Progress callback failed: ${errorMessage(error)}`);
    }
  }
}
