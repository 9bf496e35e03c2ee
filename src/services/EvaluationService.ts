import { performance } from 'perf_hooks';
import { InvariantError, ParseError, ProtocolError } from '../errors';
import type { IProcessRunner } from '../infrastructure/ProcessManager';
import { decodeTree, encodeTree } from '../infrastructure/TreeCodec';
import {
  SIMULATION_PARAMETERS,
  type EvaluationRequest,
  type EvaluationResult,
  type MetricName,
} from '../schemas/sweep';
import type { EventTree } from '../types/tree';
import { computeDLScore, computeEditDistance } from './treeMetrics';

export interface SimulationResult {
  original: EventTree;
  erased: EventTree;
}

/**
 * 1試行分の評価を行うプロトコル
 * 外部バイナリを使わない実装（テスト用スタブなど）と差し替えられる。
 */
export interface IEvaluationProtocol {
  evaluate(
    metrics: readonly MetricName[],
    request: EvaluationRequest,
    signal?: AbortSignal,
  ): Promise<EvaluationResult>;
}

export interface EvaluationServiceOptions {
  simulatorPath: string;
  reconcilerPath: string;
  /** 各外部プロセスの制限時間。0 ならなし */
  timeoutMs: number;
}

function decodeOutputLine(line: string, label: string): EventTree {
  try {
    return decodeTree(line);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ProtocolError(`${label} is not a valid NHX tree: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/** 末尾の改行1つを除いて行に分割する */
function splitLines(text: string): string[] {
  return text.replace(/\r?\n$/, '').split(/\r?\n/);
}

/**
 * シミュレータと再構成プログラムを組み合わせて試行を評価するサービス
 */
export class EvaluationService implements IEvaluationProtocol {
  constructor(
    private readonly processRunner: IProcessRunner,
    private readonly options: EvaluationServiceOptions,
  ) {}

  /**
   * 進化をシミュレートし、元の木と情報を消去した木の組を得る
   *
   * 引数は seed, length, event_depth, duplication_probability,
   * loss_probability, loss_length_rate の順で渡す。
   */
  async simulate(request: EvaluationRequest, signal?: AbortSignal): Promise<SimulationResult> {
    const args = SIMULATION_PARAMETERS.map((name) => String(request[name]));
    const { stdout } = await this.processRunner.run(this.options.simulatorPath, args, '', {
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    // 3行目はメタデータ（あれば）
    const lines = splitLines(stdout);
    if (lines.length < 2 || lines.length > 3) {
      throw new ProtocolError(
        `Simulator output must contain 2 or 3 lines, got ${lines.length}:\n${stdout}`,
      );
    }

    return {
      original: decodeOutputLine(lines[0], 'Simulated original tree'),
      erased: decodeOutputLine(lines[1], 'Simulated erased tree'),
    };
  }

  /**
   * 消去済みの木を再構成する
   */
  async reconcile(erased: EventTree, signal?: AbortSignal): Promise<EventTree> {
    const { stdout } = await this.processRunner.run(
      this.options.reconcilerPath,
      [],
      encodeTree(erased),
      { timeoutMs: this.options.timeoutMs, signal },
    );

    const lines = splitLines(stdout);
    if (lines.length !== 1 || lines[0].trim() === '') {
      throw new ProtocolError(
        `Reconciler output must contain exactly one tree line, got ${lines.length}:\n${stdout}`,
      );
    }
    return decodeOutputLine(lines[0], 'Reconciled tree');
  }

  /**
   * 1回の試行を行い、要求されたメトリクスを計算する
   * duration は reconcile の呼び出しのみを計測する（シミュレーション時間は含めない）。
   */
  async evaluate(
    metrics: readonly MetricName[],
    request: EvaluationRequest,
    signal?: AbortSignal,
  ): Promise<EvaluationResult> {
    const { original, erased } = await this.simulate(request, signal);

    const start = performance.now();
    const reconciled = await this.reconcile(erased, signal);
    const duration = (performance.now() - start) / 1000;

    return computeMetrics(metrics, original, reconciled, duration);
  }
}

/**
 * 元の木と再構成木からメトリクスを計算する
 * @throws InvariantError 再構成木の DL スコアが元の木より大きい場合
 */
export function computeMetrics(
  metrics: readonly MetricName[],
  original: EventTree,
  reconciled: EventTree,
  duration: number,
): EvaluationResult {
  const result: EvaluationResult = {};

  for (const metric of metrics) {
    switch (metric) {
      case 'scoredif': {
        const originalScore = computeDLScore(original);
        const reconciledScore = computeDLScore(reconciled);

        if (originalScore < reconciledScore) {
          throw new InvariantError(
            `Unexpected non-parsimonious reconciliation: original cost ${originalScore} < reconciled cost ${reconciledScore}`,
          );
        }
        result.scoredif = originalScore - reconciledScore;
        break;
      }
      case 'duration':
        result.duration = duration;
        break;
      case 'distance':
        result.distance = computeEditDistance(original, reconciled);
        break;
    }
  }

  return result;
}
