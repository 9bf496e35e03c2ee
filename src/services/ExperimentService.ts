import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { CancellationError, errorMessage } from '../errors';
import type { ISweepResultRepository } from '../repositories/ISweepResultRepository';
import { toSampleSetJson } from '../repositories/SweepResultRepository';
import type {
  LogMessage,
  SampleSet,
  SampleSetJson,
  SweepConfiguration,
  SweepProgressEvent,
  SweepRecord,
  SweepStatus,
  SweepStatusEvent,
} from '../schemas/sweep';
import type { SampleSummary } from '../schemas/summary';
import { resolveWorkerCount, type ParameterSweepDriver, type SweepProgress } from './ParameterSweepDriver';
import { SampleAnalysisService } from './SampleAnalysisService';

export interface SweepDetails {
  record: SweepRecord;
  summary: SampleSummary | null;
  results: SampleSetJson | null;
}

export interface SweepOutcome {
  record: SweepRecord;
  sampleSet: SampleSet;
  summary: SampleSummary;
}

/**
 * パラメータスイープ実行のオーケストレーションを行うサービスクラス。
 * 実行情報と結果の永続化、ログと進捗イベントの発行を担当する。
 *
 * 発行するイベント: `sweep:log`, `sweep:status`, `sweep:progress`
 */
export class ExperimentService extends EventEmitter {
  constructor(
    private readonly repository: ISweepResultRepository,
    private readonly driver: ParameterSweepDriver,
    private readonly analysisService: SampleAnalysisService = new SampleAnalysisService(),
  ) {
    super();
  }

  /**
   * スイープを実行し、完了まで待つ
   * 失敗した場合は記録を FAILED（中断なら CANCELLED）にして、元のエラーをそのまま投げる。
   */
  async runSweep(
    config: SweepConfiguration,
    options: { signal?: AbortSignal } = {},
  ): Promise<SweepOutcome> {
    const sweepId = uuidv4();
    const record: SweepRecord = {
      id: sweepId,
      status: 'IDLE',
      startTime: new Date().toISOString(),
      endTime: null,
      parameterName: config.parameterName,
      parameterValues: [...config.parameterValues],
      sampleSize: config.sampleSize,
      metrics: [...config.metrics],
      completedValues: 0,
      errorMessage: null,
    };
    await this.repository.save(record);

    let completedValues = 0;
    try {
      await this.updateStatus(sweepId, 'RUNNING');
      this.emitLog(
        sweepId,
        'info',
        `Using ${resolveWorkerCount(config.workerPoolSize)} worker(s) to compute`,
      );

      const sampleSet = await this.driver.run(config, {
        signal: options.signal,
        onProgress: (progress) => {
          completedValues = progress.completed;
          this.reportProgress(sweepId, progress);
        },
      });

      const summary = this.analysisService.summarize(
        sampleSet,
        config.parameterName,
        config.metrics,
      );
      await this.repository.saveResults(sweepId, sampleSet);
      await this.repository.saveSummary(sweepId, summary);

      const finalRecord = await this.finalizeSweep(record, 'COMPLETED', completedValues, null);
      this.emitLog(
        sweepId,
        'info',
        `Sweep completed: ${sampleSet.size} values x ${config.sampleSize} samples`,
      );
      return { record: finalRecord, sampleSet, summary };
    } catch (error) {
      const status = error instanceof CancellationError ? 'CANCELLED' : 'FAILED';
      this.emitLog(sweepId, 'error', `Sweep ${status.toLowerCase()}: ${errorMessage(error)}`);
      try {
        await this.finalizeSweep(record, status, completedValues, errorMessage(error));
      } catch (persistError) {
        console.error(`Failed to record the final state of sweep ${sweepId}:`, persistError);
      }
      throw error;
    }
  }

  async getSweep(sweepId: string): Promise<SweepRecord | null> {
    return await this.repository.findById(sweepId);
  }

  /**
   * 全てのスイープを取得する（新しい順）
   */
  async listSweeps(): Promise<SweepRecord[]> {
    return await this.repository.findAll();
  }

  async getResults(sweepId: string): Promise<SampleSet | null> {
    return await this.repository.findResults(sweepId);
  }

  async getSummary(sweepId: string): Promise<SampleSummary | null> {
    return await this.repository.findSummary(sweepId);
  }

  /**
   * 保存済みのスイープ情報・要約・結果をまとめて取得する
   * 失敗したスイープでは summary と results が null になる。
   */
  async getSweepDetails(sweepId: string): Promise<SweepDetails | null> {
    const record = await this.getSweep(sweepId);
    if (!record) {
      return null;
    }

    const [summary, results] = await Promise.all([
      this.getSummary(sweepId),
      this.getResults(sweepId),
    ]);
    return { record, summary, results: results ? toSampleSetJson(results) : null };
  }

  private reportProgress(sweepId: string, progress: SweepProgress): void {
    const event: SweepProgressEvent = { sweepId, ...progress };
    this.emit('sweep:progress', event);

    const percent = ((progress.completed / progress.total) * 100).toFixed(2).padStart(6);
    this.emitLog(
      sweepId,
      'info',
      `[${percent}%] ${progress.completed}/${progress.total} ${progress.parameterName} values evaluated`,
    );
  }

  /**
   * 完了または失敗後の最終処理
   */
  private async finalizeSweep(
    record: SweepRecord,
    status: SweepStatus,
    completedValues: number,
    message: string | null,
  ): Promise<SweepRecord> {
    const finalRecord: SweepRecord = {
      ...record,
      status,
      endTime: new Date().toISOString(),
      completedValues,
      errorMessage: message,
    };
    await this.repository.save(finalRecord);
    this.emitStatus(finalRecord);
    return finalRecord;
  }

  /**
   * 実行ステータスを更新（イベント通知も行う）
   */
  private async updateStatus(sweepId: string, status: SweepStatus): Promise<void> {
    await this.repository.updateStatus(sweepId, status);
    const record = await this.repository.findById(sweepId);
    if (record) {
      this.emitStatus(record);
    }
  }

  private emitStatus(record: SweepRecord): void {
    const event: SweepStatusEvent = { sweepId: record.id, status: record.status, record };
    this.emit('sweep:status', event);
  }

  /**
   * ログメッセージを発行
   */
  private emitLog(
    sweepId: string,
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
  ): void {
    const logMessage: LogMessage = {
      timestamp: new Date().toISOString(),
      message,
    };
    // 標準出力はスイープ ID などの結果専用にする
    console.error(`[${level.toUpperCase()}] [${sweepId}] ${message}`);
    this.emit('sweep:log', { sweepId, log: logMessage });
  }
}
