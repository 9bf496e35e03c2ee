import type { ISweepResultRepository } from '../repositories/ISweepResultRepository';
import { SweepResultRepository } from '../repositories/SweepResultRepository';
import { BinariesConfigSchema, type BinariesConfig } from '../schemas';
import { ConfigService } from '../services/ConfigService';
import { EvaluationService } from '../services/EvaluationService';
import { ExperimentService } from '../services/ExperimentService';
import { ParameterSweepDriver } from '../services/ParameterSweepDriver';
import { SampleAnalysisService } from '../services/SampleAnalysisService';
import { SampleDispatcher } from '../services/SampleDispatcher';
import { ThreadedSampleDispatcher } from '../services/ThreadedSampleDispatcher';
import { ProcessManager } from './ProcessManager';

interface Dependencies {
  ProcessManager: ProcessManager;
  ISweepResultRepository: ISweepResultRepository;
  ConfigService: ConfigService;
  SampleAnalysisService: SampleAnalysisService;
}

/**
 * 依存性注入コンテナ
 */
export class DIContainer {
  private static instance: DIContainer | undefined;
  private dependencies: Dependencies = DIContainer.setupDependencies();

  private constructor() {}

  public static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  private static setupDependencies(): Dependencies {
    return {
      ProcessManager: new ProcessManager(),
      ISweepResultRepository: new SweepResultRepository(),
      ConfigService: new ConfigService(),
      SampleAnalysisService: new SampleAnalysisService(),
    };
  }

  public get<K extends keyof Dependencies>(key: K): Dependencies[K] {
    return this.dependencies[key];
  }

  public register<K extends keyof Dependencies>(key: K, instance: Dependencies[K]): void {
    this.dependencies[key] = instance;
  }

  /**
   * 外部バイナリの設定から ExperimentService を組み立てる
   * 一覧表示など、評価を行わない用途では既定の設定でよい。
   * ワーカーが1つならこのコンテナの ProcessManager で直接実行する（SIGINT 時の killAll の対象）。
   */
  public createExperimentService(
    binaries: BinariesConfig = BinariesConfigSchema.parse({}),
  ): ExperimentService {
    const options = {
      simulatorPath: binaries.simulator,
      reconcilerPath: binaries.reconciler,
      timeoutMs: binaries.timeout_ms,
    };
    const inProcess = new SampleDispatcher(
      new EvaluationService(this.get('ProcessManager'), options),
    );
    // 並列時は値ごとに別スレッドで評価する
    const driver = new ParameterSweepDriver((workerCount) =>
      workerCount > 1 ? new ThreadedSampleDispatcher(options) : inProcess,
    );
    return new ExperimentService(
      this.get('ISweepResultRepository'),
      driver,
      this.get('SampleAnalysisService'),
    );
  }

  // 便利メソッド
  public getProcessManager(): ProcessManager {
    return this.get('ProcessManager');
  }

  // テスト用のモック注入
  public registerMock<K extends keyof Dependencies>(key: K, mockInstance: Dependencies[K]): void {
    this.register(key, mockInstance);
  }

  // コンテナのリセット（テスト用）
  public reset(): void {
    this.dependencies = DIContainer.setupDependencies();
  }
}
