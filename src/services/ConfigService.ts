import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'smol-toml';
import { errorMessage, isFileNotFound } from '../errors';
import { parseParameterValues } from '../cli/parameterValues';
import {
  ExperimentConfigSchema,
  type BinariesConfig,
  type ExperimentConfig,
} from '../schemas/config';
import { SweepConfigurationSchema, type SweepConfiguration } from '../schemas/sweep';
import { validateRequest } from '../schemas/validators';

/**
 * コマンドライン引数などで設定ファイルの値を上書きするための値
 */
export interface SweepOverrides {
  sampleSize?: number;
  parameterName?: string;
  /** 値の表記（`parseParameterValues` を参照） */
  parameterValues?: string;
  workerPoolSize?: number;
  metrics?: string[];
  timeoutMs?: number;
}

export interface ResolvedExperiment {
  configuration: SweepConfiguration;
  binaries: BinariesConfig;
}

/**
 * sweep_config.toml の読み込みを行うサービス
 */
export class ConfigService {
  constructor(
    private readonly configPath: string = path.resolve(process.cwd(), 'sweep_config.toml'),
  ) {}

  /**
   * sweep_config.toml の設定を取得
   * ファイルがなければ既定値を返す。
   */
  async getConfig(): Promise<ExperimentConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        console.warn(`${this.configPath} not found, using default settings`);
        return validateRequest(ExperimentConfigSchema, {});
      }
      throw error;
    }

    let table: unknown;
    try {
      table = parse(content);
    } catch (error) {
      throw new Error(`Failed to parse ${this.configPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return validateRequest(ExperimentConfigSchema, table);
  }

  /**
   * 設定ファイルと上書き値からスイープの設定を組み立てる
   */
  async resolve(overrides: SweepOverrides = {}): Promise<ResolvedExperiment> {
    const config = this.mergeConfig(await this.getConfig(), overrides);
    const { sweep } = config;

    const parameterValues =
      typeof sweep.param_values === 'string'
        ? parseParameterValues(sweep.param_values)
        : sweep.param_values;

    const configuration = validateRequest(SweepConfigurationSchema, {
      sampleSize: sweep.sample_size,
      parameterName: sweep.param_name,
      parameterValues,
      workerPoolSize: sweep.jobs,
      metrics: sweep.metrics,
      baseRequest: config.defaults,
    });

    return { configuration, binaries: config.binaries };
  }

  /**
   * 設定をマージ
   */
  private mergeConfig(current: ExperimentConfig, overrides: SweepOverrides): ExperimentConfig {
    const binaries: Record<string, unknown> = { ...current.binaries };
    const sweep: Record<string, unknown> = { ...current.sweep };

    if (overrides.timeoutMs !== undefined) binaries.timeout_ms = overrides.timeoutMs;
    if (overrides.sampleSize !== undefined) sweep.sample_size = overrides.sampleSize;
    if (overrides.parameterName !== undefined) sweep.param_name = overrides.parameterName;
    if (overrides.parameterValues !== undefined) sweep.param_values = overrides.parameterValues;
    if (overrides.workerPoolSize !== undefined) sweep.jobs = overrides.workerPoolSize;
    if (overrides.metrics !== undefined) sweep.metrics = overrides.metrics;

    return validateRequest(ExperimentConfigSchema, {
      binaries,
      sweep,
      defaults: current.defaults,
    });
  }
}
