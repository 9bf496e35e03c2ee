import * as fs from 'fs/promises';
import { glob } from 'glob';
import * as path from 'path';
import { isFileNotFound } from '../errors';
import {
  SampleSetJsonSchema,
  SweepRecordSchema,
  type SampleSet,
  type SampleSetJson,
  type SweepRecord,
  type SweepStatus,
} from '../schemas/sweep';
import { SampleSummarySchema, type SampleSummary } from '../schemas/summary';
import { validateStored } from '../schemas/validators';
import type { ISweepResultRepository } from './ISweepResultRepository';

const RECORD_FILE = 'sweep_info.json';
const RESULTS_FILE = 'results.json';
const SUMMARY_FILE = 'summary.json';

/** SampleSet を results.json の形に変換する */
export function toSampleSetJson(sampleSet: SampleSet): SampleSetJson {
  const json: SampleSetJson = {};
  for (const [value, results] of sampleSet) {
    json[String(value)] = results;
  }
  return json;
}

/**
 * ファイルシステムベースのSweepResultRepository実装。
 * data/results/{id}/ 以下にスイープごとのファイルを置く。
 */
export class SweepResultRepository implements ISweepResultRepository {
  constructor(
    private readonly resultsDirectory: string = path.resolve(process.cwd(), 'data', 'results'),
  ) {}

  private getSweepDirPath(id: string): string {
    return path.join(this.resultsDirectory, id);
  }

  private getRecordPath(id: string): string {
    return path.join(this.getSweepDirPath(id), RECORD_FILE);
  }

  private getSummaryPath(id: string): string {
    return path.join(this.getSweepDirPath(id), SUMMARY_FILE);
  }

  getResultsPath(id: string): string {
    return path.join(this.getSweepDirPath(id), RESULTS_FILE);
  }

  /**
   * 共通ユーティリティ: JSONファイルを読み込んでオブジェクトを返します。
   * ファイルが存在しない場合は null を返し、それ以外のエラーは上位に伝播させます。
   */
  private async readJsonFile(filePath: string): Promise<unknown> {
    try {
      const content = await fs.readFile(filePath, 'utf8');
      const data: unknown = JSON.parse(content);
      return data;
    } catch (err: unknown) {
      if (isFileNotFound(err)) return null;
      throw err;
    }
  }

  private async writeJsonFile(id: string, filePath: string, data: unknown): Promise<void> {
    await fs.mkdir(this.getSweepDirPath(id), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
  }

  /**
   * スイープ情報（sweep_info.json）を保存/更新する
   */
  async save(record: SweepRecord): Promise<void> {
    const validated = SweepRecordSchema.safeParse(record);
    if (!validated.success) {
      throw new Error(`Invalid sweep record supplied for id ${record.id}`);
    }
    await this.writeJsonFile(record.id, this.getRecordPath(record.id), validated.data);
  }

  async findById(id: string): Promise<SweepRecord | null> {
    const data = await this.readJsonFile(this.getRecordPath(id));
    if (data === null) return null;
    return validateStored(SweepRecordSchema, data, `${id}/${RECORD_FILE}`);
  }

  async findAll(): Promise<SweepRecord[]> {
    const recordFiles = await glob(`*/${RECORD_FILE}`, { cwd: this.resultsDirectory });
    const records: SweepRecord[] = [];

    for (const recordFile of recordFiles) {
      const id = path.dirname(recordFile);
      try {
        const record = await this.findById(id);
        if (record) {
          records.push(record);
        }
      } catch (error: unknown) {
        console.error(`Could not load sweep from dir ${id}:`, error);
      }
    }

    return records.sort(
      (a, b) => new Date(b.startTime).getTime() - new Date(a.startTime).getTime(),
    );
  }

  /**
   * スイープのステータスを更新する
   */
  async updateStatus(id: string, status: SweepStatus): Promise<void> {
    const record = await this.findById(id);
    if (!record) {
      throw new Error(`Sweep ${id} not found for status update`);
    }
    await this.save({ ...record, status });
  }

  async saveResults(id: string, sampleSet: SampleSet): Promise<void> {
    await this.writeJsonFile(id, this.getResultsPath(id), toSampleSetJson(sampleSet));
  }

  async findResults(id: string): Promise<SampleSet | null> {
    const data = await this.readJsonFile(this.getResultsPath(id));
    if (data === null) return null;
    const json = validateStored(SampleSetJsonSchema, data, `${id}/${RESULTS_FILE}`);

    // 整数のキーは JSON の読み込みで昇順に並び替わるので、設定された値の順に戻す
    const record = await this.findById(id);
    const keys = [...new Set([...(record?.parameterValues ?? []).map(String), ...Object.keys(json)])];

    const sampleSet: SampleSet = new Map();
    for (const key of keys) {
      const results = json[key];
      if (results) {
        sampleSet.set(Number(key), results);
      }
    }
    return sampleSet;
  }

  async saveSummary(id: string, summary: SampleSummary): Promise<void> {
    await this.writeJsonFile(id, this.getSummaryPath(id), summary);
  }

  async findSummary(id: string): Promise<SampleSummary | null> {
    const data = await this.readJsonFile(this.getSummaryPath(id));
    if (data === null) return null;
    return validateStored(SampleSummarySchema, data, `${id}/${SUMMARY_FILE}`);
  }
}
