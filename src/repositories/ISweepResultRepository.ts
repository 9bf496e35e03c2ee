import type { SampleSet, SweepRecord, SweepStatus } from '../schemas/sweep';
import type { SampleSummary } from '../schemas/summary';

/**
 * スイープ結果データアクセス層のインターフェース。
 *
 * `SweepRecord` スキーマに準拠したデータと、その結果の永続化を責務に持つ。
 */
export interface ISweepResultRepository {
  /**
   * スイープ情報を保存する
   */
  save(record: SweepRecord): Promise<void>;

  /**
   * IDでスイープ情報を取得する
   */
  findById(id: string): Promise<SweepRecord | null>;

  /**
   * 全てのスイープ情報を開始時刻の新しい順に取得する
   */
  findAll(): Promise<SweepRecord[]>;

  updateStatus(id: string, status: SweepStatus): Promise<void>;

  saveResults(id: string, sampleSet: SampleSet): Promise<void>;

  /**
   * 保存された SampleSet を取得する。キーはスイープ情報にある値の順に並べる
   */
  findResults(id: string): Promise<SampleSet | null>;

  saveSummary(id: string, summary: SampleSummary): Promise<void>;

  findSummary(id: string): Promise<SampleSummary | null>;

  /**
   * sweepId から results.json の絶対パスを取得する
   * ファイル読み込みは行わず、呼び出し側が必要に応じて利用します。
   */
  getResultsPath(id: string): string;
}
