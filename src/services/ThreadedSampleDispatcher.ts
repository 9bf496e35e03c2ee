import * as path from 'path';
import { Worker } from 'worker_threads';
import { CancellationError, ProtocolError, deserializeError } from '../errors';
import type { EvaluationRequest, EvaluationResult, MetricName } from '../schemas/sweep';
import {
  WorkerResponseSchema,
  type SampleWorkerOptions,
  type WorkerRequest,
} from '../schemas/worker';
import type { ISampleDispatcher } from './SampleDispatcher';

const WORKER_FILE = path.join(__dirname, `sampleWorker${path.extname(__filename)}`);
// TypeScript のまま動かしているときはワーカー側でも tsx を読み込む
const WORKER_EXEC_ARGV = path.extname(__filename) === '.ts' ? ['--require', 'tsx/cjs'] : undefined;

interface PendingRun {
  resolve(results: EvaluationResult[]): void;
  reject(error: Error): void;
}

/**
 * 試行をワーカースレッド上で実行する SampleDispatcher
 *
 * 木のデコードや編集距離の計算は CPU を占有するので、同じイベントループで
 * 複数の値を扱うと他の値の duration に待ち時間が混ざる。スレッドごとに
 * イベントループを分けることで、値ごとの計測を独立させる。
 */
export class ThreadedSampleDispatcher implements ISampleDispatcher {
  private worker: Worker | null = null;
  private pending: PendingRun | null = null;

  constructor(private readonly options: SampleWorkerOptions) {}

  async runSamples(
    sampleSize: number,
    metrics: readonly MetricName[],
    request: EvaluationRequest,
    signal?: AbortSignal,
  ): Promise<EvaluationResult[]> {
    if (signal?.aborted) {
      throw new CancellationError(`Sampling cancelled after 0 of ${sampleSize} trials`);
    }
    if (this.pending) {
      throw new Error('A sample worker evaluates one parameter value at a time');
    }

    const worker = this.ensureWorker();
    const onAbort = () => this.post(worker, { type: 'cancel' });
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await new Promise<EvaluationResult[]>((resolve, reject) => {
        this.pending = { resolve, reject };
        this.post(worker, { type: 'run', sampleSize, metrics: [...metrics], request });
      });
    } finally {
      this.pending = null;
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * ワーカースレッドを終了する
   */
  async close(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker) {
      await worker.terminate();
    }
  }

  private ensureWorker(): Worker {
    if (this.worker) {
      return this.worker;
    }

    const worker = new Worker(WORKER_FILE, {
      workerData: this.options,
      execArgv: WORKER_EXEC_ARGV,
    });
    worker.on('message', (data: unknown) => this.handleMessage(data));
    worker.on('error', (error: Error) => this.fail(error));
    worker.on('exit', (code: number) => {
      if (this.worker === worker) {
        this.worker = null;
      }
      this.fail(new Error(`Sample worker exited with code ${code}`));
    });

    this.worker = worker;
    return worker;
  }

  private handleMessage(data: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.fail(new ProtocolError('Unexpected message from sample worker'));
      return;
    }

    const pending = this.pending;
    this.pending = null;
    const response = parsed.data;
    if (response.type === 'result') {
      pending?.resolve(response.results);
    } else {
      pending?.reject(deserializeError(response.error));
    }
  }

  private fail(error: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }

  private post(worker: Worker, message: WorkerRequest): void {
    worker.postMessage(message);
  }
}
