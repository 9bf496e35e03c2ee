import { spawn, type SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';
import { CancellationError, SubprocessError, TimeoutError, errorMessage } from '../errors';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ProcessRunOptions {
  /** 0 以下なら無制限 */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * 外部プログラムを1回実行するための抽象
 * EvaluationService はこれにのみ依存する。
 */
export interface IProcessRunner {
  run(
    executable: string,
    args: readonly string[],
    inputText: string,
    options?: ProcessRunOptions,
  ): Promise<ProcessOutput>;
}

/**
 * ProcessManager が必要とする子プロセスの最小限の形
 * node の ChildProcess はこれを満たす。テストでは偽物を差し込む。
 */
export interface SpawnedProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options);

/**
 * 外部バイナリを子プロセスとして実行し、その寿命を管理するクラス
 *
 * run() は子プロセスの close を待ってから必ず settle する。
 * タイムアウト・キャンセル時は SIGKILL で終了させてから reject する。
 */
export class ProcessManager implements IProcessRunner {
  private activeProcesses: Set<SpawnedProcess> = new Set();

  constructor(private readonly spawnProcess: SpawnFunction = defaultSpawn) {}

  get activeCount(): number {
    return this.activeProcesses.size;
  }

  async run(
    executable: string,
    args: readonly string[],
    inputText: string,
    options: ProcessRunOptions = {},
  ): Promise<ProcessOutput> {
    const { timeoutMs = 0, signal } = options;

    if (signal?.aborted) {
      throw new CancellationError(`Run of ${executable} cancelled before start`);
    }

    return new Promise((resolve, reject) => {
      const child = this.trySpawn(executable, args);
      if (child instanceof SubprocessError) {
        reject(child);
        return;
      }

      this.activeProcesses.add(child);

      let stdout = '';
      let stderr = '';
      let settled = false;
      // close より前に確定した失敗理由。close 時にこちらを優先して reject する
      let failure: Error | null = null;
      let timer: NodeJS.Timeout | undefined;

      const terminate = (reason: Error) => {
        failure ??= reason;
        if (!child.kill('SIGKILL')) {
          console.error(`[${executable}] Failed to send SIGKILL to child process`);
        }
      };

      const onAbort = () => terminate(new CancellationError(`Run of ${executable} cancelled`));

      const settle = (code: number | null) => {
        if (settled) return;
        settled = true;
        this.activeProcesses.delete(child);
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);

        if (failure) {
          reject(failure);
        } else if (code !== 0) {
          reject(new SubprocessError(stderr, code, executable));
        } else {
          resolve({ stdout, stderr, exitCode: code });
        }
      };

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (data: string) => {
        stdout += data;
      });
      child.stderr?.on('data', (data: string) => {
        stderr += data;
      });

      child.on('close', (code) => settle(code));

      child.on('error', (error) => {
        failure ??= new SubprocessError(stderr || error.message, null, executable);
        // 起動自体に失敗した場合は待つべき子プロセスが存在しない
        if (child.pid === undefined) {
          settle(null);
        }
      });

      if (timeoutMs > 0) {
        timer = setTimeout(() => terminate(new TimeoutError(executable, timeoutMs)), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      // 子プロセスが入力を読まずに終了した場合の EPIPE は終了コード側で扱う
      child.stdin?.on('error', (error: Error) => {
        if (!('code' in error && error.code === 'EPIPE')) {
          terminate(error);
        }
      });
      child.stdin?.end(inputText);
    });
  }

  private trySpawn(executable: string, args: readonly string[]): SpawnedProcess | SubprocessError {
    try {
      return this.spawnProcess(executable, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    } catch (error) {
      return new SubprocessError(errorMessage(error), null, executable);
    }
  }

  /**
   * 実行中のすべての子プロセスを強制終了する
   */
  killAll(): number {
    let killed = 0;
    for (const child of this.activeProcesses) {
      if (child.kill('SIGKILL')) killed++;
    }
    return killed;
  }
}
