import type { SerializedError, SerializedErrorFields } from './schemas/worker';

/**
 * スイープ実行中に発生するエラーの基底クラス
 */
export class SweepError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * NHX テキストの構文エラー
 */
export class ParseError extends SweepError {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(`${message} at character ${offset}`);
  }
}

/**
 * 外部プロセスが 0 以外のコードで終了した（または起動できなかった）
 * diagnostic には stderr がそのまま入る。
 */
export class SubprocessError extends SweepError {
  constructor(
    readonly diagnostic: string,
    readonly exitCode: number | null,
    readonly executable: string,
  ) {
    super(
      `Subprocess ${executable} terminated abnormally (exit code ${exitCode ?? 'none'}).\n\n${diagnostic}`,
    );
  }
}

/**
 * 外部プロセスの出力が想定した構造でない
 */
export class ProtocolError extends SweepError {}

/**
 * 再構成結果のコストが元の木を上回った（reconciler が最適でない）
 */
export class InvariantError extends SweepError {}

export class TimeoutError extends SweepError {
  constructor(
    readonly executable: string,
    readonly timeoutMs: number,
  ) {
    super(`Subprocess ${executable} did not finish within ${timeoutMs} ms and was killed`);
  }
}

export class CancellationError extends SweepError {}

/** unknown なエラー値からメッセージを取り出す */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** ファイルが存在しないことによるエラーか */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorFields(error: unknown): SerializedErrorFields {
  if (error instanceof SubprocessError) {
    const { name, message, diagnostic, exitCode, executable } = error;
    return { name, message, diagnostic, exitCode, executable };
  }
  if (error instanceof TimeoutError) {
    const { name, message, executable, timeoutMs } = error;
    return { name, message, executable, timeoutMs };
  }
  if (error instanceof ParseError) {
    const { name, message, offset } = error;
    return { name, message, offset };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

function restoreError(fields: SerializedErrorFields, cause?: Error): Error {
  const options = cause ? { cause } : undefined;

  switch (fields.name) {
    case 'SubprocessError':
      return new SubprocessError(
        fields.diagnostic ?? '',
        fields.exitCode ?? null,
        fields.executable ?? '',
      );
    case 'TimeoutError':
      return new TimeoutError(fields.executable ?? '', fields.timeoutMs ?? 0);
    case 'ParseError':
      return new ParseError(fields.message.replace(/ at character \d+$/, ''), fields.offset ?? 0);
    case 'ProtocolError':
      return new ProtocolError(fields.message, options);
    case 'InvariantError':
      return new InvariantError(fields.message, options);
    case 'CancellationError':
      return new CancellationError(fields.message, options);
    default: {
      const error = new Error(fields.message, options);
      error.name = fields.name;
      return error;
    }
  }
}

/**
 * エラーをスレッド間で送れる形にする（cause は1段まで）
 */
export function serializeError(error: unknown): SerializedError {
  const fields = errorFields(error);
  if (error instanceof Error && error.cause !== undefined) {
    return { ...fields, cause: errorFields(error.cause) };
  }
  return fields;
}

/**
 * serializeError の逆。既知のエラーは元のクラスで復元する
 */
export function deserializeError(serialized: SerializedError): Error {
  const { cause, ...fields } = serialized;
  return restoreError(fields, cause ? restoreError(cause) : undefined);
}
