import assert from 'node:assert/strict';
import test from 'node:test';
import {
  CancellationError,
  ParseError,
  ProtocolError,
  SubprocessError,
  TimeoutError,
  deserializeError,
  errorMessage,
  serializeError,
} from './errors';
import { SerializedErrorSchema } from './schemas/worker';

function roundTrip(error: unknown): Error {
  // 構造化複製を通した後と同じく、ただのオブジェクトとして検証し直す
  return deserializeError(SerializedErrorSchema.parse(structuredClone(serializeError(error))));
}

test('subprocess errors keep their exit code and diagnostic', () => {
  const restored = roundTrip(new SubprocessError('oops\n', 3, '/bin/simulate'));

  assert.ok(restored instanceof SubprocessError);
  assert.equal(restored.exitCode, 3);
  assert.equal(restored.diagnostic, 'oops\n');
  assert.equal(restored.executable, '/bin/simulate');
  assert.equal(restored.message, new SubprocessError('oops\n', 3, '/bin/simulate').message);
});

test('spawn failures keep a null exit code', () => {
  const restored = roundTrip(new SubprocessError('spawn x ENOENT', null, 'x'));

  assert.ok(restored instanceof SubprocessError);
  assert.equal(restored.exitCode, null);
});

test('timeouts and cancellations keep their class', () => {
  const timeout = roundTrip(new TimeoutError('reconcile', 250));
  assert.ok(timeout instanceof TimeoutError);
  assert.equal(timeout.timeoutMs, 250);
  assert.equal(timeout.message, 'Subprocess reconcile did not finish within 250 ms and was killed');

  const cancelled = roundTrip(new CancellationError('Sampling cancelled'));
  assert.ok(cancelled instanceof CancellationError);
  assert.equal(cancelled.message, 'Sampling cancelled');
});

test('parse errors keep their offset and message', () => {
  const restored = roundTrip(new ParseError("expected ')' but found <end>", 3));

  assert.ok(restored instanceof ParseError);
  assert.equal(restored.offset, 3);
  assert.equal(restored.message, "expected ')' but found <end> at character 3");
});

test('one level of cause is kept', () => {
  const error = new ProtocolError('Reconciled tree is not a valid NHX tree', {
    cause: new ParseError('unknown event "x"', 1),
  });
  const restored = roundTrip(error);

  assert.ok(restored instanceof ProtocolError);
  assert.ok(restored.cause instanceof ParseError);
  assert.equal(restored.cause.offset, 1);
});

test('unknown errors and thrown values become plain errors', () => {
  const range = roundTrip(new RangeError('out of range'));
  assert.equal(range.name, 'RangeError');
  assert.equal(range.message, 'out of range');

  const thrown = roundTrip('boom');
  assert.equal(thrown.name, 'Error');
  assert.equal(errorMessage(thrown), 'boom');
});
