import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import test from 'node:test';
import { ProcessManager, type SpawnFunction, type SpawnedProcess } from './ProcessManager';
import { CancellationError, SubprocessError, TimeoutError } from '../errors';

class FakeChild extends EventEmitter implements SpawnedProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  pid: number | undefined = 4242;
  killedWith: NodeJS.Signals | number | undefined;
  received = '';

  constructor() {
    super();
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => {
      this.received += chunk;
    });
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killedWith = signal;
    this.finish(null, 'SIGKILL');
    return true;
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

type Behaviour = (child: FakeChild) => void;

function fakeSpawn(behaviour: Behaviour) {
  const calls: { command: string; args: readonly string[] }[] = [];
  const children: FakeChild[] = [];
  const spawnFn: SpawnFunction = (command, args) => {
    calls.push({ command, args });
    const child = new FakeChild();
    children.push(child);
    // リスナー登録後に子プロセスの振る舞いを開始する
    setImmediate(() => behaviour(child));
    return child;
  };
  return { spawnFn, calls, children };
}

const hang: Behaviour = () => undefined;

test('feeds stdin and collects stdout and stderr', async () => {
  const { spawnFn, calls } = fakeSpawn((child) => {
    child.stdout.write(child.received.toUpperCase());
    child.stderr.write('note');
    child.finish(0);
  });
  const manager = new ProcessManager(spawnFn);

  const output = await manager.run('/bin/echoer', ['1', '2'], 'hello');

  assert.deepEqual(output, { stdout: 'HELLO', stderr: 'note', exitCode: 0 });
  assert.deepEqual(calls, [{ command: '/bin/echoer', args: ['1', '2'] }]);
  assert.equal(manager.activeCount, 0);
});

test('rejects with the raw diagnostic text on a nonzero exit', async () => {
  const { spawnFn } = fakeSpawn((child) => {
    child.stderr.write('boom\n');
    child.finish(3);
  });
  const manager = new ProcessManager(spawnFn);

  await assert.rejects(manager.run('simulate', [], ''), {
    name: 'SubprocessError',
    diagnostic: 'boom\n',
    exitCode: 3,
    executable: 'simulate',
  });
});

test('kills a child that outlives its timeout', async () => {
  const { spawnFn, children } = fakeSpawn(hang);
  const manager = new ProcessManager(spawnFn);

  await assert.rejects(manager.run('reconcile', [], '', { timeoutMs: 20 }), {
    name: 'TimeoutError',
    timeoutMs: 20,
  });
  assert.equal(children[0].killedWith, 'SIGKILL');
  assert.equal(manager.activeCount, 0);
});

test('kills the child when the signal aborts', async () => {
  const { spawnFn, children } = fakeSpawn(hang);
  const manager = new ProcessManager(spawnFn);
  const controller = new AbortController();

  const pending = manager.run('reconcile', [], '', { signal: controller.signal });
  setTimeout(() => controller.abort(), 5);

  await assert.rejects(pending, { name: 'CancellationError' });
  assert.equal(children[0].killedWith, 'SIGKILL');
});

test('does not spawn when the signal is already aborted', async () => {
  const { spawnFn, calls } = fakeSpawn(hang);
  const manager = new ProcessManager(spawnFn);

  await assert.rejects(
    manager.run('simulate', [], '', { signal: AbortSignal.abort() }),
    { name: 'CancellationError' },
  );
  assert.equal(calls.length, 0);
});

test('reports a failed spawn as a subprocess error without an exit code', async () => {
  const { spawnFn } = fakeSpawn((child) => {
    child.pid = undefined;
    child.emit('error', new Error('spawn ./missing ENOENT'));
  });
  const manager = new ProcessManager(spawnFn);

  await assert.rejects(manager.run('./missing', [], ''), {
    name: 'SubprocessError',
    diagnostic: 'spawn ./missing ENOENT',
    exitCode: null,
  });
  assert.equal(manager.activeCount, 0);
});

test('reports a throwing spawn function as a subprocess error', async () => {
  const manager = new ProcessManager(() => {
    throw new Error('EMFILE');
  });

  await assert.rejects(manager.run('simulate', [], ''), {
    name: 'SubprocessError',
    diagnostic: 'EMFILE',
  });
});

test('killAll terminates running children', async () => {
  const { spawnFn } = fakeSpawn(hang);
  const manager = new ProcessManager(spawnFn);

  const pending = manager.run('simulate', [], '');
  assert.equal(manager.activeCount, 1);
  assert.equal(manager.killAll(), 1);

  await assert.rejects(pending, { name: 'SubprocessError', exitCode: null });
  assert.equal(manager.activeCount, 0);
});

// 以下は実際の子プロセスを起動する
const posixOnly = { skip: process.platform === 'win32' };

test('runs a real program and passes multibyte text through stdin', posixOnly, async () => {
  const manager = new ProcessManager();

  const output = await manager.run('cat', [], 'ツリー→🌲\n');

  assert.deepEqual(output, { stdout: 'ツリー→🌲\n', stderr: '', exitCode: 0 });
  assert.equal(manager.activeCount, 0);
});

test('reports the exit code and stderr of a failing program', posixOnly, async () => {
  const manager = new ProcessManager();

  await assert.rejects(manager.run('sh', ['-c', 'echo oops >&2; exit 3'], ''), (error) => {
    assert.ok(error instanceof SubprocessError);
    assert.equal(error.exitCode, 3);
    assert.equal(error.diagnostic, 'oops\n');
    assert.equal(error.executable, 'sh');
    return true;
  });
});

test('reports a missing executable without an exit code', posixOnly, async () => {
  const manager = new ProcessManager();
  const missing = '/nonexistent/syntree-sweep/simulate';

  await assert.rejects(manager.run(missing, [], 'input'), (error) => {
    assert.ok(error instanceof SubprocessError);
    assert.equal(error.exitCode, null);
    assert.equal(error.diagnostic, `spawn ${missing} ENOENT`);
    return true;
  });
  assert.equal(manager.activeCount, 0);
});

test('kills a real program that exceeds its timeout', posixOnly, async () => {
  const manager = new ProcessManager();
  const start = Date.now();

  await assert.rejects(manager.run('sleep', ['5'], '', { timeoutMs: 100 }), (error) => {
    assert.ok(error instanceof TimeoutError);
    assert.equal(error.timeoutMs, 100);
    return true;
  });
  assert.ok(Date.now() - start < 4000);
  assert.equal(manager.activeCount, 0);
});

test('cancels a real program through the abort signal', posixOnly, async () => {
  const manager = new ProcessManager();
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 50);

  await assert.rejects(manager.run('sleep', ['5'], '', { signal: controller.signal }), CancellationError);
  assert.equal(manager.activeCount, 0);
});

test('succeeds when a program exits without reading a large input', posixOnly, async () => {
  const manager = new ProcessManager();
  const input = 'x'.repeat(5 * 1024 * 1024);

  const output = await manager.run('sh', ['-c', 'exit 0'], input);

  assert.deepEqual(output, { stdout: '', stderr: '', exitCode: 0 });
});
