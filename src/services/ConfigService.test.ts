import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import test, { after, before } from 'node:test';
import { ConfigService } from './ConfigService';

let directory: string;

before(async () => {
  directory = await fs.mkdtemp(path.join(os.tmpdir(), 'sweep-config-'));
});

after(async () => {
  await fs.rm(directory, { recursive: true, force: true });
});

async function writeConfig(name: string, content: string): Promise<ConfigService> {
  const configPath = path.join(directory, name);
  await fs.writeFile(configPath, content, 'utf-8');
  return new ConfigService(configPath);
}

const DEFAULT_REQUEST = {
  seed: 0,
  length: 10,
  event_depth: 5,
  duplication_probability: 0.5,
  loss_probability: 0.5,
  loss_length_rate: 0.5,
};

test('a missing file falls back to the defaults', async () => {
  const service = new ConfigService(path.join(directory, 'absent.toml'));

  const { configuration, binaries } = await service.resolve();

  assert.deepEqual(configuration, {
    sampleSize: 500,
    parameterName: 'length',
    parameterValues: [1, 2, 3, 4],
    workerPoolSize: 0,
    metrics: ['scoredif'],
    baseRequest: DEFAULT_REQUEST,
  });
  assert.deepEqual(binaries, {
    simulator: 'build/Release/simulate',
    reconciler: 'build/Release/super_reconciliation',
    timeout_ms: 0,
  });
});

test('reads every section of the file', async () => {
  const service = await writeConfig(
    'full.toml',
    `[binaries]
simulator = "bin/sim"
timeout_ms = 5000

[sweep]
sample_size = 20
param_name = "synteny_size"
param_values = "[2:6:2]"
jobs = 3
metrics = ["scoredif", "distance"]

[defaults]
event_depth = 7
loss_probability = 0.25
`,
  );

  const { configuration, binaries } = await service.resolve();

  assert.deepEqual(configuration, {
    sampleSize: 20,
    parameterName: 'length',
    parameterValues: [2, 4, 6],
    workerPoolSize: 3,
    metrics: ['scoredif', 'distance'],
    baseRequest: { ...DEFAULT_REQUEST, event_depth: 7, loss_probability: 0.25 },
  });
  assert.deepEqual(binaries, {
    simulator: 'bin/sim',
    reconciler: 'build/Release/super_reconciliation',
    timeout_ms: 5000,
  });
});

test('a TOML array of values is taken as is', async () => {
  const service = await writeConfig(
    'array.toml',
    `[sweep]
param_name = "duplication_probability"
param_values = [0.1, 0.9]
`,
  );

  const { configuration } = await service.resolve();

  assert.equal(configuration.parameterName, 'duplication_probability');
  assert.deepEqual(configuration.parameterValues, [0.1, 0.9]);
});

test('overrides take precedence over the file', async () => {
  const service = await writeConfig(
    'overridden.toml',
    `[sweep]
sample_size = 20
param_values = "1,3"
`,
  );

  const { configuration, binaries } = await service.resolve({
    sampleSize: 2,
    parameterValues: '{5, 6}',
    workerPoolSize: 1,
    metrics: ['duration'],
    timeoutMs: 100,
  });

  assert.equal(configuration.sampleSize, 2);
  assert.deepEqual(configuration.parameterValues, [5, 6]);
  assert.equal(configuration.workerPoolSize, 1);
  assert.deepEqual(configuration.metrics, ['duration']);
  assert.equal(binaries.timeout_ms, 100);
});

test('malformed TOML is an error', async () => {
  const service = await writeConfig('broken.toml', '[sweep\nsample_size = ');

  await assert.rejects(service.getConfig(), /^Error: Failed to parse .*broken\.toml/);
});

test('values outside the schema are rejected', async () => {
  const service = await writeConfig('invalid.toml', '[sweep]\nsample_size = 0\n');

  await assert.rejects(service.getConfig(), /sweep\.sample_size/);
});

test('an unknown metric override is rejected', async () => {
  const service = new ConfigService(path.join(directory, 'absent.toml'));

  await assert.rejects(service.resolve({ metrics: ['accuracy'] }), /sweep\.metrics\.0/);
});

test('an unknown parameter name is rejected', async () => {
  const service = new ConfigService(path.join(directory, 'absent.toml'));

  await assert.rejects(service.resolve({ parameterName: 'width' }), /parameterName/);
});
