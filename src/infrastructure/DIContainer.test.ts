import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { DIContainer } from './DIContainer';
import { SweepResultRepository } from '../repositories/SweepResultRepository';

test('services are built from the registered dependencies', async () => {
  const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'sweep-container-'));
  const container = DIContainer.getInstance();
  const repository = new SweepResultRepository(directory);

  try {
    container.registerMock('ISweepResultRepository', repository);
    await repository.save({
      id: 'registered',
      status: 'COMPLETED',
      startTime: '2024-05-01T10:00:00.000Z',
      endTime: '2024-05-01T10:05:00.000Z',
      parameterName: 'length',
      parameterValues: [1],
      sampleSize: 1,
      metrics: ['duration'],
      completedValues: 1,
      errorMessage: null,
    });

    const service = container.createExperimentService();

    assert.deepEqual(
      (await service.listSweeps()).map((record) => record.id),
      ['registered'],
    );
  } finally {
    container.reset();
    await fs.rm(directory, { recursive: true, force: true });
  }

  assert.equal(DIContainer.getInstance(), container);
  assert.notEqual(container.get('ISweepResultRepository'), repository);
});
