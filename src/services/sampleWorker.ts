import { parentPort, workerData, type MessagePort } from 'worker_threads';
import { CancellationError, serializeError } from '../errors';
import { ProcessManager } from '../infrastructure/ProcessManager';
import { validateRequest } from '../schemas/validators';
import {
  SampleWorkerOptionsSchema,
  WorkerRequestSchema,
  type WorkerRequest,
  type WorkerResponse,
} from '../schemas/worker';
import { EvaluationService } from './EvaluationService';
import { SampleDispatcher } from './SampleDispatcher';

/*
 * ThreadedSampleDispatcher が起動するワーカースレッドの入口。
 * 子プロセスはこのスレッドの ProcessManager が管理する。
 */

if (!parentPort) {
  throw new Error('sampleWorker must be started as a worker thread');
}
const port: MessagePort = parentPort;

const dispatcher = new SampleDispatcher(
  new EvaluationService(
    new ProcessManager(),
    validateRequest(SampleWorkerOptionsSchema, workerData),
  ),
);
let controller = new AbortController();

function reply(response: WorkerResponse): void {
  port.postMessage(response);
}

async function runUnit(
  message: Extract<WorkerRequest, { type: 'run' }>,
  signal: AbortSignal,
): Promise<void> {
  const results = await dispatcher.runSamples(
    message.sampleSize,
    message.metrics,
    message.request,
    signal,
  );
  reply({ type: 'result', results });
}

port.on('message', (data: unknown) => {
  const message = validateRequest(WorkerRequestSchema, data);

  if (message.type === 'cancel') {
    controller.abort(new CancellationError('Sampling cancelled'));
    return;
  }

  controller = new AbortController();
  runUnit(message, controller.signal).catch((error: unknown) =>
    reply({ type: 'error', error: serializeError(error) }),
  );
});
