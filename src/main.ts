#!/usr/bin/env node
import * as fs from 'fs/promises';
import { USAGE, parseCliArguments, type CliCommand } from './cli/arguments';
import { CancellationError, errorMessage } from './errors';
import { DIContainer } from './infrastructure/DIContainer';
import { toSampleSetJson } from './repositories/SweepResultRepository';
import { ConfigService } from './services/ConfigService';

async function runSweep(
  container: DIContainer,
  command: Extract<CliCommand, { command: 'run' }>,
): Promise<void> {
  const configService = command.configPath
    ? new ConfigService(command.configPath)
    : container.get('ConfigService');
  const { configuration, binaries } = await configService.resolve(command.overrides);
  const experimentService = container.createExperimentService(binaries);

  // Ctrl+C で実行中の子プロセスごとスイープを止める
  const controller = new AbortController();
  const onInterrupt = () => {
    console.error('Interrupted, stopping the sweep...');
    controller.abort(new CancellationError('Sweep interrupted'));
    container.getProcessManager().killAll();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const { record, sampleSet } = await experimentService.runSweep(configuration, {
      signal: controller.signal,
    });
    if (command.outputPath) {
      await fs.writeFile(command.outputPath, JSON.stringify(toSampleSetJson(sampleSet)), 'utf8');
    }
    console.log(record.id);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

async function main(argv: string[]): Promise<void> {
  const command = parseCliArguments(argv);
  const container = DIContainer.getInstance();

  switch (command.command) {
    case 'help':
      console.log(USAGE);
      return;
    case 'run':
      await runSweep(container, command);
      return;
    case 'list': {
      const records = await container.createExperimentService().listSweeps();
      for (const record of records) {
        console.log(`${record.id} ${record.status} ${record.parameterName} ${record.startTime}`);
      }
      return;
    }
    case 'show': {
      const details = await container.createExperimentService().getSweepDetails(command.id);
      if (!details) {
        throw new Error(`Sweep ${command.id} not found`);
      }
      console.log(JSON.stringify(details, null, 2));
      return;
    }
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
