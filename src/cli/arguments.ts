import { parseArgs } from 'util';
import type { SweepOverrides } from '../services/ConfigService';

export type CliCommand =
  | { command: 'help' }
  | { command: 'run'; configPath?: string; outputPath?: string; overrides: SweepOverrides }
  | { command: 'list' }
  | { command: 'show'; id: string };

export const USAGE = `Usage: syntree-sweep <command> [options]

Commands:
  run               Evaluate a sample of simulated evolutions for each parameter value
  list              List stored sweeps, newest first
  show <id>         Print a stored sweep and its summary as JSON

Options for run:
  --config PATH         configuration file (default: ./sweep_config.toml)
  -o, --output PATH     write the sample set as JSON to PATH
  -m, --metrics NAME    metric to evaluate (scoredif, duration, distance); repeatable
  -S, --sample-size N   number of samples for each parameter value
  -n, --param-name NAME simulation parameter to vary
  -v, --param-values V  values: 7, {1, 2, 3}, [1:10:3] or start,stop[,step]
  -j, --jobs N          number of parallel workers (0: one per available core)
  --timeout MS          kill a subprocess running longer than MS milliseconds`;

function parseInteger(option: string, text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  if (!/^\d+$/.test(text)) {
    throw new Error(`--${option} must be a non-negative integer, got "${text}"`);
  }
  return Number(text);
}

/**
 * コマンドライン引数を解釈する
 * @param argv process.argv.slice(2) に相当する引数列
 */
export function parseCliArguments(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      output: { type: 'string', short: 'o' },
      metrics: { type: 'string', short: 'm', multiple: true },
      'sample-size': { type: 'string', short: 'S' },
      'param-name': { type: 'string', short: 'n' },
      'param-values': { type: 'string', short: 'v' },
      jobs: { type: 'string', short: 'j' },
      timeout: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...rest] = positionals;
  if (values.help || command === undefined) {
    return { command: 'help' };
  }

  switch (command) {
    case 'run':
      if (rest.length > 0) {
        throw new Error(`Unexpected argument "${rest[0]}"`);
      }
      return {
        command: 'run',
        configPath: values.config,
        outputPath: values.output,
        overrides: {
          sampleSize: parseInteger('sample-size', values['sample-size']),
          parameterName: values['param-name'],
          parameterValues: values['param-values'],
          workerPoolSize: parseInteger('jobs', values.jobs),
          metrics: values.metrics,
          timeoutMs: parseInteger('timeout', values.timeout),
        },
      };
    case 'list':
      return { command: 'list' };
    case 'show': {
      const [id] = rest;
      if (id === undefined) {
        throw new Error('show requires a sweep id');
      }
      return { command: 'show', id };
    }
    default:
      throw new Error(`Unknown command "${command}"\n\n${USAGE}`);
  }
}
