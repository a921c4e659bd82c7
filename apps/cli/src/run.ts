import { parseArgs } from 'node:util';
import {
  LogAnalyzer,
  LogfileReader,
  createLogfile,
  formatSummary,
  isWeblogError,
  loadConfig,
  type Environment,
  type LineSink,
  type WeblogConfig,
} from '@weblog/core';

export const USAGE = [
  'Usage: weblog-report [file] [options]',
  '',
  'Counts accesses in a web server log by hour and by month.',
  '',
  'Options:',
  '  --simulate         use simulated data if the log file is missing',
  '  --entries <n>      number of simulated entries',
  '  --seed <n>         seed for simulated data',
  '  --create           write simulated data to the log file and exit',
  '  --single-pass      count hours and months in one traversal',
  '  -h, --help         show this help',
];

export interface CliIo {
  out: LineSink;
  err: LineSink;
}

/**
 * Blank option values become NaN so config validation rejects them.
 */
function toInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.trim() === '' ? Number.NaN : Number(value);
}

interface ParsedCli {
  help: boolean;
  create: boolean;
  overrides: Partial<WeblogConfig>;
}

function parseCli(argv: string[]): ParsedCli {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      simulate: { type: 'boolean' },
      entries: { type: 'string' },
      seed: { type: 'string' },
      create: { type: 'boolean' },
      'single-pass': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (positionals.length > 1) {
    throw new Error(`Expected at most one log file, got ${positionals.length}`);
  }

  return {
    help: values.help === true,
    create: values.create === true,
    overrides: {
      logfile: positionals[0],
      onMissing: values.simulate ? 'simulate' : undefined,
      simulatedEntries: toInteger(values.entries),
      seed: toInteger(values.seed),
      singlePass: values['single-pass'] ? true : undefined,
    },
  };
}

function report(config: WeblogConfig, io: CliIo): void {
  const reader = new LogfileReader(config.logfile, {
    onMissing: config.onMissing,
    simulatedEntries: config.simulatedEntries,
    seed: config.seed,
  });
  const analyzer = new LogAnalyzer(reader);

  if (config.singlePass) {
    analyzer.populateAll();
  } else {
    analyzer.populateHourly();
    analyzer.populateMonthly();
  }

  analyzer.printHourlyCounts(io.out);
  io.out('');
  analyzer.printMonthlyCounts(io.out);
  io.out('');
  formatSummary(analyzer.summarize()).forEach((line) => io.out(line));
}

/**
 * Runs the report command.
 *
 * @returns Process exit code
 */
export function run(argv: string[], env: Environment, io: CliIo): number {
  try {
    const cli = parseCli(argv);
    if (cli.help) {
      USAGE.forEach((line) => io.out(line));
      return 0;
    }

    const config = loadConfig(env, cli.overrides);
    if (cli.create) {
      const entries = createLogfile(config.logfile, config.simulatedEntries, {
        seed: config.seed,
      });
      io.out(`Wrote ${entries.length} entries to ${config.logfile}`);
      return 0;
    }

    report(config, io);
    return 0;
  } catch (error) {
    if (isWeblogError(error)) {
      io.err(error.toDetailedString());
    } else if (error instanceof Error) {
      io.err(error.message);
    } else {
      io.err(String(error));
    }
    return 1;
  }
}
