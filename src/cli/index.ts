import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig, type CliOptions } from './config.js';
import { formatKeyTable, formatTraceStats, relativeToCwd } from './format.js';
import { withSpinner } from './spinner.js';
import { DeclarationExtractor } from '../analyzer/declarations.js';
import { EmptyTraceCacheError } from '../analyzer/errors.js';
import { findOrphans, type OrphanAnalysis } from '../analyzer/orphans.js';
import { buildOrphanReport, writeReport } from '../analyzer/output.js';
import { readArtifact } from '../trace/artifact.js';
import { TraceStore } from '../trace/store.js';
import type { TraceRunner } from '../trace/runner.js';
import type { ResolvedConfig } from '../analyzer/types.js';

/** Collaborators the CLI can be given instead of the defaults */
export interface CliContext {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runner?: TraceRunner;
  /** Show the progress spinner; defaults to ora's own TTY detection */
  spinner?: boolean;
}

interface CommonOptions {
  dir?: string;
  config?: string;
}

interface StatsOptions extends CommonOptions {
  numlines?: string;
  sortby?: string;
}

interface RecordOptions extends StatsOptions {
  nodeArg: string[];
}

interface PatternOptions extends CommonOptions {
  exclude?: string[];
}

interface OrphanOptions extends PatternOptions {
  output?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-d, --dir <path>', 'Trace cache directory (default: $DEADRUN_DIR or ./.deadrun)')
    .option('-c, --config <path>', 'Path to config file');
}

/** Print a failure and mark the process as failed */
async function runCommand(label: string, action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(chalk.red(`${label} failed:`), err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

export function createCli(context: CliContext = {}): Command {
  const cwd = resolve(context.cwd ?? process.cwd());
  const env = context.env ?? process.env;
  const spinnerOptions = context.spinner === undefined ? {} : { enabled: context.spinner };

  const configFor = (options: CliOptions): ResolvedConfig => resolveConfig(cwd, options, env);
  const storeFor = (config: ResolvedConfig): TraceStore =>
    new TraceStore({ baseDir: config.traceDir, cwd, runner: context.runner });

  const program = new Command();

  program
    .name('deadrun')
    .description('Find functions that are declared but never run, by tracing real executions')
    .version('0.1.0')
    .enablePositionalOptions();

  withCommonOptions(
    program
      .command('record')
      .description('Run a script under tracing and add its trace to the cache')
      .argument('<script>', 'Script to run')
      .argument('[args...]', 'Arguments passed to the script')
      .option('-n, --numlines <n>', 'Number of functions to list')
      .option('-s, --sortby <key>', 'ncalls, tottime, percall, cumtime or filename')
      .option('--node-arg <arg>', 'Extra Node.js flag, e.g. --import=tsx (repeatable)', collect, [])
      .passThroughOptions()
  ).action(async (script: string, args: string[], options: RecordOptions) => {
    await runCommand('Recording', async () => {
      const config = configFor(options);
      const store = storeFor(config);

      const result = await withSpinner(
        `Tracing ${script}`,
        () => store.record(script, { args, nodeArgs: config.nodeArgs }),
        spinnerOptions
      );

      console.log(formatTraceStats(result.artifact, { sortBy: config.sortBy, limit: config.numlines, cwd }));
    });
  });

  withCommonOptions(
    program
      .command('stats')
      .description('Show the statistics of a cached trace')
      .argument('<script>', 'Script whose trace to show')
      .option('-n, --numlines <n>', 'Number of functions to list')
      .option('-s, --sortby <key>', 'ncalls, tottime, percall, cumtime or filename')
  ).action(async (script: string, options: StatsOptions) => {
    await runCommand('Stats', () => {
      const config = configFor(options);
      const artifactPath = storeFor(config).lookup(script);

      if (artifactPath === null) {
        console.log(chalk.yellow(`No trace recorded for "${script}". Use "deadrun record" first.`));
        return;
      }

      const artifact = readArtifact(artifactPath);
      console.log(formatTraceStats(artifact, { sortBy: config.sortBy, limit: config.numlines, cwd }));
    });
  });

  withCommonOptions(
    program.command('cache').description('List scripts currently in the trace cache')
  ).action(async (options: CommonOptions) => {
    await runCommand('Listing', () => {
      const entries = storeFor(configFor(options)).listEntries();

      if (entries.length === 0) {
        console.log(chalk.yellow('Trace cache is empty.'));
        return;
      }
      for (const script of entries) {
        console.log(`  ${relativeToCwd(script, cwd)}`);
      }
    });
  });

  withCommonOptions(
    program.command('clear').description('Clear the trace cache')
  ).action(async (options: CommonOptions) => {
    await runCommand('Clearing', () => {
      storeFor(configFor(options)).clear();
      console.log('Trace cache cleared.');
    });
  });

  withCommonOptions(
    program
      .command('inspect')
      .description('List functions declared within source files')
      .argument('<patterns...>', 'Glob patterns of source files')
      .option('-x, --exclude <patterns...>', 'File patterns to exclude')
  ).action(async (patterns: string[], options: PatternOptions) => {
    await runCommand('Inspection', async () => {
      const config = configFor(options);
      const extractor = new DeclarationExtractor({ cwd, exclude: config.exclude });
      const declared = await extractor.declaredFunctions(patterns);

      for (const line of formatKeyTable(declared.sorted(), { colWidth: config.nameWidth, cwd })) {
        console.log(line);
      }
    });
  });

  withCommonOptions(
    program
      .command('orphans')
      .description('List declared functions which never ran in any cached trace')
      .argument('<patterns...>', 'Glob patterns of source files')
      .option('-x, --exclude <patterns...>', 'File patterns to exclude')
      .option('-o, --output <path>', 'Also write the orphans to a JSON report')
  ).action(async (patterns: string[], options: OrphanOptions) => {
    await runCommand('Orphan analysis', async () => {
      const config = configFor(options);
      const store = storeFor(config);

      let analysis: OrphanAnalysis;
      try {
        analysis = await findOrphans(store, patterns, { cwd, exclude: config.exclude });
      } catch (err) {
        if (err instanceof EmptyTraceCacheError) {
          console.log(chalk.yellow(err.message));
          return;
        }
        throw err;
      }

      for (const line of formatKeyTable(analysis.orphans, { colWidth: config.nameWidth, cwd })) {
        console.log(line);
      }

      if (options.output) {
        const outputPath = resolve(cwd, options.output);
        const report = buildOrphanReport(analysis.orphans, {
          cwd,
          patterns,
          tracedScripts: analysis.tracedScripts,
          totalDeclared: analysis.declared.size,
          totalCalled: analysis.called.size,
        });
        writeReport(report, outputPath);
        console.log(`\nReport written to: ${outputPath}`);
      }
    });
  });

  return program;
}
