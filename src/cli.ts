#!/usr/bin/env node
import { Command } from 'commander';
import { parseAnalysisType } from './config/loader.js';
import { CONFIG_FILENAME } from './config/defaults.js';
import {
  initConfig,
  listTasks,
  processTasks,
  resolveConfig,
  runWatchMode,
  showArtifact,
} from './commands.js';
import type { CommonOptions, ProcessOptions, ShowOptions } from './commands.js';
import { errorMessage } from './errors.js';

const program = new Command();

program
  .name('detectrelay')
  .description('Wait for code-analysis tasks and derive narrative reports and remediation payloads')
  .version('1.0.0');

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', `Path to ${CONFIG_FILENAME} config file`)
    .option('--tasks-dir <path>', 'Directory holding <taskId>.json task records')
    .option('--out-dir <path>', 'Root directory for generated artifacts')
    .option('--max-wait <ms>', 'Give up waiting for a task after this many milliseconds')
    .option('--interval <ms>', 'Poll interval in milliseconds')
    .option('--wait-on-failure', 'Keep waiting when a task reports "failed" instead of stopping')
    .option('-v, --verbose', 'Verbose output');
}

// ── init command ─────────────────────────────────────────────────────────────

program
  .command('init')
  .description(`Scaffold a ${CONFIG_FILENAME} config file`)
  .option('--force', 'Overwrite existing config')
  .action((opts: { force?: boolean }) => {
    process.exit(initConfig(process.cwd(), opts.force));
  });

// ── process command ──────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('process')
    .description('Wait for tasks to complete and write their report and structured payload')
    .argument('[taskIds...]', 'Task ids to process')
    .option('--all', 'Process every task found in the tasks directory')
    .option('-t, --type <type>', 'Analysis type: file|project')
    .option('--file <path>', 'Input path recorded in the artifacts (defaults to the task\'s own path)')
).action(async (taskIds: string[], opts: CommonOptions & ProcessOptions) => {
  process.exit(await processTasks(taskIds, opts, resolveConfig(opts)));
});

// ── show command ─────────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('show')
    .description('Print a stored artifact')
    .argument('<taskId>', 'Task id')
    .option('-a, --artifact <kind>', 'report|payload|download', 'payload')
    .option('--json', 'Print the payload as JSON instead of a summary')
).action(async (taskId: string, opts: CommonOptions & ShowOptions) => {
  process.exit(await showArtifact(taskId, opts, resolveConfig(opts)));
});

// ── list command ─────────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('list')
    .description('List task records and their status')
).action(async (opts: CommonOptions) => {
  process.exit(await listTasks(resolveConfig(opts)));
});

// ── watch command ────────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('watch')
    .description('Watch the tasks directory and generate artifacts for each new task')
    .option('-t, --type <type>', 'Analysis type: file|project')
).action(async (opts: CommonOptions & { type?: string }) => {
  const config = resolveConfig(opts);
  await runWatchMode(config, parseAnalysisType(opts.type) ?? config.analysisType);
});

program.parseAsync(process.argv).catch(err => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
