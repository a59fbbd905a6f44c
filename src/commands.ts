import fs from 'fs';
import path from 'path';
import { loadConfig, parseAnalysisType, parseDuration } from './config/loader.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './config/defaults.js';
import { FileTaskStore, isValidTaskId } from './detection/taskStore.js';
import { FileArtifactStore } from './storage/artifactStore.js';
import { ArtifactJobScheduler } from './jobs/scheduler.js';
import type { JobOutcome, ScheduledJobs } from './jobs/scheduler.js';
import { ArtifactService } from './service/artifacts.js';
import { printPayloadSummary, formatOutcome } from './report/console.js';
import { createConsoleLogger } from './logging/logger.js';
import { NotFoundError, errorMessage } from './errors.js';
import type { AnalysisType, RelayConfig } from './types.js';

// Exit codes:
// 0 = success
// 1 = usage error
// 2 = at least one job ended without writing
// 4 = requested task or artifact not found
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_INCOMPLETE = 2;
export const EXIT_NOT_FOUND = 4;

export interface CommonOptions {
  config?: string;
  tasksDir?: string;
  outDir?: string;
  maxWait?: string;
  interval?: string;
  waitOnFailure?: boolean;
  verbose?: boolean;
}

export interface ProcessOptions {
  all?: boolean;
  type?: string;
  file?: string;
}

export interface ShowOptions {
  artifact: string;
  json?: boolean;
}

export function resolveConfig(opts: CommonOptions, cwd: string = process.cwd()): RelayConfig {
  // Load config file (includes env var overrides)
  const fileConfig = loadConfig(opts.config, cwd);

  // CLI options override config file and env vars
  return {
    ...fileConfig,
    tasksDir: opts.tasksDir ? path.resolve(cwd, opts.tasksDir) : fileConfig.tasksDir,
    outDir: opts.outDir ? path.resolve(cwd, opts.outDir) : fileConfig.outDir,
    maxWaitMs: parseDuration(opts.maxWait) ?? fileConfig.maxWaitMs,
    pollIntervalMs: parseDuration(opts.interval) ?? fileConfig.pollIntervalMs,
    failFast: opts.waitOnFailure ? false : fileConfig.failFast,
    verbose: opts.verbose ?? fileConfig.verbose,
  };
}

export function createScheduler(config: RelayConfig): ArtifactJobScheduler {
  return new ArtifactJobScheduler({
    provider: new FileTaskStore(config.tasksDir),
    store: new FileArtifactStore(config.outDir),
    config,
    logger: createConsoleLogger({ verbose: config.verbose }),
  });
}

// ── init ─────────────────────────────────────────────────────────────────────

export function initConfig(cwd: string, force: boolean = false): number {
  const outPath = path.join(cwd, CONFIG_FILENAME);
  if (fs.existsSync(outPath) && !force) {
    console.error(`Error: ${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
    return EXIT_USAGE;
  }

  fs.writeFileSync(outPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf8');
  console.log(`Created ${CONFIG_FILENAME}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Point tasksDir at the directory your detector writes task records to');
  console.log('  2. Run: detectrelay process --all');
  return EXIT_OK;
}

// ── process ──────────────────────────────────────────────────────────────────

export async function processTasks(taskIds: string[], opts: ProcessOptions, config: RelayConfig): Promise<number> {
  const requestedType = parseAnalysisType(opts.type);
  if (opts.type && !requestedType) {
    console.error(`Error: invalid analysis type "${opts.type}". Use file or project.`);
    return EXIT_USAGE;
  }
  const analysisType = requestedType ?? config.analysisType;

  let ids = taskIds;
  if (opts.all) {
    ids = [...new Set([...ids, ...await new FileTaskStore(config.tasksDir).listTaskIds()])];
  }
  const invalid = ids.filter(id => !isValidTaskId(id));
  if (invalid.length > 0) {
    console.error(`Error: invalid task id(s): ${invalid.join(', ')}`);
    return EXIT_USAGE;
  }
  if (ids.length === 0) {
    console.error('Error: no task ids given. Pass ids or use --all.');
    return EXIT_USAGE;
  }

  if (config.verbose) {
    console.log(`Tasks: ${config.tasksDir}`);
    console.log(`Output: ${config.outDir}`);
    console.log(`Max wait: ${config.maxWaitMs}ms, interval: ${config.pollIntervalMs}ms`);
  }

  const scheduler = createScheduler(config);
  const handles = ids.flatMap(taskId => {
    const jobs = scheduler.schedule({ taskId, filePath: opts.file ?? '', analysisType });
    return [jobs.report, jobs.payload];
  });

  const onInterrupt = () => scheduler.cancelAll();
  process.once('SIGINT', onInterrupt);
  const outcomes: JobOutcome[] = await Promise.all(handles.map(h => h.done))
    .finally(() => process.off('SIGINT', onInterrupt));
  for (const outcome of outcomes) console.log(formatOutcome(outcome));

  return outcomes.every(o => o.status === 'written') ? EXIT_OK : EXIT_INCOMPLETE;
}

// ── show ─────────────────────────────────────────────────────────────────────

export async function showArtifact(taskId: string, opts: ShowOptions, config: RelayConfig): Promise<number> {
  const service = new ArtifactService({
    provider: new FileTaskStore(config.tasksDir),
    store: new FileArtifactStore(config.outDir),
    logger: createConsoleLogger({ verbose: config.verbose }),
  });

  try {
    if (opts.artifact === 'report') {
      console.log(await service.getNarrativeReport(taskId));
    } else if (opts.artifact === 'download') {
      console.log(JSON.stringify(await service.getDownloadableReport(taskId), null, 2));
    } else if (opts.artifact === 'payload') {
      const payload = await service.getStructuredPayload(taskId);
      if (opts.json) console.log(JSON.stringify(payload, null, 2));
      else printPayloadSummary(payload, config.verbose);
    } else {
      console.error(`Error: unknown artifact "${opts.artifact}". Use report, payload or download.`);
      return EXIT_USAGE;
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return err instanceof NotFoundError ? EXIT_NOT_FOUND : EXIT_USAGE;
  }
  return EXIT_OK;
}

// ── list ─────────────────────────────────────────────────────────────────────

export async function listTasks(config: RelayConfig): Promise<number> {
  const tasks = new FileTaskStore(config.tasksDir);
  const ids = await tasks.listTaskIds();
  if (ids.length === 0) {
    console.log(`No tasks in ${config.tasksDir}`);
    return EXIT_OK;
  }
  const header = 'TASK                      STATUS';
  console.log(header);
  console.log('-'.repeat(header.length));
  for (const id of ids) {
    const task = await tasks.getTaskStatus(id);
    console.log(`${id.padEnd(26)}${task?.status ?? 'unreadable'}`);
  }
  console.log('');
  console.log(`Total: ${ids.length} tasks`);
  return EXIT_OK;
}

// ── watch ────────────────────────────────────────────────────────────────────

/**
 * Returns the callback for task file events. Each task id is scheduled once;
 * later add/change events for the same id are ignored and return null.
 */
export function createTaskFileHandler(
  scheduler: ArtifactJobScheduler,
  analysisType: AnalysisType
): (filePath: string) => ScheduledJobs | null {
  const seen = new Set<string>();

  return (filePath: string) => {
    const taskId = path.basename(filePath, '.json');
    if (!isValidTaskId(taskId) || seen.has(taskId)) return null;
    seen.add(taskId);
    console.log(`[task] ${taskId}`);

    const jobs = scheduler.schedule({ taskId, filePath: '', analysisType });
    for (const handle of [jobs.report, jobs.payload]) {
      void handle.done.then(outcome => console.log(formatOutcome(outcome)));
    }
    return jobs;
  };
}

export async function runWatchMode(config: RelayConfig, analysisType: AnalysisType): Promise<void> {
  const chokidar = await import('chokidar');
  const scheduler = createScheduler(config);
  const handleTaskFile = createTaskFileHandler(scheduler, analysisType);

  fs.mkdirSync(config.tasksDir, { recursive: true });
  const watcher = chokidar.watch('*.json', {
    cwd: config.tasksDir,
    ignoreInitial: false,
    persistent: true,
  });

  watcher.on('add', handleTaskFile);
  watcher.on('change', handleTaskFile);
  watcher.on('error', err => console.error(`Watcher error: ${errorMessage(err)}`));

  console.log(`\n[watching ${config.tasksDir}… Ctrl+C to exit]\n`);

  process.on('SIGINT', async () => {
    scheduler.cancelAll();
    await watcher.close();
    await scheduler.whenIdle();
    process.exit(EXIT_OK);
  });
}
