import type { RelayConfig } from '../types.js';

export const CONFIG_FILENAME = '.detectrelayrc.json';

export const DEFAULT_CONFIG: RelayConfig = {
  tasksDir: 'tasks',
  outDir: '.',
  maxWaitMs: 5 * 60 * 1000,
  pollIntervalMs: 2000,
  failFast: true,
  analysisType: 'file',
  verbose: false,
};
