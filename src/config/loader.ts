import fs from 'fs';
import path from 'path';
import type { AnalysisType, RelayConfig } from '../types.js';
import { CONFIG_FILENAME, DEFAULT_CONFIG } from './defaults.js';

interface RcFile {
  tasksDir?: string;
  outDir?: string;
  maxWaitMs?: number;
  pollIntervalMs?: number;
  failFast?: boolean;
  analysisType?: string;
  verbose?: boolean;
}

export function parseAnalysisType(value: string | undefined): AnalysisType | undefined {
  return value === 'file' || value === 'project' ? value : undefined;
}

export function parseDuration(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'number' ? value : parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

function parseFlag(value: string): boolean {
  const v = value.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

export function loadConfig(configPath?: string, cwd: string = process.cwd()): RelayConfig {
  // DETECTRELAY_CONFIG env var can specify an alternative config path
  const resolvedConfigPath = configPath
    ? path.resolve(cwd, configPath)
    : process.env.DETECTRELAY_CONFIG
      ? path.resolve(cwd, process.env.DETECTRELAY_CONFIG)
      : path.join(cwd, CONFIG_FILENAME);

  let rc: RcFile = {};
  if (fs.existsSync(resolvedConfigPath)) {
    try {
      rc = JSON.parse(fs.readFileSync(resolvedConfigPath, 'utf8')) as RcFile;
    } catch {
      console.warn(`Warning: Could not parse config file at ${resolvedConfigPath}`);
    }
  }

  const base: RelayConfig = {
    tasksDir: path.resolve(cwd, rc.tasksDir ?? DEFAULT_CONFIG.tasksDir),
    outDir: path.resolve(cwd, rc.outDir ?? DEFAULT_CONFIG.outDir),
    maxWaitMs: parseDuration(rc.maxWaitMs) ?? DEFAULT_CONFIG.maxWaitMs,
    pollIntervalMs: parseDuration(rc.pollIntervalMs) ?? DEFAULT_CONFIG.pollIntervalMs,
    failFast: rc.failFast ?? DEFAULT_CONFIG.failFast,
    analysisType: parseAnalysisType(rc.analysisType) ?? DEFAULT_CONFIG.analysisType,
    verbose: rc.verbose ?? DEFAULT_CONFIG.verbose,
  };

  // Environment overrides (priority: CLI > env > config > default).
  // CLI options are applied by the caller after this returns.
  if (process.env.DETECTRELAY_TASKS_DIR) {
    base.tasksDir = path.resolve(cwd, process.env.DETECTRELAY_TASKS_DIR);
  }
  if (process.env.DETECTRELAY_OUT_DIR) {
    base.outDir = path.resolve(cwd, process.env.DETECTRELAY_OUT_DIR);
  }
  const envMaxWait = parseDuration(process.env.DETECTRELAY_MAX_WAIT_MS);
  if (envMaxWait !== undefined) base.maxWaitMs = envMaxWait;
  const envInterval = parseDuration(process.env.DETECTRELAY_POLL_INTERVAL_MS);
  if (envInterval !== undefined) base.pollIntervalMs = envInterval;
  if (process.env.DETECTRELAY_FAIL_FAST) {
    base.failFast = parseFlag(process.env.DETECTRELAY_FAIL_FAST);
  }
  if (process.env.DETECTRELAY_VERBOSE) {
    base.verbose = parseFlag(process.env.DETECTRELAY_VERBOSE);
  }

  return base;
}
