import type { DetectionResult, Finding, Severity, SeveritySummary } from '../types.js';

const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function readCount(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return fallback;
  return value;
}

function readStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

export function normalizeSeverity(value: unknown): Severity {
  return SEVERITIES.find(known => known === value) ?? 'info';
}

/** Missing or ill-typed fields fall back to defaults; this never throws. */
export function normalizeFinding(raw: unknown): Finding {
  const r = isRecord(raw) ? raw : {};
  const finding: Finding = {
    severity: normalizeSeverity(r.severity),
    type: readString(r.type, 'unknown'),
    file: readString(r.file, 'unknown'),
    line: Math.floor(readCount(r.line, 0)),
    message: typeof r.message === 'string' ? r.message : '',
  };
  if (typeof r.column === 'number' && Number.isInteger(r.column) && r.column >= 0) {
    finding.column = r.column;
  }
  if (typeof r.language === 'string' && r.language.length > 0) {
    finding.language = r.language;
  }
  return finding;
}

function normalizeSummary(raw: unknown): SeveritySummary {
  const r = isRecord(raw) ? raw : {};
  return {
    errorCount: readCount(r.error_count, 0),
    warningCount: readCount(r.warning_count, 0),
    infoCount: readCount(r.info_count, 0),
  };
}

/**
 * Returns null when the detector produced nothing usable (not an object, or an
 * empty one). The precomputed summary is kept as reported.
 */
export function normalizeDetectionResult(raw: unknown, inputPath: string): DetectionResult | null {
  if (!isRecord(raw) || Object.keys(raw).length === 0) return null;

  const issues = Array.isArray(raw.issues) ? raw.issues.map(normalizeFinding) : [];

  return {
    totalIssues: readCount(raw.total_issues, 0),
    issues,
    summary: normalizeSummary(raw.summary),
    languagesDetected: readStringList(raw.languages_detected),
    totalFiles: readCount(raw.total_files, 1),
    detectionTools: readStringList(raw.detection_tools),
    analysisTime: readCount(raw.analysis_time, 0),
    projectPath: readString(raw.project_path, inputPath),
  };
}

export function countBySeverity(issues: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = { errorCount: 0, warningCount: 0, infoCount: 0 };
  for (const issue of issues) {
    if (issue.severity === 'error') summary.errorCount++;
    else if (issue.severity === 'warning') summary.warningCount++;
    else summary.infoCount++;
  }
  return summary;
}
