import type { DetectionResult, Finding } from '../src/types';

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    severity: 'warning',
    type: 'unused_import',
    file: 'app/main.py',
    line: 3,
    message: 'os imported but unused',
    ...overrides,
  };
}

export function makeResult(issues: Finding[], overrides: Partial<DetectionResult> = {}): DetectionResult {
  return {
    totalIssues: issues.length,
    issues,
    summary: {
      errorCount: issues.filter(i => i.severity === 'error').length,
      warningCount: issues.filter(i => i.severity === 'warning').length,
      infoCount: issues.filter(i => i.severity === 'info').length,
    },
    languagesDetected: ['python'],
    totalFiles: 1,
    detectionTools: ['pylint'],
    analysisTime: 1.5,
    projectPath: 'uploads/main.py',
    ...overrides,
  };
}

/** Raw detector output, as the task record carries it. */
export function rawDetectionResults(issues: Array<Record<string, unknown>>): Record<string, unknown> {
  return {
    total_issues: issues.length,
    issues,
    summary: {
      error_count: issues.filter(i => i.severity === 'error').length,
      warning_count: issues.filter(i => i.severity === 'warning').length,
      info_count: issues.filter(i => i.severity === 'info').length,
    },
    languages_detected: ['python'],
    total_files: 2,
    detection_tools: ['pylint', 'bandit'],
    analysis_time: 4.2,
  };
}
