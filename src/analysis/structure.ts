import type { AnalysisType, DetectionResult, ProjectStructure } from '../types.js';

/** Files with more findings than this count as high-issue files. */
export const HIGH_ISSUE_FILE_THRESHOLD = 5;

export function countByFile(result: Pick<DetectionResult, 'issues'>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const issue of result.issues) {
    counts.set(issue.file, (counts.get(issue.file) ?? 0) + 1);
  }
  return counts;
}

export function analyzeStructure(
  result: Pick<DetectionResult, 'issues' | 'totalFiles' | 'languagesDetected'>,
  analysisType: AnalysisType
): ProjectStructure {
  const structure: ProjectStructure = {
    analysis_type: analysisType,
    file_count: result.totalFiles,
    languages: [...result.languagesDetected],
    complexity_indicators: {
      high_issue_files: 0,
      average_issues_per_file: 0,
    },
  };

  if (result.issues.length === 0) return structure;

  const perFile = countByFile(result);
  let highIssueFiles = 0;
  for (const count of perFile.values()) {
    if (count > HIGH_ISSUE_FILE_THRESHOLD) highIssueFiles++;
  }

  structure.complexity_indicators.high_issue_files = highIssueFiles;
  structure.complexity_indicators.average_issues_per_file = result.issues.length / (perFile.size || 1);

  return structure;
}
