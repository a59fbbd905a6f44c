import type { DetectionResult, DownloadableReport, Finding } from '../types.js';

export interface DownloadableReportInput {
  taskId: string;
  filePath: string;
  result: DetectionResult;
  generatedAt: string;
}

/**
 * Produces the downloadable JSON report for a finished task. Detectors that
 * ship their own format plug in here; everyone else gets SimpleReportGenerator.
 */
export interface DownloadableReportGenerator {
  readonly name: string;
  generate(input: DownloadableReportInput): DownloadableReport;
}

function tally(issues: readonly Finding[], key: (f: Finding) => string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const issue of issues) {
    const k = key(issue);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

export class SimpleReportGenerator implements DownloadableReportGenerator {
  readonly name = 'simple';

  generate({ taskId, filePath, result, generatedAt }: DownloadableReportInput): DownloadableReport {
    return {
      report_info: {
        generated_at: generatedAt,
        file_path: filePath,
        task_id: taskId,
        total_issues: result.totalIssues,
        summary: {
          error_count: result.summary.errorCount,
          warning_count: result.summary.warningCount,
          info_count: result.summary.infoCount,
        },
        detection_tools: [...result.detectionTools],
      },
      issues: result.issues,
      statistics: {
        by_severity: tally(result.issues, f => f.severity),
        by_type: tally(result.issues, f => f.type),
      },
    };
  }
}
