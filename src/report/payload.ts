import type { AnalysisType, DetectionResult, StructuredPayload } from '../types.js';
import { classifyByPriority } from '../analysis/priority.js';
import { synthesizeRecommendations } from '../analysis/recommendations.js';
import { analyzeStructure } from '../analysis/structure.js';

export interface PayloadContext {
  taskId: string;
  filePath: string;
  analysisType: AnalysisType;
  /** ISO timestamp stamped on the payload; passed in so the build stays pure. */
  generatedAt: string;
}

export function buildStructuredPayload(result: DetectionResult, ctx: PayloadContext): StructuredPayload {
  return {
    task_id: ctx.taskId,
    file_path: ctx.filePath,
    analysis_type: ctx.analysisType,
    timestamp: ctx.generatedAt,
    summary: {
      total_issues: result.totalIssues,
      error_count: result.summary.errorCount,
      warning_count: result.summary.warningCount,
      info_count: result.summary.infoCount,
      languages_detected: [...result.languagesDetected],
      total_files: result.totalFiles,
    },
    issues_by_priority: classifyByPriority(result.issues),
    fix_recommendations: synthesizeRecommendations(result.issues),
    project_structure: analyzeStructure(result, ctx.analysisType),
    detection_metadata: {
      detection_tools: [...result.detectionTools],
      analysis_time: result.analysisTime,
      project_path: result.projectPath,
    },
  };
}

export function serializePayload(payload: StructuredPayload): string {
  return JSON.stringify(payload, null, 2);
}
