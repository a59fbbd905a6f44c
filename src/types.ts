export type Severity = 'error' | 'warning' | 'info';
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';
export type PriorityTier = 'critical' | 'high' | 'medium' | 'low';
export type AnalysisType = 'file' | 'project';
export type ArtifactKind = 'narrative' | 'payload' | 'downloadable';

export interface Finding {
  severity: Severity;
  type: string;
  file: string;
  line: number;
  message: string;
  column?: number;
  language?: string;
}

export interface SeveritySummary {
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

export interface DetectionResult {
  totalIssues: number;
  issues: Finding[];
  summary: SeveritySummary;
  languagesDetected: string[];
  totalFiles: number;
  detectionTools: string[];
  analysisTime: number;
  projectPath: string;
}

/** What a completed task carries: the raw detector output and the analysed path. */
export interface DetectionEnvelope {
  detectionResults: unknown;
  filePath: string;
}

export interface Task {
  id: string;
  status: TaskStatus;
  result: DetectionEnvelope | null;
}

export interface TaskStatusProvider {
  getTaskStatus(taskId: string): Promise<Task | null>;
}

export type IssuesByPriority = Record<PriorityTier, Finding[]>;

export interface FixRecommendations {
  immediate_actions: string[];
  short_term_improvements: string[];
  long_term_optimizations: string[];
}

export interface ProjectStructure {
  analysis_type: AnalysisType;
  file_count: number;
  languages: string[];
  complexity_indicators: {
    high_issue_files: number;
    average_issues_per_file: number;
  };
}

export interface StructuredPayload {
  task_id: string;
  file_path: string;
  analysis_type: AnalysisType;
  timestamp: string;
  summary: {
    total_issues: number;
    error_count: number;
    warning_count: number;
    info_count: number;
    languages_detected: string[];
    total_files: number;
  };
  issues_by_priority: IssuesByPriority;
  fix_recommendations: FixRecommendations;
  project_structure: ProjectStructure;
  detection_metadata: {
    detection_tools: string[];
    analysis_time: number;
    project_path: string;
  };
}

export interface DownloadableReport {
  report_info: {
    generated_at: string;
    file_path: string;
    task_id: string;
    total_issues: number;
    summary: {
      error_count: number;
      warning_count: number;
      info_count: number;
    };
    detection_tools: string[];
  };
  issues: Finding[];
  statistics: {
    by_severity: Record<string, number>;
    by_type: Record<string, number>;
  };
}

export interface RelayConfig {
  tasksDir: string;
  outDir: string;
  maxWaitMs: number;
  pollIntervalMs: number;
  failFast: boolean;
  analysisType: AnalysisType;
  verbose: boolean;
}
