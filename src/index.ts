export type * from './types.js';
export * from './errors.js';
export { normalizeFinding, normalizeDetectionResult, countBySeverity } from './detection/normalize.js';
export { parseTaskRecord, MemoryTaskStore } from './detection/provider.js';
export { FileTaskStore, isValidTaskId } from './detection/taskStore.js';
export { waitForCompletion, defaultSleep } from './waiter/completion.js';
export type { WaitOptions, Sleep } from './waiter/completion.js';
export { classifyByPriority, priorityOf, PRIORITY_TIERS, SECURITY_KEYWORDS } from './analysis/priority.js';
export { synthesizeRecommendations } from './analysis/recommendations.js';
export { analyzeStructure } from './analysis/structure.js';
export { buildNarrativeReport } from './report/narrative.js';
export { buildStructuredPayload, serializePayload } from './report/payload.js';
export type { PayloadContext } from './report/payload.js';
export { SimpleReportGenerator } from './report/downloadable.js';
export type { DownloadableReportGenerator, DownloadableReportInput } from './report/downloadable.js';
export { FileArtifactStore } from './storage/artifactStore.js';
export type { ArtifactStore } from './storage/artifactStore.js';
export { ArtifactJobScheduler } from './jobs/scheduler.js';
export type { JobHandle, JobOutcome, JobStatus, JobName, ScheduleRequest, ScheduledJobs, SchedulerOptions } from './jobs/scheduler.js';
export { ArtifactService } from './service/artifacts.js';
export type { ArtifactServiceOptions } from './service/artifacts.js';
export { loadConfig } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { createConsoleLogger, noopLogger } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';
