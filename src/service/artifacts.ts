import type { DetectionResult, DownloadableReport, StructuredPayload, Task, TaskStatusProvider } from '../types.js';
import type { ArtifactStore } from '../storage/artifactStore.js';
import type { DownloadableReportGenerator } from '../report/downloadable.js';
import { SimpleReportGenerator } from '../report/downloadable.js';
import { buildNarrativeReport } from '../report/narrative.js';
import { normalizeDetectionResult } from '../detection/normalize.js';
import { isValidTaskId } from '../detection/taskStore.js';
import { ArtifactNotFoundError, NotFoundError, TaskNotFoundError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { noopLogger } from '../logging/logger.js';

export interface ArtifactServiceOptions {
  provider: TaskStatusProvider;
  store: ArtifactStore;
  reportGenerator?: DownloadableReportGenerator;
  logger?: Logger;
  now?: () => Date;
}

interface CompletedRun {
  result: DetectionResult;
  filePath: string;
}

/**
 * Read side for consumers. A missing task or artifact surfaces as a
 * NotFoundError subclass; a wait that timed out looks the same as an
 * artifact that was never written.
 */
export class ArtifactService {
  private readonly provider: TaskStatusProvider;
  private readonly store: ArtifactStore;
  private readonly reportGenerator: DownloadableReportGenerator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ArtifactServiceOptions) {
    this.provider = options.provider;
    this.store = options.store;
    this.reportGenerator = options.reportGenerator ?? new SimpleReportGenerator();
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  async getTaskStatus(taskId: string): Promise<Task> {
    const task = await this.provider.getTaskStatus(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  async getStructuredPayload(taskId: string): Promise<StructuredPayload> {
    return this.store.readPayload(taskId);
  }

  /** Returns the stored narrative, rendering and storing it first for a completed task. */
  async getNarrativeReport(taskId: string): Promise<string> {
    if (await this.store.has('narrative', taskId)) {
      return this.store.readNarrative(taskId);
    }
    const run = await this.completedRun(taskId, new ArtifactNotFoundError('narrative', taskId));
    const markdown = buildNarrativeReport(run.result, run.filePath);
    await this.store.writeNarrative(taskId, markdown);
    this.logger.info(`Narrative report rendered on demand for task ${taskId}`);
    return markdown;
  }

  async getDownloadableReport(taskId: string): Promise<DownloadableReport> {
    if (await this.store.has('downloadable', taskId)) {
      return this.store.readDownloadable(taskId);
    }
    const run = await this.completedRun(taskId, new ArtifactNotFoundError('downloadable', taskId));
    const report = this.reportGenerator.generate({
      taskId,
      filePath: run.filePath,
      result: run.result,
      generatedAt: this.now().toISOString(),
    });
    await this.store.writeDownloadable(taskId, report);
    return report;
  }

  private async completedRun(taskId: string, missing: NotFoundError): Promise<CompletedRun> {
    // The store cannot hold artifacts under an id it would reject on write.
    if (!isValidTaskId(taskId)) throw missing;
    const task = await this.provider.getTaskStatus(taskId);
    if (!task || task.status !== 'completed' || !task.result) throw missing;
    const filePath = task.result.filePath;
    const result = normalizeDetectionResult(task.result.detectionResults, filePath);
    if (!result) throw missing;
    return { result, filePath };
  }
}
