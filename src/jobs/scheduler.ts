import type { AnalysisType, DetectionResult, RelayConfig, TaskStatusProvider } from '../types.js';
import type { ArtifactStore } from '../storage/artifactStore.js';
import type { Logger } from '../logging/logger.js';
import { noopLogger } from '../logging/logger.js';
import type { Sleep } from '../waiter/completion.js';
import { waitForCompletion } from '../waiter/completion.js';
import { normalizeDetectionResult } from '../detection/normalize.js';
import { buildNarrativeReport } from '../report/narrative.js';
import { buildStructuredPayload } from '../report/payload.js';
import type { DownloadableReportGenerator } from '../report/downloadable.js';
import { SimpleReportGenerator } from '../report/downloadable.js';
import { TaskFailedError, WaitCancelledError, WaitTimeoutError, errorMessage } from '../errors.js';

export type JobName = 'report' | 'payload';
export type JobStatus = 'written' | 'timeout' | 'cancelled' | 'task-failed' | 'no-results' | 'error';

export interface JobOutcome {
  job: JobName;
  taskId: string;
  status: JobStatus;
  paths: string[];
  error?: string;
}

export interface JobHandle {
  readonly name: JobName;
  readonly taskId: string;
  /** Settles with the outcome; never rejects. */
  readonly done: Promise<JobOutcome>;
  cancel(): void;
}

export interface ScheduleRequest {
  taskId: string;
  filePath: string;
  analysisType?: AnalysisType;
}

export interface ScheduledJobs {
  report: JobHandle;
  payload: JobHandle;
}

export interface SchedulerOptions {
  provider: TaskStatusProvider;
  store: ArtifactStore;
  config: Pick<RelayConfig, 'maxWaitMs' | 'pollIntervalMs' | 'failFast' | 'analysisType'>;
  logger?: Logger;
  reportGenerator?: DownloadableReportGenerator;
  now?: () => Date;
  sleep?: Sleep;
}

type JobBody = (result: DetectionResult, filePath: string) => Promise<string[]>;

/**
 * Runs the two post-completion jobs for a task (narrative report, structured
 * payload). Each job has its own wait loop, timeout and cancellation; a
 * failure in one is logged and does not touch the other.
 */
export class ArtifactJobScheduler {
  private readonly provider: TaskStatusProvider;
  private readonly store: ArtifactStore;
  private readonly config: SchedulerOptions['config'];
  private readonly logger: Logger;
  private readonly reportGenerator: DownloadableReportGenerator;
  private readonly now: () => Date;
  private readonly sleep?: Sleep;
  private readonly live = new Set<JobHandle>();

  constructor(options: SchedulerOptions) {
    this.provider = options.provider;
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
    this.reportGenerator = options.reportGenerator ?? new SimpleReportGenerator();
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
  }

  schedule(request: ScheduleRequest): ScheduledJobs {
    const analysisType = request.analysisType ?? this.config.analysisType;

    const report = this.start('report', request, async (result, filePath) => {
      const narrativePath = await this.store.writeNarrative(request.taskId, buildNarrativeReport(result, filePath));
      const downloadable = this.reportGenerator.generate({
        taskId: request.taskId,
        filePath,
        result,
        generatedAt: this.now().toISOString(),
      });
      const downloadPath = await this.store.writeDownloadable(request.taskId, downloadable);
      return [narrativePath, downloadPath];
    });

    const payload = this.start('payload', request, async (result, filePath) => {
      const doc = buildStructuredPayload(result, {
        taskId: request.taskId,
        filePath,
        analysisType,
        generatedAt: this.now().toISOString(),
      });
      return [await this.store.writePayload(request.taskId, doc)];
    });

    return { report, payload };
  }

  get activeJobs(): number {
    return this.live.size;
  }

  cancelAll(): void {
    for (const handle of this.live) handle.cancel();
  }

  async whenIdle(): Promise<JobOutcome[]> {
    return Promise.all([...this.live].map(h => h.done));
  }

  private start(name: JobName, request: ScheduleRequest, body: JobBody): JobHandle {
    const controller = new AbortController();
    const { taskId } = request;

    const run = async (): Promise<JobOutcome> => {
      const outcome = (status: JobStatus, paths: string[] = [], error?: string): JobOutcome =>
        ({ job: name, taskId, status, paths, ...(error !== undefined ? { error } : {}) });

      try {
        const envelope = await waitForCompletion(taskId, this.provider, {
          maxWaitMs: this.config.maxWaitMs,
          pollIntervalMs: this.config.pollIntervalMs,
          failFast: this.config.failFast,
          signal: controller.signal,
          sleep: this.sleep,
          logger: this.logger,
        });

        const filePath = request.filePath || envelope.filePath;
        const result = normalizeDetectionResult(envelope.detectionResults, filePath);
        if (!result) {
          this.logger.warn(`Task ${taskId} has no detection results`, { job: name });
          return outcome('no-results');
        }

        const paths = await body(result, filePath);
        this.logger.info(`${name} written for task ${taskId}`, { paths });
        return outcome('written', paths);
      } catch (err) {
        if (err instanceof WaitTimeoutError) {
          this.logger.warn(`Task ${taskId} timed out; no ${name} generated`, { waitedMs: err.waitedMs });
          return outcome('timeout', [], err.message);
        }
        if (err instanceof WaitCancelledError) {
          this.logger.info(`${name} job for task ${taskId} cancelled`);
          return outcome('cancelled', [], err.message);
        }
        if (err instanceof TaskFailedError) {
          this.logger.warn(`Task ${taskId} failed; no ${name} generated`);
          return outcome('task-failed', [], err.message);
        }
        this.logger.error(`${name} job for task ${taskId} failed: ${errorMessage(err)}`);
        return outcome('error', [], errorMessage(err));
      }
    };

    let handle: JobHandle;
    const done = run().finally(() => {
      this.live.delete(handle);
    });
    handle = {
      name,
      taskId,
      done,
      cancel: () => controller.abort(),
    };
    this.live.add(handle);
    return handle;
  }
}
