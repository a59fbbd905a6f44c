import type { ArtifactKind } from './types.js';

export class WaitTimeoutError extends Error {
  readonly taskId: string;
  readonly waitedMs: number;

  constructor(taskId: string, waitedMs: number) {
    super(`Task ${taskId} did not complete within ${waitedMs}ms`);
    this.name = 'WaitTimeoutError';
    this.taskId = taskId;
    this.waitedMs = waitedMs;
  }
}

export class WaitCancelledError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Wait for task ${taskId} was cancelled`);
    this.name = 'WaitCancelledError';
    this.taskId = taskId;
  }
}

export class TaskFailedError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} reported status "failed"`);
    this.name = 'TaskFailedError';
    this.taskId = taskId;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class TaskNotFoundError extends NotFoundError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} does not exist`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class ArtifactNotFoundError extends NotFoundError {
  readonly taskId: string;
  readonly kind: ArtifactKind;

  constructor(kind: ArtifactKind, taskId: string) {
    super(`No ${kind} artifact stored for task ${taskId}`);
    this.name = 'ArtifactNotFoundError';
    this.taskId = taskId;
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
