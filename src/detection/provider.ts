import type { DetectionEnvelope, Task, TaskStatus, TaskStatusProvider } from '../types.js';
import { isRecord } from './normalize.js';

const STATUSES: readonly TaskStatus[] = ['pending', 'running', 'completed', 'failed'];

function parseStatus(value: unknown): TaskStatus {
  return STATUSES.find(s => s === value) ?? 'pending';
}

function parseEnvelope(value: unknown): DetectionEnvelope | null {
  if (!isRecord(value)) return null;
  return {
    detectionResults: value.detection_results ?? null,
    filePath: typeof value.file_path === 'string' ? value.file_path : '',
  };
}

/**
 * Reads a task record as the detector writes it
 * (`{ id, status, result: { detection_results, file_path } }`).
 * Unknown statuses read as pending; `result` is only kept on completed tasks.
 */
export function parseTaskRecord(raw: unknown, taskId: string): Task | null {
  if (!isRecord(raw)) return null;
  const status = parseStatus(raw.status);
  return {
    id: typeof raw.id === 'string' && raw.id.length > 0 ? raw.id : taskId,
    status,
    result: status === 'completed' ? parseEnvelope(raw.result) : null,
  };
}

/** In-process provider for embedding and tests. */
export class MemoryTaskStore implements TaskStatusProvider {
  private readonly tasks = new Map<string, Task>();

  set(task: Task): void {
    this.tasks.set(task.id, task);
  }

  delete(taskId: string): void {
    this.tasks.delete(taskId);
  }

  async getTaskStatus(taskId: string): Promise<Task | null> {
    return this.tasks.get(taskId) ?? null;
  }
}
