import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import type { Task, TaskStatusProvider } from '../types.js';
import { parseTaskRecord } from './provider.js';

const TASK_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isValidTaskId(taskId: string): boolean {
  return TASK_ID_PATTERN.test(taskId) && taskId !== '.' && taskId !== '..';
}

/**
 * Task records kept as `<tasksDir>/<taskId>.json` by the detector.
 * This side only reads them.
 */
export class FileTaskStore implements TaskStatusProvider {
  constructor(readonly tasksDir: string) {}

  taskPath(taskId: string): string {
    return path.join(this.tasksDir, `${taskId}.json`);
  }

  async getTaskStatus(taskId: string): Promise<Task | null> {
    if (!isValidTaskId(taskId)) return null;
    let text: string;
    try {
      text = await fs.promises.readFile(this.taskPath(taskId), 'utf8');
    } catch {
      return null;
    }
    try {
      return parseTaskRecord(JSON.parse(text), taskId);
    } catch {
      // A record caught mid-write parses as "not yet available"
      return null;
    }
  }

  async listTaskIds(): Promise<string[]> {
    const files = await fg('*.json', {
      cwd: this.tasksDir,
      onlyFiles: true,
      followSymbolicLinks: false,
    });
    return files
      .map(f => path.basename(f, '.json'))
      .filter(isValidTaskId)
      .sort();
  }
}
