import fs from 'fs';
import path from 'path';
import type { ArtifactKind, DownloadableReport, StructuredPayload } from '../types.js';
import { ArtifactNotFoundError } from '../errors.js';
import { isValidTaskId } from '../detection/taskStore.js';
import { serializePayload } from '../report/payload.js';

export interface ArtifactStore {
  writeNarrative(taskId: string, markdown: string): Promise<string>;
  readNarrative(taskId: string): Promise<string>;
  writePayload(taskId: string, payload: StructuredPayload): Promise<string>;
  readPayload(taskId: string): Promise<StructuredPayload>;
  writeDownloadable(taskId: string, report: DownloadableReport): Promise<string>;
  readDownloadable(taskId: string): Promise<DownloadableReport>;
  has(kind: ArtifactKind, taskId: string): Promise<boolean>;
}

// No instanceof: fs errors may belong to another realm.
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Artifacts as files under `outDir`:
 *   reports/ai_report_<id>.md
 *   reports/detection_report_<id>.json
 *   structured_data/structured_data_<id>.json
 * Writes overwrite; the last writer wins.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(readonly outDir: string) {}

  artifactPath(kind: ArtifactKind, taskId: string): string {
    switch (kind) {
      case 'narrative': return path.join(this.outDir, 'reports', `ai_report_${taskId}.md`);
      case 'downloadable': return path.join(this.outDir, 'reports', `detection_report_${taskId}.json`);
      case 'payload': return path.join(this.outDir, 'structured_data', `structured_data_${taskId}.json`);
    }
  }

  private async write(kind: ArtifactKind, taskId: string, content: string): Promise<string> {
    if (!isValidTaskId(taskId)) throw new Error(`Invalid task id: ${JSON.stringify(taskId)}`);
    const target = this.artifactPath(kind, taskId);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, content, 'utf8');
    return target;
  }

  private async read(kind: ArtifactKind, taskId: string): Promise<string> {
    if (!isValidTaskId(taskId)) throw new ArtifactNotFoundError(kind, taskId);
    try {
      return await fs.promises.readFile(this.artifactPath(kind, taskId), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new ArtifactNotFoundError(kind, taskId);
      }
      throw err;
    }
  }

  writeNarrative(taskId: string, markdown: string): Promise<string> {
    return this.write('narrative', taskId, markdown);
  }

  readNarrative(taskId: string): Promise<string> {
    return this.read('narrative', taskId);
  }

  writePayload(taskId: string, payload: StructuredPayload): Promise<string> {
    return this.write('payload', taskId, serializePayload(payload));
  }

  async readPayload(taskId: string): Promise<StructuredPayload> {
    return JSON.parse(await this.read('payload', taskId)) as StructuredPayload;
  }

  writeDownloadable(taskId: string, report: DownloadableReport): Promise<string> {
    return this.write('downloadable', taskId, JSON.stringify(report, null, 2));
  }

  async readDownloadable(taskId: string): Promise<DownloadableReport> {
    return JSON.parse(await this.read('downloadable', taskId)) as DownloadableReport;
  }

  async has(kind: ArtifactKind, taskId: string): Promise<boolean> {
    if (!isValidTaskId(taskId)) return false;
    return fs.existsSync(this.artifactPath(kind, taskId));
  }
}
