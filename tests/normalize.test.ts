import fs from 'fs';
import os from 'os';
import path from 'path';
import { normalizeFinding, normalizeDetectionResult, countBySeverity } from '../src/detection/normalize';
import { parseTaskRecord } from '../src/detection/provider';
import { FileTaskStore, isValidTaskId } from '../src/detection/taskStore';
import { makeFinding } from './helpers';

describe('normalizeFinding', () => {
  it('substitutes defaults for missing fields', () => {
    expect(normalizeFinding({})).toEqual({ severity: 'info', type: 'unknown', file: 'unknown', line: 0, message: '' });
  });

  it('treats unrecognized severities as info', () => {
    expect(normalizeFinding({ severity: 'fatal' }).severity).toBe('info');
  });

  it('matches severity names exactly', () => {
    expect(normalizeFinding({ severity: 'ERROR' }).severity).toBe('info');
    expect(normalizeFinding({ severity: 'Warning' }).severity).toBe('info');
    expect(normalizeFinding({ severity: 'warning' }).severity).toBe('warning');
  });

  it('treats an empty type as unknown', () => {
    expect(normalizeFinding({ type: '' }).type).toBe('unknown');
  });

  it('clamps bad line numbers to 0', () => {
    expect(normalizeFinding({ line: -4 }).line).toBe(0);
    expect(normalizeFinding({ line: '12' }).line).toBe(0);
    expect(normalizeFinding({ line: 12.7 }).line).toBe(12);
  });

  it('keeps language and column when present', () => {
    expect(normalizeFinding({ severity: 'warning', type: 'style', file: 'main.go', line: 4, column: 2, language: 'go', message: 'm' }))
      .toEqual({ severity: 'warning', type: 'style', file: 'main.go', line: 4, column: 2, language: 'go', message: 'm' });
  });

  it('never throws on non-object input', () => {
    expect(normalizeFinding(null).type).toBe('unknown');
    expect(normalizeFinding('oops').file).toBe('unknown');
  });
});

describe('normalizeDetectionResult', () => {
  it('returns null for missing or empty results', () => {
    expect(normalizeDetectionResult(null, 'x.py')).toBeNull();
    expect(normalizeDetectionResult({}, 'x.py')).toBeNull();
    expect(normalizeDetectionResult([], 'x.py')).toBeNull();
  });

  it('keeps issue order and reads metadata', () => {
    const result = normalizeDetectionResult({
      total_issues: 2,
      issues: [{ type: 'b', line: 2 }, { type: 'a', line: 1 }],
      summary: { error_count: 0, warning_count: 0, info_count: 2 },
      languages_detected: ['python', 3],
      total_files: 4,
      detection_tools: ['flake8'],
      analysis_time: 0.25,
      project_path: 'proj/',
    }, 'uploads/proj.zip');
    expect(result?.issues.map(i => i.type)).toEqual(['b', 'a']);
    expect(result?.languagesDetected).toEqual(['python']);
    expect(result?.totalFiles).toBe(4);
    expect(result?.projectPath).toBe('proj/');
    expect(result?.summary).toEqual({ errorCount: 0, warningCount: 0, infoCount: 2 });
  });
});

describe('countBySeverity', () => {
  it('recounts from the findings', () => {
    expect(countBySeverity([
      makeFinding({ severity: 'error' }),
      makeFinding({ severity: 'info' }),
      makeFinding({ severity: 'info' }),
    ])).toEqual({ errorCount: 1, warningCount: 0, infoCount: 2 });
  });
});

describe('parseTaskRecord', () => {
  it('only keeps the result of a completed task', () => {
    const raw = { id: 't1', status: 'running', result: { detection_results: { total_issues: 1 } } };
    expect(parseTaskRecord(raw, 't1')).toEqual({ id: 't1', status: 'running', result: null });
  });

  it('reads unknown statuses as pending', () => {
    expect(parseTaskRecord({ status: 'queued' }, 't9')).toEqual({ id: 't9', status: 'pending', result: null });
  });

  it('maps the completed envelope', () => {
    const raw = { status: 'completed', result: { detection_results: { total_issues: 0 }, file_path: 'up/a.py' } };
    expect(parseTaskRecord(raw, 't2')?.result).toEqual({ detectionResults: { total_issues: 0 }, filePath: 'up/a.py' });
  });
});

describe('FileTaskStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'detectrelay-tasks-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads a task record from <id>.json', async () => {
    fs.writeFileSync(path.join(tmpDir, 'task_a.json'), JSON.stringify({ id: 'task_a', status: 'pending' }), 'utf8');
    const store = new FileTaskStore(tmpDir);
    expect(await store.getTaskStatus('task_a')).toEqual({ id: 'task_a', status: 'pending', result: null });
  });

  it('returns null for missing, unparseable or unsafe ids', async () => {
    fs.writeFileSync(path.join(tmpDir, 'broken.json'), '{"status": "comp', 'utf8');
    const store = new FileTaskStore(tmpDir);
    expect(await store.getTaskStatus('missing')).toBeNull();
    expect(await store.getTaskStatus('broken')).toBeNull();
    expect(await store.getTaskStatus('../etc/passwd')).toBeNull();
  });

  it('lists task ids sorted', async () => {
    for (const id of ['task_b', 'task_a']) {
      fs.writeFileSync(path.join(tmpDir, `${id}.json`), '{}', 'utf8');
    }
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'ignore me', 'utf8');
    expect(await new FileTaskStore(tmpDir).listTaskIds()).toEqual(['task_a', 'task_b']);
  });

  it('validates task ids', () => {
    expect(isValidTaskId('task_3f2a9c1d0e4b')).toBe(true);
    expect(isValidTaskId('a/b')).toBe(false);
    expect(isValidTaskId('..')).toBe(false);
    expect(isValidTaskId('')).toBe(false);
  });
});
