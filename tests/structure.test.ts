import { analyzeStructure } from '../src/analysis/structure';
import { makeFinding, makeResult } from './helpers';

describe('analyzeStructure', () => {
  it('reports zero complexity for no findings', () => {
    const structure = analyzeStructure(makeResult([]), 'file');
    expect(structure.complexity_indicators).toEqual({ high_issue_files: 0, average_issues_per_file: 0 });
  });

  it('counts files with more than five findings and averages over distinct files', () => {
    const issues = [
      ...Array.from({ length: 6 }, (_, i) => makeFinding({ file: 'a.py', line: i + 1 })),
      makeFinding({ file: 'b.py' }),
    ];
    const structure = analyzeStructure(makeResult(issues), 'project');
    expect(structure.complexity_indicators.high_issue_files).toBe(1);
    expect(structure.complexity_indicators.average_issues_per_file).toBe(3.5);
  });

  it('does not count a file with exactly five findings', () => {
    const issues = Array.from({ length: 5 }, () => makeFinding({ file: 'a.py' }));
    expect(analyzeStructure(makeResult(issues), 'file').complexity_indicators.high_issue_files).toBe(0);
  });

  it('passes run metadata through', () => {
    const structure = analyzeStructure(
      makeResult([], { totalFiles: 12, languagesDetected: ['python', 'go'] }),
      'project'
    );
    expect(structure.analysis_type).toBe('project');
    expect(structure.file_count).toBe(12);
    expect(structure.languages).toEqual(['python', 'go']);
  });
});
