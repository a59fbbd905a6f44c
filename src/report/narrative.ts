import type { DetectionResult, Finding } from '../types.js';
import { countBySeverity } from '../detection/normalize.js';
import { errorMessage } from '../errors.js';

export const REPORT_TITLE = '# Code Analysis Report';

/** Display limit per section; summary counts always cover every finding. */
export const SECTION_LIMIT = 5;

// Checked in this order; types outside the table get no suggestion line.
export const QUALITY_ADVISORIES: ReadonlyArray<readonly [string, string]> = [
  ['unhandled_exception', '**Exception handling**: wrap risky operations in try/catch blocks and handle the failure paths'],
  ['potential_division_by_zero', '**Division checks**: verify the divisor is non-zero before dividing'],
  ['unused_import', '**Cleanup**: remove unused import statements'],
  ['missing_docstring', '**Documentation**: add docstrings to functions and classes'],
  ['hardcoded_secrets', '**Security**: move hardcoded secrets into environment variables or a configuration store'],
];

const NO_ISSUES_REPORT = [
  REPORT_TITLE,
  '',
  '## Result',
  '',
  '✅ No obvious code defects were found.',
  '',
  '## Recommendations',
  '',
  '- Code quality looks good; keep it that way',
  '- Consider adding more unit tests',
  '- Keep reviewing code regularly',
  '',
].join('\n');

function pushIssueSection(lines: string[], heading: string, issues: Finding[], advice: string): void {
  if (issues.length === 0) return;
  lines.push(heading);
  lines.push('');
  for (const issue of issues.slice(0, SECTION_LIMIT)) {
    lines.push(`### ${issue.type}`);
    lines.push(`- **Location**: line ${issue.line}`);
    lines.push(`- **Description**: ${issue.message}`);
    lines.push(`- **Advice**: ${advice}`);
    lines.push('');
  }
}

function renderReport(result: DetectionResult, filePath: string): string {
  if (result.totalIssues === 0) return NO_ISSUES_REPORT;

  const errors = result.issues.filter(i => i.severity === 'error');
  const warnings = result.issues.filter(i => i.severity === 'warning');
  const counts = countBySeverity(result.issues);

  const lines: string[] = [];
  lines.push(REPORT_TITLE);
  lines.push('');
  lines.push('## File Information');
  lines.push('');
  lines.push(`- **File path**: ${filePath}`);
  lines.push(`- **Total issues**: ${result.totalIssues}`);
  lines.push(`- **Errors**: ${counts.errorCount}`);
  lines.push(`- **Warnings**: ${counts.warningCount}`);
  lines.push(`- **Info**: ${counts.infoCount}`);
  lines.push('');

  pushIssueSection(lines, '## 🚨 Critical Issues', errors, 'Needs immediate fix');
  pushIssueSection(lines, '## ⚠️ Warnings', warnings, 'Fix to improve code quality');

  lines.push('## 💡 Quality Suggestions');
  lines.push('');
  const presentTypes = new Set(result.issues.map(i => i.type));
  for (const [type, advisory] of QUALITY_ADVISORIES) {
    if (presentTypes.has(type)) lines.push(`- ${advisory}`);
  }
  lines.push('');

  lines.push('## 📊 Summary');
  lines.push('');
  if (counts.errorCount > 0) lines.push(`Found ${counts.errorCount} error(s) that need immediate fixes.`);
  if (counts.warningCount > 0) lines.push(`Found ${counts.warningCount} warning(s) worth fixing.`);
  if (counts.infoCount > 0) lines.push(`Found ${counts.infoCount} informational note(s) that could be improved.`);
  lines.push('');
  lines.push('Work through these issues in priority order to improve code quality and maintainability.');
  lines.push('');

  return lines.join('\n');
}

/**
 * Renders the Markdown narrative for one analysis run. Never throws: a
 * rendering failure produces a short report carrying the error message.
 */
export function buildNarrativeReport(result: DetectionResult, filePath: string): string {
  try {
    return renderReport(result, filePath);
  } catch (err) {
    return `${REPORT_TITLE}\n\n## Error\n\nThe report could not be generated: ${errorMessage(err)}\n`;
  }
}
