import type { Finding, PriorityTier, StructuredPayload } from '../types.js';
import { PRIORITY_TIERS } from '../analysis/priority.js';
import type { JobOutcome } from '../jobs/scheduler.js';

// ANSI color codes (no external dependency needed for basic colors)
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GREEN = '\x1b[32m';
const CYAN = '\x1b[36m';
const MAGENTA = '\x1b[35m';
const DIM = '\x1b[2m';

function tierColor(tier: PriorityTier): string {
  switch (tier) {
    case 'critical': return `${BOLD}${RED}`;
    case 'high': return RED;
    case 'medium': return YELLOW;
    case 'low': return CYAN;
  }
}

function printFinding(f: Finding, tier: PriorityTier): void {
  const color = tierColor(tier);
  console.log(`  ${color}[${tier.toUpperCase()}]${RESET} ${BOLD}${f.type}${RESET}: ${f.message}`);
  console.log(`    ${DIM}File:${RESET} ${f.file}:${f.line}`);
}

export function printPayloadSummary(payload: StructuredPayload, verbose: boolean = false): void {
  console.log();
  console.log(`${BOLD}${MAGENTA}=== Task ${payload.task_id} ===${RESET}`);
  console.log(`${DIM}${payload.file_path} (${payload.analysis_type}) at ${payload.timestamp}${RESET}`);
  console.log();

  const s = payload.summary;
  if (s.total_issues === 0) {
    console.log(`${GREEN}${BOLD}No issues reported.${RESET}`);
  } else {
    console.log(`${BOLD}Total issues:${RESET} ${s.total_issues}  ` +
      `${RED}errors: ${s.error_count}${RESET}  ${YELLOW}warnings: ${s.warning_count}${RESET}  ${CYAN}info: ${s.info_count}${RESET}`);
    const byTier = PRIORITY_TIERS.map(tier => {
      const count = payload.issues_by_priority[tier].length;
      return count > 0 ? `${tierColor(tier)}${tier}: ${count}${RESET}` : null;
    }).filter(Boolean).join('  ');
    if (byTier) console.log(`${BOLD}By priority:${RESET} ${byTier}`);
  }
  console.log();

  if (verbose) {
    for (const tier of PRIORITY_TIERS) {
      for (const f of payload.issues_by_priority[tier]) printFinding(f, tier);
    }
    console.log();
  }

  const recs = payload.fix_recommendations;
  const sections: Array<[string, string[]]> = [
    ['Immediate actions', recs.immediate_actions],
    ['Short-term improvements', recs.short_term_improvements],
    ['Long-term optimizations', recs.long_term_optimizations],
  ];
  for (const [title, items] of sections) {
    if (items.length === 0) continue;
    console.log(`${BOLD}${title}:${RESET}`);
    for (const item of items) console.log(`  - ${item}`);
  }

  const ci = payload.project_structure.complexity_indicators;
  console.log('─'.repeat(60));
  console.log(`${BOLD}Files:${RESET} ${payload.project_structure.file_count}  ` +
    `${BOLD}High-issue files:${RESET} ${ci.high_issue_files}  ` +
    `${BOLD}Avg issues/file:${RESET} ${ci.average_issues_per_file.toFixed(2)}`);
  console.log();
}

export function formatOutcome(outcome: JobOutcome): string {
  const color = outcome.status === 'written' ? GREEN : outcome.status === 'error' ? RED : YELLOW;
  const detail = outcome.status === 'written' ? outcome.paths.join(', ') : (outcome.error ?? '');
  return `${outcome.taskId} ${outcome.job.padEnd(8)}${color}${outcome.status}${RESET}${detail ? ` ${DIM}${detail}${RESET}` : ''}`;
}
