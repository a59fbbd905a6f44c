import type { Finding, IssuesByPriority, PriorityTier } from '../types.js';

export const PRIORITY_TIERS: readonly PriorityTier[] = ['critical', 'high', 'medium', 'low'];

export const SECURITY_KEYWORDS: readonly string[] = [
  'security',
  'vulnerability',
  'injection',
  'xss',
  'csrf',
  'secret',
  'password',
];

export function isSecurityType(type: string): boolean {
  const t = type.toLowerCase();
  return SECURITY_KEYWORDS.some(keyword => t.includes(keyword));
}

export function priorityOf(finding: Finding): PriorityTier {
  if (finding.severity === 'error') {
    return isSecurityType(finding.type) ? 'critical' : 'high';
  }
  if (finding.severity === 'warning') return 'medium';
  return 'low';
}

/** Every finding lands in exactly one tier; emission order is kept within a tier. */
export function classifyByPriority(issues: readonly Finding[]): IssuesByPriority {
  const tiers: IssuesByPriority = { critical: [], high: [], medium: [], low: [] };
  for (const issue of issues) {
    tiers[priorityOf(issue)].push(issue);
  }
  return tiers;
}
