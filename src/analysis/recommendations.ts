import type { Finding, FixRecommendations } from '../types.js';

export const LONG_TERM_RECOMMENDATIONS: readonly string[] = [
  'Set up a continuous integration pipeline that runs code quality checks on every change',
  'Define coding standards and a best-practices guide for the team',
];

export function synthesizeRecommendations(issues: readonly Finding[]): FixRecommendations {
  const recommendations: FixRecommendations = {
    immediate_actions: [],
    short_term_improvements: [],
    long_term_optimizations: [],
  };

  const errorCount = issues.filter(i => i.severity === 'error').length;
  const warningCount = issues.filter(i => i.severity === 'warning').length;
  const securityCount = issues.filter(i => i.type.toLowerCase().includes('security')).length;

  if (errorCount > 0) {
    recommendations.immediate_actions.push(`Fix ${errorCount} error-level issue(s)`);
  }
  if (securityCount > 0) {
    recommendations.immediate_actions.push(`Prioritize ${securityCount} security issue(s)`);
  }
  if (warningCount > 10) {
    recommendations.short_term_improvements.push('Run a code review to work through the large number of warnings');
  }

  recommendations.long_term_optimizations.push(...LONG_TERM_RECOMMENDATIONS);

  return recommendations;
}
