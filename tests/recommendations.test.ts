import { synthesizeRecommendations, LONG_TERM_RECOMMENDATIONS } from '../src/analysis/recommendations';
import { makeFinding } from './helpers';

describe('synthesizeRecommendations', () => {
  it('only gives the long-term guidance for an empty finding set', () => {
    const recs = synthesizeRecommendations([]);
    expect(recs.immediate_actions).toEqual([]);
    expect(recs.short_term_improvements).toEqual([]);
    expect(recs.long_term_optimizations).toEqual([...LONG_TERM_RECOMMENDATIONS]);
    expect(recs.long_term_optimizations).toHaveLength(2);
  });

  it('cites the error count in immediate actions', () => {
    const recs = synthesizeRecommendations([
      makeFinding({ severity: 'error' }),
      makeFinding({ severity: 'error' }),
      makeFinding({ severity: 'warning' }),
    ]);
    expect(recs.immediate_actions).toEqual(['Fix 2 error-level issue(s)']);
  });

  it('cites the number of security-typed findings regardless of severity', () => {
    const recs = synthesizeRecommendations([
      makeFinding({ severity: 'info', type: 'Security_Misconfig' }),
      makeFinding({ severity: 'warning', type: 'weak_security_header' }),
      makeFinding({ severity: 'warning', type: 'sql_injection' }),
    ]);
    expect(recs.immediate_actions).toEqual(['Prioritize 2 security issue(s)']);
  });

  it('suggests a review only when there are more than 10 warnings', () => {
    const ten = Array.from({ length: 10 }, () => makeFinding({ severity: 'warning' }));
    expect(synthesizeRecommendations(ten).short_term_improvements).toEqual([]);

    const eleven = [...ten, makeFinding({ severity: 'warning' })];
    expect(synthesizeRecommendations(eleven).short_term_improvements).toEqual([
      'Run a code review to work through the large number of warnings',
    ]);
  });
});
