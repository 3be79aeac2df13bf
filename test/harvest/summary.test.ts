import { describe, it, expect } from 'vitest';
import { formatSummary } from '../../src/harvest/summary.js';

describe('formatSummary', () => {
  it('should align one line per dataset', () => {
    const text = formatSummary([
      { dataset: 'events', candidates: 2, alreadyPresent: 0, written: 2, failed: 0 },
      { dataset: 'contest_results', candidates: 3, alreadyPresent: 1, written: 4, failed: 1 },
    ]);

    expect(text.split('\n')).toEqual([
      'events           written=2 already_present=0 failed=0',
      'contest_results  written=4 already_present=1 failed=1',
    ]);
  });
});
