/**
 * Shared results for formatter tests.
 */
import type { AnalyzeTextResult } from '../../../../src/core/safety/types.js';
import type { FilterDecision } from '../../../../src/core/filter/types.js';
import type { ScanReport } from '../../../../src/core/report/types.js';
import { buildReport } from '../../../../src/core/report/scanner.js';

export const TEXT_RESULT: AnalyzeTextResult = {
  blocklistsMatch: [{ blocklistName: 'list1', blocklistItemId: 'id-1', blocklistItemText: 'word' }],
  categoriesAnalysis: [
    { category: 'Hate', severity: 0 },
    { category: 'Violence', severity: 4 },
  ],
};

export const HARMFUL_ANALYSIS: AnalyzeTextResult = {
  blocklistsMatch: [],
  categoriesAnalysis: [{ category: 'Violence', severity: 6 }],
};

export const BLOCKED_BY_REVIEW: FilterDecision = {
  action: 'block',
  stage: 'review',
  category: 'Violence',
  severity: 6,
  review: { provider: 'openai', verdict: 'harmful', answer: 'Harmful' },
  blocklisted: true,
  analysis: HARMFUL_ANALYSIS,
};

export function sampleReport(): ScanReport {
  const analysis = (hate: number, violence: number, hit = false): AnalyzeTextResult => ({
    blocklistsMatch: hit ? [{ blocklistName: 'list1', blocklistItemId: 'id-1', blocklistItemText: 'word' }] : [],
    categoriesAnalysis: [
      { category: 'Hate', severity: hate },
      { category: 'Violence', severity: violence },
    ],
  });
  return buildReport(
    [
      { source: 'a.txt', result: analysis(0, 2), flagged: false },
      { source: 'b.txt', result: analysis(4, 6), flagged: true },
      { source: 'c.txt:3', result: analysis(0, 0, true), flagged: true },
      { source: 'd.txt', error: 'boom', flagged: false },
    ],
    'medium'
  );
}
