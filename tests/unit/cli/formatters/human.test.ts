/**
 * Tests for the human-readable formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { BLOCKED_BY_REVIEW, HARMFUL_ANALYSIS, TEXT_RESULT, sampleReport } from './fixtures.js';

describe('HumanFormatter', () => {
  const formatter = new HumanFormatter({ colors: false });

  describe('formatTextAnalysis', () => {
    it('should show a severity bar per category and blocklist matches', () => {
      expect(formatter.formatTextAnalysis(TEXT_RESULT).split('\n')).toEqual([
        'Categories:',
        '  Hate      ░░░░░░░ 0',
        '  Violence  ████░░░ 4',
        '',
        'Blocklist matches (1):',
        '  - "word" (list1, id id-1)',
      ]);
    });

    it('should note an empty analysis', () => {
      expect(formatter.formatTextAnalysis({ blocklistsMatch: [], categoriesAnalysis: [] })).toBe(
        'No categories returned'
      );
    });

    it('should cap the bar at seven', () => {
      const output = formatter.formatImageAnalysis({ categoriesAnalysis: [{ category: 'Sexual', severity: 9 }] });
      expect(output).toBe('Categories:\n  Sexual    ███████ 9');
    });
  });

  it('should format shield results', () => {
    const output = formatter.formatShield({
      userPromptAnalysis: { attackDetected: true },
      documentsAnalysis: [{ attackDetected: false }, { attackDetected: true }],
    });
    expect(output).toBe(
      'User prompt: attack detected\nDocuments:\n  [1] no attack detected\n  [2] attack detected'
    );
  });

  describe('formatGroundedness', () => {
    it('should list ungrounded segments with reasons', () => {
      const output = formatter.formatGroundedness({
        ungroundedDetected: true,
        ungroundedPercentage: 0.25,
        ungroundedDetails: [{ text: '12/hour', reason: 'The source says 10/hour' }, { text: 'always' }],
      });
      expect(output.split('\n')).toEqual([
        'Ungrounded content detected (25.0% of text)',
        '  - "12/hour"',
        '      reason: The source says 10/hour',
        '  - "always"',
      ]);
    });

    it('should report grounded text', () => {
      expect(
        formatter.formatGroundedness({ ungroundedDetected: false, ungroundedPercentage: 0, ungroundedDetails: [] })
      ).toBe('Text is grounded in the provided sources');
    });
  });

  describe('blocklists', () => {
    it('should format blocklists', () => {
      expect(formatter.formatBlocklists([])).toBe('No blocklists');
      expect(
        formatter.formatBlocklists([{ blocklistName: 'a', description: 'first' }, { blocklistName: 'b' }])
      ).toBe('Blocklists (2):\n  a - first\n  b');
    });

    it('should format items', () => {
      expect(formatter.formatBlocklistItems([])).toBe('No blocklist items');
      expect(
        formatter.formatBlocklistItems([
          { blocklistItemId: 'id-1', text: 'word', description: 'slur' },
          { blocklistItemId: 'id-2', text: 'other' },
        ])
      ).toBe('Items (2):\n  id-1  "word" (slur)\n  id-2  "other"');
    });

    it('should format the workflow result in order', () => {
      const output = formatter.formatWorkflow({
        blocklist: { blocklistName: 'list1', description: 'demo' },
        items: [{ blocklistItemId: 'id-1', text: 'word' }],
        analysis: TEXT_RESULT,
      });
      expect(output.split('\n').slice(0, 5)).toEqual([
        'Blocklist: list1 - demo',
        '',
        'Items (1):',
        '  id-1  "word"',
        '',
      ]);
      expect(output).toContain('Blocklist matches (1):');
    });
  });

  describe('formatFilterDecision', () => {
    it('should explain a block by review', () => {
      expect(formatter.formatFilterDecision(BLOCKED_BY_REVIEW)).toBe(
        '✗ BLOCKED at review: Violence (severity 6)\n   Review: harmful by openai\n   Added to blocklist'
      );
    });

    it('should explain a blocklist hit', () => {
      const output = formatter.formatFilterDecision({
        action: 'block',
        stage: 'blocklist',
        blocklisted: false,
        analysis: TEXT_RESULT,
      });
      expect(output).toBe('✗ BLOCKED at blocklist\n   matched "word" in list1');
    });

    it('should mention the flagged category when allowed at the secondary stage', () => {
      const output = formatter.formatFilterDecision({
        action: 'allow',
        stage: 'secondary',
        flagged: { category: 'Hate', severity: 4 },
        blocklisted: false,
        analysis: HARMFUL_ANALYSIS,
      });
      expect(output).toBe('✓ ALLOWED at secondary: flagged Hate (severity 4)');
    });

    it('should note the fallback policy when no review ran', () => {
      const output = formatter.formatFilterDecision({
        action: 'allow',
        stage: 'review',
        category: 'Violence',
        severity: 6,
        blocklisted: false,
        analysis: HARMFUL_ANALYSIS,
      });
      expect(output).toBe(
        '✓ ALLOWED at review: Violence (severity 6)\n   Review unavailable; unresolved_review policy applied (allow)'
      );
    });

    it('should show review errors, the raw answer and categories when verbose', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });
      const output = verbose.formatFilterDecision({
        ...BLOCKED_BY_REVIEW,
        action: 'allow',
        review: { provider: 'anthropic', verdict: 'not_harmful', answer: 'Not Harmful' },
        blocklisted: false,
      });
      expect(output.split('\n')).toEqual([
        '✓ ALLOWED at review: Violence (severity 6)',
        '   Review: not harmful by anthropic',
        '   Answer: Not Harmful',
        '',
        'Categories:',
        '  Violence  ██████░ 6',
      ]);
    });

    it('should include the review error', () => {
      const output = formatter.formatFilterDecision({
        ...BLOCKED_BY_REVIEW,
        review: { provider: 'openai', verdict: 'inconclusive', error: 'timeout' },
        blocklisted: false,
      });
      expect(output.split('\n')[1]).toBe('   Review: inconclusive by openai (timeout)');
    });
  });

  describe('formatReport', () => {
    it('should summarize counts, categories, flagged items and errors', () => {
      expect(formatter.formatReport(sampleReport()).split('\n')).toEqual([
        'Scanned 4 item(s): 3 analyzed, 1 failed',
        'Flagged: 2 (threshold medium, severity >= 4)',
        'Blocklist hits: 1',
        '',
        'Category  Max  Flagged  Histogram',
        'Hate      4    1        0:2 4:1',
        'Violence  6    1        0:1 2:1 6:1',
        '',
        'Flagged items:',
        '  - b.txt',
        '  - c.txt:3',
        '',
        'Errors:',
        '  - d.txt: boom',
      ]);
    });

    it('should list every entry when verbose', () => {
      const verbose = new HumanFormatter({ colors: false, verbose: true });
      expect(verbose.formatReport(sampleReport()).split('\n').slice(-4)).toEqual([
        '  ✓ a.txt',
        '  ✗ b.txt',
        '  ✗ c.txt:3',
        '  ! d.txt: boom',
      ]);
    });
  });

  it('should list providers', () => {
    const output = formatter.formatProviders([
      { name: 'openai', available: true, model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' },
      { name: 'anthropic', available: false, model: 'claude-3-haiku-20240307', baseUrl: 'https://api.anthropic.com' },
    ]);
    expect(output).toBe(
      'Available LLM Providers:\n' +
        '  openai: available (model: gpt-4o-mini) [https://api.openai.com/v1]\n' +
        '  anthropic: not configured (model: claude-3-haiku-20240307) [https://api.anthropic.com]'
    );
  });
});
