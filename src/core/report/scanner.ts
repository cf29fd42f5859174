/**
 * Batch analysis of many texts, aggregated into a severity report.
 */
import type { ContentSafetyClient } from '../safety/client.js';
import type { AnalyzeTextResult } from '../safety/types.js';
import type { FilterLevel } from '../config/schema.js';
import { readFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { LEVEL_MIN_SEVERITY, findViolation } from '../filter/levels.js';
import type { CategoryStats, ScanEntry, ScanItem, ScanOptions, ScanReport } from './types.js';

/**
 * Analyze items in batches of `concurrency`.
 * A failed item becomes an error entry; the rest of the batch carries on.
 */
export async function scanTexts(
  client: ContentSafetyClient,
  items: ScanItem[],
  options: ScanOptions
): Promise<ScanEntry[]> {
  const entries: ScanEntry[] = [];
  const concurrency = Math.max(1, options.concurrency);

  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    const results = await Promise.allSettled(
      batch.map((item) =>
        client.analyzeText({ text: item.text, blocklistNames: options.blocklistNames })
      )
    );

    for (let j = 0; j < results.length; j++) {
      const settled = results[j];
      const source = batch[j].source;
      if (settled.status === 'fulfilled') {
        entries.push({
          source,
          result: settled.value,
          flagged: isFlagged(settled.value, options.threshold),
        });
      } else {
        entries.push({ source, error: errorMessage(settled.reason), flagged: false });
      }
    }
  }

  return entries;
}

export function isFlagged(result: AnalyzeTextResult, threshold: FilterLevel): boolean {
  return result.blocklistsMatch.length > 0 || findViolation(result, threshold) !== undefined;
}

export function buildReport(entries: ScanEntry[], threshold: FilterLevel): ScanReport {
  const min = LEVEL_MIN_SEVERITY[threshold];
  const categories: Record<string, CategoryStats> = {};
  let analyzed = 0;
  let failed = 0;
  let flagged = 0;
  let blocklistHits = 0;

  for (const entry of entries) {
    if (!entry.result) {
      failed++;
      continue;
    }
    analyzed++;
    if (entry.flagged) flagged++;
    if (entry.result.blocklistsMatch.length > 0) blocklistHits++;

    for (const item of entry.result.categoriesAnalysis) {
      const severity = item.severity ?? 0;
      if (!categories[item.category]) {
        categories[item.category] = { maxSeverity: 0, flagged: 0, histogram: {} };
      }
      const stats = categories[item.category];
      stats.maxSeverity = Math.max(stats.maxSeverity, severity);
      stats.histogram[severity] = (stats.histogram[severity] ?? 0) + 1;
      if (severity >= min) stats.flagged++;
    }
  }

  return {
    threshold,
    total: entries.length,
    analyzed,
    failed,
    flagged,
    blocklistHits,
    categories,
    entries,
  };
}

/**
 * Turn files into scan items: one per file, or one per non-empty line.
 */
export async function collectScanItems(
  files: string[],
  options: { lines: boolean; displayPath?: (file: string) => string }
): Promise<ScanItem[]> {
  const items: ScanItem[] = [];
  const display = options.displayPath ?? ((file: string) => file);

  for (const file of files) {
    const content = await readFile(file);
    if (!options.lines) {
      if (content.trim()) {
        items.push({ source: display(file), text: content });
      }
      continue;
    }

    const lines = content.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
      if (lines[i].trim()) {
        items.push({ source: `${display(file)}:${i + 1}`, text: lines[i] });
      }
    }
  }

  return items;
}
