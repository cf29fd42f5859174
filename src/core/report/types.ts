import type { FilterLevel } from '../config/schema.js';
import type { AnalyzeTextResult } from '../safety/types.js';

/**
 * One piece of text to scan, with where it came from (file or file:line).
 */
export interface ScanItem {
  source: string;
  text: string;
}

export interface ScanEntry {
  source: string;
  result?: AnalyzeTextResult;
  error?: string;
  /** Violates the threshold or matched a blocklist */
  flagged: boolean;
}

export interface CategoryStats {
  maxSeverity: number;
  /** Items whose severity in this category reached the threshold */
  flagged: number;
  /** severity -> item count */
  histogram: Record<number, number>;
}

export interface ScanReport {
  threshold: FilterLevel;
  total: number;
  analyzed: number;
  failed: number;
  flagged: number;
  blocklistHits: number;
  categories: Record<string, CategoryStats>;
  entries: ScanEntry[];
}

export interface ScanOptions {
  threshold: FilterLevel;
  concurrency: number;
  blocklistNames?: string[];
}
