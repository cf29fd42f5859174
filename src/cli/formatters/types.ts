/**
 * Formatter type definitions.
 */
import type {
  AnalyzeImageResult,
  AnalyzeTextResult,
  Blocklist,
  BlocklistItem,
  BlocklistWorkflowResult,
  GroundednessResult,
  ShieldPromptResult,
} from '../../core/safety/types.js';
import type { FilterDecision } from '../../core/filter/types.js';
import type { ScanReport } from '../../core/report/types.js';
import type { LLMProvider } from '../../llm/types.js';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output (per-entry scan details, raw review answers) */
  verbose: boolean;
}

export interface ProviderInfo {
  name: LLMProvider;
  available: boolean;
  model: string;
  baseUrl: string;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatTextAnalysis(result: AnalyzeTextResult): string;
  formatImageAnalysis(result: AnalyzeImageResult): string;
  formatShield(result: ShieldPromptResult): string;
  formatGroundedness(result: GroundednessResult): string;
  formatBlocklist(blocklist: Blocklist): string;
  formatBlocklists(blocklists: Blocklist[]): string;
  formatBlocklistItems(items: BlocklistItem[]): string;
  formatWorkflow(result: BlocklistWorkflowResult): string;
  formatFilterDecision(decision: FilterDecision): string;
  formatReport(report: ScanReport): string;
  formatProviders(providers: ProviderInfo[]): string;
}
