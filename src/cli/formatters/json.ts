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
import type { IFormatter, FormatOptions, ProviderInfo } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private verbose: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.verbose = options.verbose ?? false;
  }

  formatTextAnalysis(result: AnalyzeTextResult): string {
    return this.stringify(result);
  }

  formatImageAnalysis(result: AnalyzeImageResult): string {
    return this.stringify(result);
  }

  formatShield(result: ShieldPromptResult): string {
    return this.stringify({
      attackDetected:
        (result.userPromptAnalysis?.attackDetected ?? false) ||
        result.documentsAnalysis.some((d) => d.attackDetected),
      ...result,
    });
  }

  formatGroundedness(result: GroundednessResult): string {
    return this.stringify(result);
  }

  formatBlocklist(blocklist: Blocklist): string {
    return this.stringify(blocklist);
  }

  formatBlocklists(blocklists: Blocklist[]): string {
    return this.stringify(blocklists);
  }

  formatBlocklistItems(items: BlocklistItem[]): string {
    return this.stringify(items);
  }

  formatWorkflow(result: BlocklistWorkflowResult): string {
    return this.stringify({
      blocklist_creation: result.blocklist,
      blocklist_items: result.items,
      blocklist_analysis: result.analysis,
    });
  }

  formatFilterDecision(decision: FilterDecision): string {
    const { analysis, ...rest } = decision;
    return this.stringify(this.verbose ? decision : { ...rest, categoriesAnalysis: analysis.categoriesAnalysis });
  }

  formatReport(report: ScanReport): string {
    if (this.verbose) {
      return this.stringify(report);
    }
    const { entries, ...summary } = report;
    return this.stringify({
      ...summary,
      flaggedSources: entries.filter((e) => e.flagged).map((e) => e.source),
      errors: entries
        .filter((e) => e.error !== undefined)
        .map((e) => ({ source: e.source, error: e.error })),
    });
  }

  formatProviders(providers: ProviderInfo[]): string {
    return this.stringify(providers);
  }

  private stringify(value: unknown): string {
    return JSON.stringify(value, null, 2);
  }
}
