import chalk from 'chalk';
import type {
  AnalyzeImageResult,
  AnalyzeTextResult,
  Blocklist,
  BlocklistItem,
  BlocklistWorkflowResult,
  CategoryAnalysis,
  GroundednessResult,
  ShieldPromptResult,
} from '../../core/safety/types.js';
import type { FilterDecision } from '../../core/filter/types.js';
import { LEVEL_MIN_SEVERITY } from '../../core/filter/levels.js';
import type { ScanReport } from '../../core/report/types.js';
import type { IFormatter, FormatOptions, ProviderInfo } from './types.js';

/** Highest severity on the eight-level scale. */
const SEVERITY_SCALE = 7;

type Color = 'red' | 'green' | 'yellow' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatTextAnalysis(result: AnalyzeTextResult): string {
    const lines = this.formatCategories(result.categoriesAnalysis);

    if (result.blocklistsMatch.length > 0) {
      lines.push('');
      lines.push(this.colorize(`Blocklist matches (${result.blocklistsMatch.length}):`, 'red'));
      for (const match of result.blocklistsMatch) {
        lines.push(`  - "${match.blocklistItemText}" (${match.blocklistName}, id ${match.blocklistItemId})`);
      }
    }

    return lines.join('\n');
  }

  formatImageAnalysis(result: AnalyzeImageResult): string {
    return this.formatCategories(result.categoriesAnalysis).join('\n');
  }

  formatShield(result: ShieldPromptResult): string {
    const lines: string[] = [];

    if (result.userPromptAnalysis) {
      lines.push(`User prompt: ${this.attackLabel(result.userPromptAnalysis.attackDetected)}`);
    }
    if (result.documentsAnalysis.length > 0) {
      lines.push('Documents:');
      result.documentsAnalysis.forEach((doc, i) => {
        lines.push(`  [${i + 1}] ${this.attackLabel(doc.attackDetected)}`);
      });
    }

    return lines.join('\n');
  }

  formatGroundedness(result: GroundednessResult): string {
    if (!result.ungroundedDetected) {
      return this.colorize('Text is grounded in the provided sources', 'green');
    }

    const percent = (result.ungroundedPercentage * 100).toFixed(1);
    const lines = [this.colorize(`Ungrounded content detected (${percent}% of text)`, 'red')];
    for (const detail of result.ungroundedDetails) {
      lines.push(`  - "${detail.text}"`);
      if (detail.reason) {
        lines.push(`      reason: ${detail.reason}`);
      }
    }
    return lines.join('\n');
  }

  formatBlocklist(blocklist: Blocklist): string {
    return blocklist.description
      ? `${blocklist.blocklistName} - ${blocklist.description}`
      : blocklist.blocklistName;
  }

  formatBlocklists(blocklists: Blocklist[]): string {
    if (blocklists.length === 0) {
      return 'No blocklists';
    }
    return [`Blocklists (${blocklists.length}):`, ...blocklists.map((b) => `  ${this.formatBlocklist(b)}`)].join('\n');
  }

  formatBlocklistItems(items: BlocklistItem[]): string {
    if (items.length === 0) {
      return 'No blocklist items';
    }
    const lines = [`Items (${items.length}):`];
    for (const item of items) {
      const description = item.description ? ` (${item.description})` : '';
      lines.push(`  ${this.colorize(item.blocklistItemId, 'dim')}  "${item.text}"${description}`);
    }
    return lines.join('\n');
  }

  formatWorkflow(result: BlocklistWorkflowResult): string {
    return [
      `Blocklist: ${this.formatBlocklist(result.blocklist)}`,
      '',
      this.formatBlocklistItems(result.items),
      '',
      this.formatTextAnalysis(result.analysis),
    ].join('\n');
  }

  formatFilterDecision(decision: FilterDecision): string {
    const blocked = decision.action === 'block';
    const icon = blocked ? this.colorize('✗', 'red') : this.colorize('✓', 'green');
    const label = blocked ? this.colorize('BLOCKED', 'red') : this.colorize('ALLOWED', 'green');

    let cause = '';
    if (decision.category) {
      cause = `: ${decision.category} (severity ${decision.severity ?? 0})`;
    } else if (decision.flagged) {
      cause = `: flagged ${decision.flagged.category} (severity ${decision.flagged.severity})`;
    }

    const lines = [`${icon} ${label} at ${decision.stage}${cause}`];

    if (decision.stage === 'blocklist') {
      for (const match of decision.analysis.blocklistsMatch) {
        lines.push(`   matched "${match.blocklistItemText}" in ${match.blocklistName}`);
      }
    }

    if (decision.review) {
      const error = decision.review.error ? ` (${decision.review.error})` : '';
      lines.push(`   Review: ${decision.review.verdict.replace('_', ' ')} by ${decision.review.provider}${error}`);
      if (this.options.verbose && decision.review.answer !== undefined) {
        lines.push(`   Answer: ${decision.review.answer}`);
      }
    } else if (decision.stage === 'review') {
      lines.push(`   Review unavailable; unresolved_review policy applied (${decision.action})`);
    }

    if (decision.blocklisted) {
      lines.push('   Added to blocklist');
    }

    if (this.options.verbose) {
      lines.push('', ...this.formatCategories(decision.analysis.categoriesAnalysis));
    }

    return lines.join('\n');
  }

  formatReport(report: ScanReport): string {
    const lines: string[] = [];
    const min = LEVEL_MIN_SEVERITY[report.threshold];

    lines.push(`Scanned ${report.total} item(s): ${report.analyzed} analyzed, ${report.failed} failed`);
    const flagged = `Flagged: ${report.flagged} (threshold ${report.threshold}, severity >= ${min})`;
    lines.push(report.flagged > 0 ? this.colorize(flagged, 'red') : flagged);
    lines.push(`Blocklist hits: ${report.blocklistHits}`);

    const categoryNames = Object.keys(report.categories);
    if (categoryNames.length > 0) {
      lines.push('');
      lines.push(this.colorize(`${'Category'.padEnd(10)}${'Max'.padEnd(5)}${'Flagged'.padEnd(9)}Histogram`, 'bold'));
      for (const name of categoryNames) {
        const stats = report.categories[name];
        const histogram = Object.keys(stats.histogram)
          .map(Number)
          .sort((a, b) => a - b)
          .map((severity) => `${severity}:${stats.histogram[severity]}`)
          .join(' ');
        lines.push(`${name.padEnd(10)}${String(stats.maxSeverity).padEnd(5)}${String(stats.flagged).padEnd(9)}${histogram}`);
      }
    }

    if (this.options.verbose) {
      lines.push('');
      for (const entry of report.entries) {
        if (entry.error !== undefined) {
          lines.push(`  ${this.colorize('!', 'yellow')} ${entry.source}: ${entry.error}`);
        } else {
          lines.push(`  ${entry.flagged ? this.colorize('✗', 'red') : this.colorize('✓', 'green')} ${entry.source}`);
        }
      }
      return lines.join('\n');
    }

    const flaggedEntries = report.entries.filter((e) => e.flagged);
    if (flaggedEntries.length > 0) {
      lines.push('', 'Flagged items:');
      lines.push(...flaggedEntries.map((e) => `  - ${e.source}`));
    }
    const failedEntries = report.entries.filter((e) => e.error !== undefined);
    if (failedEntries.length > 0) {
      lines.push('', 'Errors:');
      lines.push(...failedEntries.map((e) => `  - ${e.source}: ${e.error}`));
    }

    return lines.join('\n');
  }

  formatProviders(providers: ProviderInfo[]): string {
    const lines = ['Available LLM Providers:'];
    for (const p of providers) {
      const status = p.available
        ? this.colorize('available', 'green')
        : this.colorize('not configured', 'dim');
      lines.push(`  ${p.name}: ${status} (model: ${p.model}) [${p.baseUrl}]`);
    }
    return lines.join('\n');
  }

  private formatCategories(categories: CategoryAnalysis[]): string[] {
    if (categories.length === 0) {
      return ['No categories returned'];
    }
    const lines = ['Categories:'];
    for (const item of categories) {
      const severity = item.severity ?? 0;
      lines.push(`  ${item.category.padEnd(9)} ${this.severityBar(severity)} ${severity}`);
    }
    return lines;
  }

  private severityBar(severity: number): string {
    const filled = Math.min(Math.max(severity, 0), SEVERITY_SCALE);
    const bar = '█'.repeat(filled) + '░'.repeat(SEVERITY_SCALE - filled);
    if (severity >= 4) return this.colorize(bar, 'red');
    if (severity > 0) return this.colorize(bar, 'yellow');
    return this.colorize(bar, 'green');
  }

  private attackLabel(detected: boolean): string {
    return detected ? this.colorize('attack detected', 'red') : this.colorize('no attack detected', 'green');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
