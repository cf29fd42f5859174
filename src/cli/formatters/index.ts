import type { OutputFormat } from '../../core/config/schema.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter(options) : new HumanFormatter(options);
}
