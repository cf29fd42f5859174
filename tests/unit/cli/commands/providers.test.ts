/**
 * Tests for the providers command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createProvidersCommand } from '../../../../src/cli/commands/providers.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    getLevel: vi.fn(() => 'info'),
  },
}));

describe('providers command', () => {
  let tempDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cskit-providers-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('ANTHROPIC_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report providers with keys in .env as available', async () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'OPENAI_API_KEY=test-secret\n');

    await createProvidersCommand().parseAsync(['node', 'test', '--json']);

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(consoleSpy).toHaveBeenCalledWith(
      JSON.stringify(
        [
          { name: 'openai', available: true, model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' },
          {
            name: 'anthropic',
            available: false,
            model: 'claude-3-haiku-20240307',
            baseUrl: 'https://api.anthropic.com',
          },
        ],
        null,
        2
      )
    );
  });

  it('should use models from the config file', async () => {
    fs.mkdirSync(path.join(tempDir, '.cskit'));
    fs.writeFileSync(
      path.join(tempDir, '.cskit', 'config.yaml'),
      'llm:\n  providers:\n    anthropic:\n      model: claude-3-5-sonnet-latest\n'
    );

    await createProvidersCommand().parseAsync(['node', 'test', '--json']);

    const output = String(consoleSpy.mock.calls[0][0]);
    expect(output).toContain('"model": "claude-3-5-sonnet-latest"');
  });

  it('should print a hint when nothing is configured', async () => {
    await createProvidersCommand().parseAsync(['node', 'test']);

    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(consoleSpy).toHaveBeenLastCalledWith(
      '\nSet OPENAI_API_KEY or ANTHROPIC_API_KEY, or configure llm.providers in .cskit/config.yaml'
    );
  });
});
