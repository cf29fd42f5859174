/**
 * Tests for the filter command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createFilterCommand, EXIT_BLOCKED } from '../../../../src/cli/commands/filter.js';

const mocks = vi.hoisted(() => ({
  services: {
    client: { analyzeText: vi.fn() },
    blocklists: { createOrUpdate: vi.fn(), addOrUpdateItems: vi.fn() },
  },
  reviewer: {
    name: 'openai',
    isAvailable: vi.fn(() => true),
    reviewContent: vi.fn(),
  },
}));

vi.mock('../../../../src/core/safety/factory.js', () => ({
  createServiceClients: vi.fn(() => mocks.services),
}));

vi.mock('../../../../src/llm/providers/index.js', () => ({
  getAvailableProvider: vi.fn(() => mocks.reviewer),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    getLevel: vi.fn(() => 'info'),
  },
}));

const SAFE = {
  blocklistsMatch: [],
  categoriesAnalysis: [
    { category: 'Hate', severity: 0 },
    { category: 'Violence', severity: 2 },
  ],
};

const SEVERE = {
  blocklistsMatch: [],
  categoriesAnalysis: [
    { category: 'Hate', severity: 6 },
    { category: 'Violence', severity: 0 },
  ],
};

describe('filter command', () => {
  let tempDir: string;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cskit-filter-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mocks.services.blocklists.createOrUpdate.mockResolvedValue({ blocklistName: 'cskit-filter' });
    mocks.services.blocklists.addOrUpdateItems.mockResolvedValue([]);
    mocks.services.client.analyzeText.mockResolvedValue(SAFE);
    mocks.reviewer.reviewContent.mockResolvedValue({ provider: 'openai', verdict: 'harmful', answer: 'Harmful' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should export the blocked exit code', () => {
    expect(EXIT_BLOCKED).toBe(2);
  });

  it('should allow content below the primary level', async () => {
    await createFilterCommand().parseAsync(['node', 'test', 'good morning', '--json']);

    expect(mocks.services.blocklists.createOrUpdate).toHaveBeenCalledWith(
      'cskit-filter',
      'Content confirmed harmful by cskit review'
    );
    expect(mocks.services.client.analyzeText).toHaveBeenCalledWith({
      text: 'good morning',
      blocklistNames: ['cskit-filter'],
    });
    expect(consoleSpy).toHaveBeenCalledWith(
      JSON.stringify(
        {
          action: 'allow',
          stage: 'primary',
          blocklisted: false,
          categoriesAnalysis: SAFE.categoriesAnalysis,
        },
        null,
        2
      )
    );
  });

  it('should exit 2 when the review confirms harm', async () => {
    mocks.services.client.analyzeText.mockResolvedValue(SEVERE);

    await expect(
      createFilterCommand().parseAsync(['node', 'test', 'something hateful', '--json'])
    ).rejects.toThrow('process.exit(2)');

    expect(mocks.reviewer.reviewContent).toHaveBeenCalledWith('something hateful');
    expect(mocks.services.blocklists.addOrUpdateItems).toHaveBeenCalledWith('cskit-filter', [
      { text: 'something hateful', description: 'Hate' },
    ]);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
  });

  it('should skip the reviewer with --no-review', async () => {
    const { getAvailableProvider } = await import('../../../../src/llm/providers/index.js');
    mocks.services.client.analyzeText.mockResolvedValue(SEVERE);

    await expect(
      createFilterCommand().parseAsync(['node', 'test', 'something hateful', '--no-review', '--json'])
    ).rejects.toThrow('process.exit(2)');

    expect(getAvailableProvider).not.toHaveBeenCalled();
    expect(mocks.services.blocklists.addOrUpdateItems).not.toHaveBeenCalled();
  });

  it('should pass the preferred provider through', async () => {
    const { getAvailableProvider } = await import('../../../../src/llm/providers/index.js');

    await createFilterCommand().parseAsync(['node', 'test', 'hello', '--provider', 'anthropic', '--json']);

    expect(getAvailableProvider).toHaveBeenCalledWith('anthropic', expect.anything(), expect.anything());
  });

  it('should use a custom blocklist', async () => {
    await createFilterCommand().parseAsync(['node', 'test', 'hello', '--blocklist', 'custom', '--json']);

    expect(mocks.services.blocklists.createOrUpdate).toHaveBeenCalledWith(
      'custom',
      'Content confirmed harmful by cskit review'
    );
    expect(mocks.services.client.analyzeText).toHaveBeenCalledWith({
      text: 'hello',
      blocklistNames: ['custom'],
    });
  });

  it('should reject an unknown level', async () => {
    const { logger } = await import('../../../../src/utils/logger.js');

    await expect(
      createFilterCommand().parseAsync(['node', 'test', 'hello', '--primary', 'extreme'])
    ).rejects.toThrow('process.exit(1)');
    expect(logger.error).toHaveBeenCalledWith('Unknown level "extreme". Use one of: low, medium, high');
    expect(mocks.services.client.analyzeText).not.toHaveBeenCalled();
  });

  it('should read the text from a file', async () => {
    fs.writeFileSync(path.join(tempDir, 'post.txt'), 'from a file');

    await createFilterCommand().parseAsync(['node', 'test', '--file', 'post.txt', '--json']);

    expect(mocks.services.client.analyzeText).toHaveBeenCalledWith({
      text: 'from a file',
      blocklistNames: ['cskit-filter'],
    });
  });
});
