/**
 * Tests for credential loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  parseCredentialsFile,
  loadCredentials,
  getCredential,
  splitEndpoints,
  CredentialKeys,
} from '../../../src/utils/credentials.js';

describe('parseCredentialsFile', () => {
  it('should parse KEY=value lines', () => {
    expect(parseCredentialsFile('A=1\nB=two')).toEqual({ A: '1', B: 'two' });
  });

  it('should skip comments, blank lines and lines without =', () => {
    const content = '# comment\n\nNOT_A_PAIR\nKEY=value\n';
    expect(parseCredentialsFile(content)).toEqual({ KEY: 'value' });
  });

  it('should strip export prefixes and quotes', () => {
    const content = 'export AZURE_CONTENTSAFETY_KEY="test-secret"\nAZURE_CONTENTSAFETY_ENDPOINT=\'https://a.example.com\'';
    expect(parseCredentialsFile(content)).toEqual({
      AZURE_CONTENTSAFETY_KEY: 'test-secret',
      AZURE_CONTENTSAFETY_ENDPOINT: 'https://a.example.com',
    });
  });

  it('should keep = inside values', () => {
    expect(parseCredentialsFile('URL=https://x.example.com/?a=b')).toEqual({
      URL: 'https://x.example.com/?a=b',
    });
  });
});

describe('loadCredentials', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cskit-creds-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read the .env file in the project root', async () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'AZURE_CONTENTSAFETY_KEY=file-secret\n');
    const credentials = await loadCredentials(tempDir, {});
    expect(credentials[CredentialKeys.KEY]).toBe('file-secret');
  });

  it('should let the environment override the file', async () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'AZURE_CONTENTSAFETY_KEY=file-secret\n');
    const credentials = await loadCredentials(tempDir, { AZURE_CONTENTSAFETY_KEY: 'test-secret' });
    expect(credentials[CredentialKeys.KEY]).toBe('test-secret');
  });

  it('should ignore empty environment values', async () => {
    fs.writeFileSync(path.join(tempDir, '.env'), 'AZURE_CONTENTSAFETY_KEY=file-secret\n');
    const credentials = await loadCredentials(tempDir, { AZURE_CONTENTSAFETY_KEY: '' });
    expect(credentials[CredentialKeys.KEY]).toBe('file-secret');
  });

  it('should ignore unrelated environment variables', async () => {
    const credentials = await loadCredentials(tempDir, { HOME: '/home/test', OPENAI_API_KEY: 'test-key' });
    expect(credentials).toEqual({ OPENAI_API_KEY: 'test-key' });
  });

  it('should work without a project root', async () => {
    const credentials = await loadCredentials(undefined, { ANTHROPIC_API_KEY: 'test-key' });
    expect(credentials).toEqual({ ANTHROPIC_API_KEY: 'test-key' });
  });
});

describe('getCredential', () => {
  it('should treat empty strings as missing', () => {
    expect(getCredential({ AZURE_CONTENTSAFETY_KEY: '' }, CredentialKeys.KEY)).toBeUndefined();
    expect(getCredential({ AZURE_CONTENTSAFETY_KEY: 'k' }, CredentialKeys.KEY)).toBe('k');
  });
});

describe('splitEndpoints', () => {
  it('should split and trim a comma-separated list', () => {
    expect(splitEndpoints(' https://a.example.com , https://b.example.com,')).toEqual([
      'https://a.example.com',
      'https://b.example.com',
    ]);
  });

  it('should return an empty list for undefined', () => {
    expect(splitEndpoints(undefined)).toEqual([]);
  });
});
