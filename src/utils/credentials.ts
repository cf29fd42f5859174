/**
 * Loader for service credentials.
 * Reads a dotenv-style `.env` file from the project root and overlays the
 * process environment on top of it.
 */
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';

export const CREDENTIALS_FILE = '.env';

/**
 * Credential and connection values known to the toolkit.
 */
export const CredentialKeys = {
  ENDPOINT: 'AZURE_CONTENTSAFETY_ENDPOINT',
  KEY: 'AZURE_CONTENTSAFETY_KEY',
  API_VERSION: 'AZURE_CONTENTSAFETY_API_VERSION',
  OPENAI_ENDPOINT: 'AZURE_OPENAI_ENDPOINT',
  OPENAI_DEPLOYMENT: 'AZURE_OPENAI_DEPLOYMENT_ID',
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  ANTHROPIC_API_KEY: 'ANTHROPIC_API_KEY',
} as const;

export type CredentialKey = (typeof CredentialKeys)[keyof typeof CredentialKeys];

/**
 * Values loaded from the credentials file, keyed by variable name.
 */
export interface Credentials {
  [key: string]: string | undefined;
}

/**
 * Parse a dotenv-style file.
 * Supports KEY=value format, optional `export` prefix and quotes.
 */
export function parseCredentialsFile(content: string): Credentials {
  const credentials: Credentials = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    credentials[key] = value;
  }

  return credentials;
}

/**
 * Load credentials for a project.
 * The process environment takes precedence over the `.env` file.
 */
export async function loadCredentials(
  projectRoot?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Credentials> {
  const credentials: Credentials = {};

  if (projectRoot) {
    const filePath = resolve(projectRoot, CREDENTIALS_FILE);
    if (existsSync(filePath)) {
      const content = await readFile(filePath, 'utf-8');
      Object.assign(credentials, parseCredentialsFile(content));
    }
  }

  for (const key of Object.values(CredentialKeys)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      credentials[key] = value;
    }
  }

  return credentials;
}

/**
 * Get a credential value, treating empty strings as missing.
 */
export function getCredential(credentials: Credentials, key: CredentialKey): string | undefined {
  const value = credentials[key];
  return value ? value : undefined;
}

/**
 * Split a comma-separated endpoint list.
 */
export function splitEndpoints(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((e) => e.trim())
    .filter((e) => e.length > 0);
}
