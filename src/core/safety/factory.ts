/**
 * Builds service clients from configuration and credentials.
 */
import type { Config } from '../config/schema.js';
import {
  CredentialKeys,
  getCredential,
  splitEndpoints,
  type Credentials,
} from '../../utils/credentials.js';
import { HttpTransport } from './transport.js';
import { ContentSafetyClient } from './client.js';
import { BlocklistClient } from './blocklist-client.js';
import type { GroundednessLLMResource } from './types.js';

export interface ServiceClients {
  transport: HttpTransport;
  client: ContentSafetyClient;
  blocklists: BlocklistClient;
}

export interface ServiceOverrides {
  endpoints?: string[];
  apiVersion?: string;
}

/**
 * Endpoints from config, falling back to AZURE_CONTENTSAFETY_ENDPOINT.
 */
export function resolveEndpoints(config: Config, credentials: Credentials): string[] {
  if (config.service.endpoints.length > 0) {
    return config.service.endpoints;
  }
  return splitEndpoints(getCredential(credentials, CredentialKeys.ENDPOINT));
}

export function resolveApiVersion(config: Config, credentials: Credentials): string {
  return getCredential(credentials, CredentialKeys.API_VERSION) ?? config.service.api_version;
}

/**
 * Azure OpenAI resource for groundedness reasoning: config first, then environment.
 */
export function resolveGroundednessResource(
  config: Config,
  credentials: Credentials
): GroundednessLLMResource | undefined {
  if (config.groundedness.llm_resource) {
    return config.groundedness.llm_resource;
  }
  const endpoint = getCredential(credentials, CredentialKeys.OPENAI_ENDPOINT);
  const deployment = getCredential(credentials, CredentialKeys.OPENAI_DEPLOYMENT);
  return endpoint && deployment ? { endpoint, deployment } : undefined;
}

export function createServiceClients(
  config: Config,
  credentials: Credentials,
  overrides: ServiceOverrides = {}
): ServiceClients {
  const apiVersion = overrides.apiVersion ?? resolveApiVersion(config, credentials);
  const transport = new HttpTransport({
    endpoints: overrides.endpoints ?? resolveEndpoints(config, credentials),
    apiKey: getCredential(credentials, CredentialKeys.KEY) ?? '',
    timeoutMs: config.service.timeout_ms,
  });

  const client = new ContentSafetyClient(transport, {
    apiVersion,
    groundednessApiVersion: config.service.groundedness_api_version,
    defaultCategories: config.analysis.categories,
    defaultOutputType: config.analysis.output_type,
    haltOnBlocklistHit: config.analysis.halt_on_blocklist_hit,
  });

  return {
    transport,
    client,
    blocklists: new BlocklistClient(transport, apiVersion),
  };
}
