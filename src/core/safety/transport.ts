/**
 * HTTP transport for the content safety REST API.
 * Adds key authentication and api-version, and fails over across endpoints.
 */
import type { z } from 'zod';
import { ConfigError, ServiceError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatZodError } from '../../utils/yaml.js';
import { ServiceErrorBodySchema } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface TransportOptions {
  /** Endpoints tried in order, e.g. https://my-resource.cognitiveservices.azure.com */
  endpoints: string[];
  apiKey: string;
  timeoutMs?: number;
}

export interface RequestOptions {
  apiVersion: string;
  body?: unknown;
  query?: Record<string, string | number | undefined>;
}

export class HttpTransport {
  private readonly endpoints: string[];
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private activeEndpoint: string;

  constructor(options: TransportOptions) {
    if (!options.apiKey) {
      throw new ConfigError(
        ErrorCodes.MISSING_CREDENTIAL,
        'Content safety key not configured. Set AZURE_CONTENTSAFETY_KEY.'
      );
    }
    const endpoints = options.endpoints.map((e) => e.trim().replace(/\/+$/, '')).filter(Boolean);
    if (endpoints.length === 0) {
      throw new ConfigError(
        ErrorCodes.NO_ENDPOINT,
        'No content safety endpoint configured. Set AZURE_CONTENTSAFETY_ENDPOINT or service.endpoints.'
      );
    }
    this.endpoints = endpoints;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.activeEndpoint = endpoints[0];
  }

  /** Endpoint that served the most recent successful request. */
  get endpoint(): string {
    return this.activeEndpoint;
  }

  /**
   * Send a request and validate the response body against a schema.
   */
  async call<T extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: T,
    options: RequestOptions
  ): Promise<z.infer<T>> {
    const body = await this.request(method, path, options);
    return parseResponse(schema, body, path);
  }

  /**
   * Send a request, trying each endpoint until one answers.
   * Returns the parsed JSON body, or undefined for an empty response.
   */
  async request(method: HttpMethod, path: string, options: RequestOptions): Promise<unknown> {
    let lastError: unknown;

    for (let i = 0; i < this.endpoints.length; i++) {
      const endpoint = this.endpoints[i];
      try {
        const body = await this.send(method, this.buildUrl(endpoint, path, options), endpoint, options.body);
        this.activeEndpoint = endpoint;
        return body;
      } catch (error) {
        if (error instanceof ServiceError && !error.retryable) {
          throw error;
        }
        lastError = error;
        if (i < this.endpoints.length - 1) {
          logger.warn(`${method} ${path} failed on ${endpoint}: ${errorMessage(error)}; trying ${this.endpoints[i + 1]}`);
        }
      }
    }

    if (lastError instanceof ServiceError) {
      throw lastError;
    }
    throw new ServiceError(
      ErrorCodes.SERVICE_UNAVAILABLE,
      `All content safety endpoints failed: ${errorMessage(lastError)}`,
      { endpoints: this.endpoints }
    );
  }

  /**
   * GET an absolute or endpoint-relative URL, such as a paging nextLink.
   * No failover: the link belongs to the endpoint that issued it.
   */
  async requestUrl<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.infer<T>> {
    const absolute = new URL(url, `${this.activeEndpoint}/contentsafety/`).toString();
    const body = await this.send('GET', absolute, this.activeEndpoint);
    return parseResponse(schema, body, url);
  }

  buildUrl(endpoint: string, path: string, options: RequestOptions): string {
    const url = new URL(`${endpoint}/contentsafety/${path}`);
    url.searchParams.set('api-version', options.apiVersion);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(method: HttpMethod, url: string, endpoint: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    logger.debug(`${method} ${url}`);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers: {
            'Content-Type': 'application/json',
            'Ocp-Apim-Subscription-Key': this.apiKey,
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new Error(`Request timed out after ${this.timeoutMs}ms`);
        }
        throw error;
      }

      const text = await response.text();
      if (!response.ok) {
        throw toServiceError(response.status, text, endpoint);
      }
      if (!text) {
        return undefined;
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        throw new ServiceError(ErrorCodes.INVALID_RESPONSE, 'Service returned a body that is not JSON', {
          status: response.status,
          endpoint,
        });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Build a ServiceError from a non-2xx response.
 */
export function toServiceError(status: number, bodyText: string, endpoint?: string): ServiceError {
  let serviceCode: string | undefined;
  let serviceMessage: string | undefined;

  try {
    const parsed = ServiceErrorBodySchema.safeParse(JSON.parse(bodyText));
    if (parsed.success) {
      serviceCode = parsed.data.error.code;
      serviceMessage = parsed.data.error.message;
    }
  } catch { /* not JSON; fall back to the raw text */ }

  if (!serviceMessage) {
    serviceMessage = bodyText.length > 200 ? bodyText.substring(0, 200) + '...' : bodyText;
  }

  const label = serviceCode ? `${serviceCode}: ${serviceMessage}` : serviceMessage;
  return new ServiceError(
    ErrorCodes.SERVICE_ERROR,
    `Content safety API error ${status}${label ? ` - ${label}` : ''}`,
    { status, serviceCode, endpoint }
  );
}

function parseResponse<T extends z.ZodTypeAny>(schema: T, body: unknown, path: string): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ServiceError(
      ErrorCodes.INVALID_RESPONSE,
      `Unexpected response from ${path}: ${formatZodError(result.error)}`
    );
  }
  return result.data;
}
