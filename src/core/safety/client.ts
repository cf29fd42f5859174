/**
 * Client for the content analysis operations: text and image moderation,
 * prompt shields and groundedness detection.
 */
import { InputError, ErrorCodes } from '../../utils/errors.js';
import type { HarmCategory, OutputType } from '../config/schema.js';
import type { HttpTransport } from './transport.js';
import {
  AnalyzeImageResultSchema,
  AnalyzeTextResultSchema,
  GroundednessResultSchema,
  ShieldPromptResultSchema,
  IMAGE_MAX_BYTES,
  TEXT_MAX_LENGTH,
  type AnalyzeImageRequest,
  type AnalyzeImageResult,
  type AnalyzeTextRequest,
  type AnalyzeTextResult,
  type GroundednessRequest,
  type GroundednessResult,
  type ShieldPromptRequest,
  type ShieldPromptResult,
} from './types.js';

export interface ContentSafetyClientOptions {
  apiVersion: string;
  /** API version for text:detectGroundedness, which is preview-only */
  groundednessApiVersion: string;
  defaultCategories?: HarmCategory[];
  defaultOutputType?: OutputType;
  haltOnBlocklistHit?: boolean;
}

export class ContentSafetyClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: ContentSafetyClientOptions
  ) {}

  async analyzeText(request: AnalyzeTextRequest): Promise<AnalyzeTextResult> {
    validateAnalyzeText(request.text);

    const body: Record<string, unknown> = {
      text: request.text,
      categories: request.categories ?? this.options.defaultCategories,
      haltOnBlocklistHit: request.haltOnBlocklistHit ?? this.options.haltOnBlocklistHit ?? false,
      outputType: request.outputType ?? this.options.defaultOutputType ?? 'FourSeverityLevels',
    };
    if (request.blocklistNames && request.blocklistNames.length > 0) {
      body.blocklistNames = request.blocklistNames;
    }

    return this.transport.call('POST', 'text:analyze', AnalyzeTextResultSchema, {
      apiVersion: this.options.apiVersion,
      body,
    });
  }

  async analyzeImage(request: AnalyzeImageRequest): Promise<AnalyzeImageResult> {
    const hasContent = request.content !== undefined;
    const hasBlob = request.blobUrl !== undefined && request.blobUrl !== '';
    if (hasContent === hasBlob) {
      throw new InputError(
        ErrorCodes.INVALID_INPUT,
        'Provide exactly one of image content or blob URL'
      );
    }

    let image: { content: string } | { blobUrl: string };
    if (request.content !== undefined) {
      if (request.content.length === 0) {
        throw new InputError(ErrorCodes.INVALID_INPUT, 'Image content is empty');
      }
      if (request.content.length > IMAGE_MAX_BYTES) {
        throw new InputError(
          ErrorCodes.IMAGE_TOO_LARGE,
          `Image is ${request.content.length} bytes; the limit is ${IMAGE_MAX_BYTES}`,
          { size: request.content.length, limit: IMAGE_MAX_BYTES }
        );
      }
      image = { content: request.content.toString('base64') };
    } else {
      image = { blobUrl: request.blobUrl ?? '' };
    }

    return this.transport.call('POST', 'image:analyze', AnalyzeImageResultSchema, {
      apiVersion: this.options.apiVersion,
      body: {
        image,
        categories: request.categories ?? this.options.defaultCategories,
        // Images only support the four-level scale
        outputType: 'FourSeverityLevels',
      },
    });
  }

  /**
   * Detect jailbreak attempts in a user prompt and indirect attacks in documents.
   */
  async shieldPrompt(request: ShieldPromptRequest): Promise<ShieldPromptResult> {
    const documents = (request.documents ?? []).filter((d) => d.trim().length > 0);
    const userPrompt = request.userPrompt?.trim() ? request.userPrompt : undefined;

    if (!userPrompt && documents.length === 0) {
      throw new InputError(
        ErrorCodes.INVALID_INPUT,
        'Prompt shield needs a user prompt or at least one document'
      );
    }

    return this.transport.call('POST', 'text:shieldPrompt', ShieldPromptResultSchema, {
      apiVersion: this.options.apiVersion,
      body: { userPrompt: userPrompt ?? '', documents },
    });
  }

  /**
   * Check whether generated text is supported by its grounding sources.
   */
  async detectGroundedness(request: GroundednessRequest): Promise<GroundednessResult> {
    const task = request.task ?? 'QnA';
    const reasoning = request.reasoning ?? false;
    const sources = request.groundingSources.filter((s) => s.trim().length > 0);

    if (!request.text.trim()) {
      throw new InputError(ErrorCodes.INVALID_INPUT, 'Groundedness text is empty');
    }
    if (sources.length === 0) {
      throw new InputError(ErrorCodes.INVALID_INPUT, 'At least one grounding source is required');
    }
    if (task === 'QnA' && !request.query?.trim()) {
      throw new InputError(ErrorCodes.INVALID_INPUT, 'The QnA task requires a query');
    }
    if (reasoning && !request.llmResource) {
      throw new InputError(
        ErrorCodes.INVALID_INPUT,
        'Reasoning requires an Azure OpenAI resource (AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_DEPLOYMENT_ID)'
      );
    }

    const body: Record<string, unknown> = {
      domain: request.domain ?? 'Generic',
      task,
      text: request.text,
      groundingSources: sources,
      reasoning,
    };
    if (task === 'QnA') {
      body.qna = { query: request.query };
    }
    if (reasoning && request.llmResource) {
      body.llmResource = {
        resourceType: 'AzureOpenAI',
        azureOpenAIEndpoint: request.llmResource.endpoint,
        azureOpenAIDeploymentName: request.llmResource.deployment,
      };
    }

    return this.transport.call('POST', 'text:detectGroundedness', GroundednessResultSchema, {
      apiVersion: this.options.groundednessApiVersion,
      body,
    });
  }
}

/**
 * Text for text:analyze must be non-empty and within the service limit.
 */
export function validateAnalyzeText(text: string): void {
  if (!text || text.trim().length === 0) {
    throw new InputError(ErrorCodes.INVALID_INPUT, 'Text to analyze is empty');
  }
  if (text.length > TEXT_MAX_LENGTH) {
    throw new InputError(
      ErrorCodes.TEXT_TOO_LONG,
      `Text is ${text.length} characters; the limit is ${TEXT_MAX_LENGTH}`,
      { length: text.length, limit: TEXT_MAX_LENGTH }
    );
  }
}
