/**
 * Completion Service Module
 *
 * Thin client for the Gemini `generateContent` REST endpoint. It sends one
 * user turn and returns the text of the first candidate.
 *
 * @module services/completion
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { getAssistantConfig, type AssistantConfig } from '../config/assistant.js';
import { AssistantError, getErrorMessage } from '../utils/errors.js';

export interface CompletionOptions {
  readonly signal?: AbortSignal;
}

/**
 * Text completion contract
 */
export interface CompletionClient {
  /**
   * False when no credentials are configured
   */
  readonly enabled: boolean;

  /**
   * @throws {AssistantError} If the completion service fails or is disabled
   */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

interface GenerateContentPart {
  readonly text?: unknown;
}

/**
 * Joined text parts of the first candidate, or null when there are none
 */
export function extractCandidateText(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('candidates' in body) || !Array.isArray(body.candidates)) {
    return null;
  }

  const candidate: unknown = body.candidates[0];
  if (typeof candidate !== 'object' || candidate === null || !('content' in candidate)) {
    return null;
  }

  const content = candidate.content;
  if (typeof content !== 'object' || content === null || !('parts' in content) || !Array.isArray(content.parts)) {
    return null;
  }

  const parts: GenerateContentPart[] = content.parts.filter(
    (part: unknown): part is GenerateContentPart => typeof part === 'object' && part !== null
  );
  const texts = parts.map((part) => part.text).filter((text): text is string => typeof text === 'string');

  return texts.length > 0 ? texts.join('') : null;
}

/**
 * Gemini completion client
 */
export class GeminiCompletionClient implements CompletionClient {
  private readonly client: AxiosInstance;

  constructor(private readonly config: AssistantConfig = getAssistantConfig()) {
    this.client = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': config.apiKey,
      },
      validateStatus: () => true,
    });
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    if (!this.config.enabled) {
      throw new AssistantError('Assistant is not configured', 'ASSISTANT_DISABLED');
    }

    const startTime = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(
        `/v1beta/models/${encodeURIComponent(this.config.model)}:generateContent`,
        {
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
        },
        { signal: options?.signal }
      );
    } catch (error) {
      console.error('[COMPLETION] Request failed:', {
        model: this.config.model,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
      throw new AssistantError(`Completion request failed: ${getErrorMessage(error)}`, 'ASSISTANT_ERROR', {
        cause: error,
      });
    }

    if (response.status !== 200) {
      console.error('[COMPLETION] Unexpected status:', {
        model: this.config.model,
        status: response.status,
        timestamp: new Date().toISOString(),
      });
      throw new AssistantError(`Completion request failed: HTTP ${response.status}`, 'ASSISTANT_ERROR', {
        details: { status: response.status },
      });
    }

    const text = extractCandidateText(response.data);
    if (text === null) {
      throw new AssistantError('Completion response contained no text');
    }

    console.log('[COMPLETION] Completion received:', {
      model: this.config.model,
      promptLength: prompt.length,
      replyLength: text.length,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    return text;
  }
}

let completionClientInstance: CompletionClient | null = null;

export function getCompletionClient(): CompletionClient {
  if (!completionClientInstance) {
    completionClientInstance = new GeminiCompletionClient();
  }
  return completionClientInstance;
}
