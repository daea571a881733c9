/**
 * Assistant Configuration Module
 *
 * Settings for the Gemini completion service backing the vacation assistant.
 * The assistant is optional: without an API key it reports itself disabled.
 *
 * @module config/assistant
 */

export interface AssistantConfig {
  /**
   * Whether an API key is configured
   */
  readonly enabled: boolean;

  readonly apiKey: string;

  /**
   * Gemini model name
   */
  readonly model: string;

  /**
   * Generative Language API base URL
   */
  readonly apiUrl: string;

  /**
   * Completion request timeout in milliseconds
   */
  readonly timeoutMs: number;
}

/**
 * Singleton instance of assistant configuration
 */
let assistantConfigInstance: AssistantConfig | null = null;

function loadAssistantConfig(): AssistantConfig {
  const apiKey = process.env.GOOGLE_API_KEY?.trim() ?? '';
  const timeout = parseInt(process.env.ASSISTANT_TIMEOUT_MS ?? '', 10);

  if (!apiKey) {
    console.warn('[ASSISTANT_CONFIG] GOOGLE_API_KEY is not set, assistant is disabled');
  }

  return {
    enabled: apiKey.length > 0,
    apiKey,
    model: process.env.GEMINI_MODEL?.trim() || 'gemini-1.5-pro-latest',
    apiUrl: (process.env.GEMINI_API_URL?.trim() || 'https://generativelanguage.googleapis.com').replace(/\/+$/, ''),
    timeoutMs: isNaN(timeout) || timeout < 1 ? 30000 : timeout,
  };
}

/**
 * Get assistant configuration (singleton)
 */
export function getAssistantConfig(): AssistantConfig {
  if (!assistantConfigInstance) {
    assistantConfigInstance = loadAssistantConfig();
  }
  return assistantConfigInstance;
}

/**
 * Drop the cached configuration so the next call re-reads the environment
 */
export function resetAssistantConfig(): void {
  assistantConfigInstance = null;
}
