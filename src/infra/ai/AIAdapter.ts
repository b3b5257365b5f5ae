/**
 * Common interface for AI completion adapters
 * Services depend on this interface, not on a specific SDK
 */

/** Options for a single chat-style completion request */
export interface CompletionOptions {
  /** System message framing the model's role */
  instructions?: string;
  /** User message */
  input: string;
  /** Sampling temperature; the adapter's configured default applies when omitted */
  temperature?: number;
  /** Ceiling on generated tokens */
  maxOutputTokens?: number;
}

export interface AIAdapter {
  /**
   * Returns the text of the first choice.
   * Rejects with GenerationFailedError on any transport, API or empty-response failure.
   */
  completion(options: CompletionOptions): Promise<string>;

  /** Name of the backend, for logging */
  getBackendName(): string;
}
