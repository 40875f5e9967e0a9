/**
 * Boundary to the text-generation backend
 */

export interface ModelClient {
  /** Identifier recorded on every insight this client produces */
  readonly modelVersion: string;

  /**
   * Generate a completion for the prompt.
   * Rejects with ModelTimeoutError or ModelError.
   */
  generate(prompt: string, timeoutMs: number): Promise<string>;
}
