/**
 * Base model interfaces and types
 */

export interface GenerationOptions {
  /** Upper bound on generated tokens for one round-trip */
  maxTokens: number;
  temperature: number;
  /** Ask the backend to stream fragments; defaults to true */
  stream?: boolean;
  signal?: AbortSignal;
}

/**
 * A text-generation backend. Fragments are yielded in order; the
 * concatenation of all fragments is the full response.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(prompt: string, options: GenerationOptions): AsyncIterable<string>;
  testConnectivity?(): Promise<boolean>;
}
