/**
 * Text generation provider interface.
 * Remote and untrusted: output may be malformed and is parsed and validated by the caller.
 */

export interface GenerationPrompt {
  /** Standing instruction for the model. */
  system: string;
  user: string;
  /** Sampling temperature. Default: 0. */
  temperature?: number;
}

export interface IGenerationProvider {
  readonly model: string;

  generate(prompt: GenerationPrompt, signal?: AbortSignal): Promise<string>;
}
