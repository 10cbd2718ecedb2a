import type { Prompt, ImagePart } from '../services/chat/types.js';
import type { CompletionResult } from '../output/aggregator.js';
import type { ModelSettings } from '../settings/model-settings.js';
import type { NormalizedConfig } from './config.js';

/** Where the content goes; see `deriveOutputPlan`. */
export interface OutputOptions {
  stream?: boolean;
  /** Also return the content when it is streamed or written to a file. */
  returnRequested?: boolean;
  outFile?: string;
  /** Include every provider record in the result. */
  fullFidelity?: boolean;
  /** Aborting ends a stream early without an error. */
  signal?: AbortSignal;
}

export interface CompleteOptions extends OutputOptions {
  /** Falls back to the current default model when empty or omitted. */
  model?: string;
  prompt: Prompt;
  temperature?: number;
  maxTokens?: number;
}

export interface DescribeImageOptions extends OutputOptions {
  /** A file path, or an image already loaded with `readImage`. */
  image: string | ImagePart;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionClient {
  readonly modelSettings: ModelSettings;

  complete(options: CompleteOptions): Promise<CompletionResult | undefined>;

  /** Asks the model for alt text describing an image. */
  describeImage(options: DescribeImageOptions): Promise<CompletionResult | undefined>;

  getConfig(): Readonly<NormalizedConfig>;
}
