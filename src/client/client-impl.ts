import type { ClientConfig, NormalizedConfig } from './config.js';
import { normalizeConfig } from './config.js';
import type { CompleteOptions, CompletionClient, DescribeImageOptions, OutputOptions } from './types.js';
import type { CompletionRequest } from '../services/chat/types.js';
import type { CredentialProvider } from '../credentials/types.js';
import { defaultCredentialProvider } from '../credentials/index.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { FetchHttpTransport } from '../transport/http-transport.js';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  RequestBuilder,
  visionPrompt,
  type BuiltRequest,
} from '../transport/request-builder.js';
import { decodeStream } from '../transport/stream-decoder.js';
import type { Logger } from '../observability/logging.js';
import { createLogger } from '../observability/logging.js';
import type { OutputSink } from '../output/sink.js';
import { stdoutSink } from '../output/sink.js';
import type { FileWriter } from '../output/file-writer.js';
import { ResponseAggregator, type CompletionResult } from '../output/aggregator.js';
import { deriveOutputPlan } from '../output/output-plan.js';
import { ModelSettings } from '../settings/model-settings.js';
import { CredentialNotFoundError } from '../errors/categories.js';
import { readImage } from '../vision/image.js';
import { ALT_TEXT_INSTRUCTION } from '../vision/alt-text.js';

/** Collaborators a client can be given instead of the defaults. */
export interface ClientDependencies {
  credentials?: CredentialProvider;
  modelSettings?: ModelSettings;
  transport?: HttpTransport;
  logger?: Logger;
  sink?: OutputSink;
  writeFile?: FileWriter;
  /** Used by the default transport. */
  fetch?: typeof fetch;
}

export class CompletionClientImpl implements CompletionClient {
  public readonly modelSettings: ModelSettings;

  private readonly config: NormalizedConfig;
  private readonly credentials: CredentialProvider;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly sink: OutputSink;
  private readonly writeFile?: FileWriter;

  constructor(config: ClientConfig = {}, deps: ClientDependencies = {}) {
    this.config = normalizeConfig(config);
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
    this.modelSettings = deps.modelSettings ?? new ModelSettings(this.config.defaultModel);
    this.credentials = deps.credentials ?? defaultCredentialProvider(process.platform, { logger: this.logger });
    this.transport =
      deps.transport ??
      new FetchHttpTransport(
        this.config.baseUrl,
        { request: this.config.timeout, streamIdle: this.config.streamIdleTimeout },
        deps.fetch
      );
    this.sink = deps.sink ?? stdoutSink;
    this.writeFile = deps.writeFile;
  }

  async complete(options: CompleteOptions): Promise<CompletionResult | undefined> {
    const request = this.toRequest(options);
    const builder = this.newBuilder().setRequest(request);
    builder.validate();

    const built = builder.setCredential(await this.credential()).build();
    return this.dispatch(request, built, options);
  }

  async describeImage(options: DescribeImageOptions): Promise<CompletionResult | undefined> {
    const image = typeof options.image === 'string' ? await readImage(options.image) : options.image;
    return this.complete({ ...options, prompt: visionPrompt(ALT_TEXT_INSTRUCTION, image) });
  }

  getConfig(): Readonly<NormalizedConfig> {
    return { ...this.config };
  }

  private toRequest(options: CompleteOptions): CompletionRequest {
    const model = options.model?.trim() ? options.model.trim() : this.modelSettings.get();
    return {
      model,
      prompt: options.prompt,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      stream: options.stream ?? false,
    };
  }

  private newBuilder(): RequestBuilder {
    return RequestBuilder.create({ referer: this.config.referer, title: this.config.title });
  }

  private async credential(): Promise<string> {
    const secret = await this.credentials.get();
    if (secret === undefined) {
      throw new CredentialNotFoundError(
        `No API key found in ${this.credentials.name}; run "openrouter-prompt set-key <key>" or set OPENROUTER_API_KEY`
      );
    }
    return secret;
  }

  private async dispatch(
    request: CompletionRequest,
    built: BuiltRequest,
    options: OutputOptions
  ): Promise<CompletionResult | undefined> {
    const logger = this.logger.child({ model: request.model });
    const aggregator = new ResponseAggregator({
      plan: deriveOutputPlan({
        streamed: request.stream,
        returnRequested: options.returnRequested ?? false,
        outFile: options.outFile,
      }),
      sink: this.sink,
      logger,
      fullFidelity: options.fullFidelity,
      writeFile: this.writeFile,
    });
    const httpRequest = { path: built.path, headers: built.headers, body: built.body, signal: options.signal };

    logger.debug('Sending completion request', { stream: request.stream });

    if (!request.stream) {
      return aggregator.fromResponse(await this.transport.request(httpRequest));
    }
    return aggregator.fromStream(decodeStream(await this.transport.stream(httpRequest)));
  }
}
