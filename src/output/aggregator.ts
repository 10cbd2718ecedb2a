import type { Logger } from '../observability/logging.js';
import type { StreamEvent } from '../transport/stream-decoder.js';
import type { ProviderRecord } from '../services/chat/types.js';
import { extractContent, isProviderRecord } from '../services/chat/content.js';
import { isFileOnly, type OutputPlan } from './output-plan.js';
import type { OutputSink } from './sink.js';
import { writeOutputFile, type FileWriter } from './file-writer.js';

export interface CompletionResult {
  readonly textContent: string;
  /** Every provider record in arrival order; only with full fidelity. */
  readonly rawEvents?: readonly ProviderRecord[];
}

export type AggregateOutcome =
  | { readonly kind: 'content'; readonly text: string; readonly rawEvents: readonly ProviderRecord[] }
  | { readonly kind: 'empty'; readonly rawEvents: readonly ProviderRecord[] };

export interface AggregatorOptions {
  plan: OutputPlan;
  sink: OutputSink;
  logger: Logger;
  fullFidelity?: boolean;
  writeFile?: FileWriter;
}

/**
 * Applies an {@link OutputPlan} to one response. Side effects happen in a
 * fixed order: console, then file, then the return value.
 */
export class ResponseAggregator {
  private readonly plan: OutputPlan;
  private readonly sink: OutputSink;
  private readonly logger: Logger;
  private readonly fullFidelity: boolean;
  private readonly writeFile: FileWriter;

  constructor(options: AggregatorOptions) {
    this.plan = options.plan;
    this.sink = options.sink;
    this.logger = options.logger;
    this.fullFidelity = options.fullFidelity ?? false;
    this.writeFile = options.writeFile ?? writeOutputFile;
  }

  async fromStream(events: AsyncIterable<StreamEvent>): Promise<CompletionResult | undefined> {
    return this.finish(await this.collect(events));
  }

  async fromResponse(response: unknown): Promise<CompletionResult | undefined> {
    const rawEvents = isProviderRecord(response) ? [response] : [];
    const content = extractContent(response);

    if (content.kind === 'none' || content.text === '') {
      return this.finish({ kind: 'empty', rawEvents });
    }
    if (this.plan.emitToConsole) {
      this.sink.write(`${content.text}\n`);
    }
    return this.finish({ kind: 'content', text: content.text, rawEvents });
  }

  private async collect(events: AsyncIterable<StreamEvent>): Promise<AggregateOutcome> {
    let text = '';
    let emitted = false;
    let terminated = false;
    const rawEvents: ProviderRecord[] = [];

    try {
      for await (const event of events) {
        if (event.type === 'done') {
          terminated = true;
          break;
        }

        if (event.record) {
          rawEvents.push(event.record);
        }

        if (event.type === 'malformed') {
          if (event.reason !== 'empty-content') {
            this.logger.debug('Skipping malformed stream frame', { reason: event.reason, raw: event.raw });
          }
          continue;
        }

        text += event.text;
        if (this.plan.emitToConsole) {
          this.sink.write(event.text);
          emitted = true;
        }
      }
    } finally {
      if (emitted) {
        this.sink.write('\n');
      }
    }

    if (!terminated) {
      this.logger.debug('Stream ended without a [DONE] marker');
    }

    return text === '' ? { kind: 'empty', rawEvents } : { kind: 'content', text, rawEvents };
  }

  private async finish(outcome: AggregateOutcome): Promise<CompletionResult | undefined> {
    if (outcome.kind === 'empty') {
      const message = 'No content in response';
      if (isFileOnly(this.plan)) {
        this.logger.debug(message, { outFile: this.plan.writeToFile });
      } else {
        this.logger.error(message);
      }
      return undefined;
    }

    if (this.plan.writeToFile !== undefined) {
      await this.writeFile(this.plan.writeToFile, outcome.text);
      this.logger.info('Response saved', { path: this.plan.writeToFile });
    }

    if (!this.plan.captureForReturn) {
      return undefined;
    }
    return this.fullFidelity
      ? { textContent: outcome.text, rawEvents: outcome.rawEvents }
      : { textContent: outcome.text };
  }
}
