import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import type { CompletionClient } from '../client/types.js';
import { createClientFromEnv } from '../client/factory.js';
import type { CredentialProvider } from '../credentials/types.js';
import { defaultCredentialProvider } from '../credentials/index.js';
import { ConsoleLogger, LOG_LEVELS, isLogLevel, type LogLevel, type LogWriter, type Logger } from '../observability/logging.js';
import type { OutputSink } from '../output/sink.js';
import { stdoutSink } from '../output/sink.js';
import type { ClipboardResult } from '../vision/clipboard.js';
import { copyToClipboard } from '../vision/clipboard.js';
import { VERSION } from '../version.js';

export interface CliContext {
  logger: Logger;
  sink: OutputSink;
}

export interface CliDependencies {
  createClient?: (context: CliContext) => Promise<CompletionClient>;
  credentials?: (context: CliContext) => CredentialProvider;
  copyToClipboard?: (text: string) => Promise<ClipboardResult>;
  stdout?: OutputSink;
  stderr?: LogWriter;
  env?: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  logLevel?: LogLevel;
};

interface AskOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  out?: string;
  echo?: boolean;
  raw?: boolean;
}

interface AltTextOptions {
  model?: string;
  stream?: boolean;
  out?: string;
  copy?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

const defaultStderr: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export function buildProgram(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const sink = deps.stdout ?? stdoutSink;
  const stderr = deps.stderr ?? defaultStderr;
  const copy = deps.copyToClipboard ?? ((text: string) => copyToClipboard(text));

  const contextFor = (command: Command): CliContext => {
    const { logLevel } = command.optsWithGlobals<GlobalOptions>();
    const envLevel = env['OPENROUTER_LOG_LEVEL'];
    const level = logLevel ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');
    return { logger: new ConsoleLogger({ level }, {}, stderr), sink };
  };
  const clientFor = (context: CliContext): Promise<CompletionClient> =>
    deps.createClient ? deps.createClient(context) : createClientFromEnv({ logger: context.logger, sink: context.sink }, env);
  const credentialsFor = (context: CliContext): CredentialProvider =>
    deps.credentials ? deps.credentials(context) : defaultCredentialProvider(process.platform, { logger: context.logger, env });

  const program = new Command();

  program
    .name('openrouter-prompt')
    .description('Send prompts to models on OpenRouter')
    .version(VERSION)
    .addOption(new Option('--log-level <level>', 'Log verbosity (logs go to stderr)').choices(LOG_LEVELS))
    .configureOutput({
      writeOut: (text) => sink.write(text),
      writeErr: (text) => stderr(text.replace(/\n$/, '')),
    })
    .exitOverride();

  program
    .command('ask')
    .description('Send a prompt and print the answer')
    .argument('<prompt...>', 'Prompt text')
    .option('-m, --model <model>', 'Model to use (defaults to the saved default model)')
    .option('-t, --temperature <value>', 'Sampling temperature', parseNumber)
    .option('--max-tokens <n>', 'Maximum tokens to generate', parsePositiveInt)
    .option('-s, --stream', 'Print tokens as they arrive')
    .option('-o, --out <file>', 'Write the answer to a file instead of the terminal')
    .option('--echo', 'Also print the answer when writing to a file')
    .option('--raw', 'Print every provider record as JSON after the answer')
    .action(async (words: string[], options: AskOptions, command: Command) => {
      const context = contextFor(command);
      const client = await clientFor(context);
      const result = await client.complete({
        prompt: words.join(' '),
        model: options.model,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        stream: options.stream ?? false,
        outFile: options.out,
        returnRequested: Boolean(options.echo || options.raw),
        fullFidelity: options.raw ?? false,
      });
      if (options.raw && result?.rawEvents) {
        sink.write(`${JSON.stringify(result.rawEvents, null, 2)}\n`);
      }
    });

  program
    .command('alt-text')
    .description('Generate alt text for an image')
    .argument('<image>', 'PNG, JPEG, GIF or WebP file')
    .option('-m, --model <model>', 'Vision-capable model to use')
    .option('-s, --stream', 'Print tokens as they arrive')
    .option('-o, --out <file>', 'Write the alt text to a file instead of the terminal')
    .option('--copy', 'Copy the alt text to the clipboard')
    .action(async (image: string, options: AltTextOptions, command: Command) => {
      const context = contextFor(command);
      const client = await clientFor(context);
      const result = await client.describeImage({
        image,
        model: options.model,
        stream: options.stream ?? false,
        outFile: options.out,
        returnRequested: options.copy ?? false,
      });
      if (options.copy && result) {
        const copied = await copy(result.textContent);
        if (copied.ok) {
          context.logger.info('Copied alt text to clipboard', { tool: copied.tool });
        } else {
          context.logger.warn('Could not copy to clipboard', { reason: copied.reason });
        }
      }
    });

  program
    .command('set-key')
    .description('Save the OpenRouter API key in the system credential store')
    .argument('<key>', 'API key')
    .action(async (key: string, _options: unknown, command: Command) => {
      const context = contextFor(command);
      const result = await credentialsFor(context).set(key.trim());
      if (!result.ok) {
        throw result.error;
      }
      if (result.store === 'environment') {
        context.logger.warn('No system credential store accepted the key; it is set for this process only');
      }
      sink.write(`API key saved to ${result.store}\n`);
    });

  program
    .command('get-model')
    .description('Print the default model')
    .action(async (_options: unknown, command: Command) => {
      const client = await clientFor(contextFor(command));
      sink.write(`${client.modelSettings.get()}\n`);
    });

  program
    .command('set-model')
    .description('Change the default model')
    .argument('<model>', 'Model identifier, e.g. openai/gpt-4o-mini')
    .action(async (model: string, _options: unknown, command: Command) => {
      const client = await clientFor(contextFor(command));
      await client.modelSettings.set(model);
      sink.write(`Default model set to ${client.modelSettings.get()}\n`);
    });

  return program;
}

/** Runs the CLI and resolves with the process exit code. */
export async function run(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const program = buildProgram(deps);
  const stderr = deps.stderr ?? defaultStderr;
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const name = error instanceof Error ? error.name : 'Error';
    const message = error instanceof Error ? error.message : String(error);
    stderr(`${name}: ${message}`);
    return 1;
  }
}
