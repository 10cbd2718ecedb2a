export type { OutputPlan, OutputRequest } from './output-plan.js';
export { deriveOutputPlan, isFileOnly } from './output-plan.js';
export type { OutputSink } from './sink.js';
export { stdoutSink } from './sink.js';
export type { FileWriter } from './file-writer.js';
export { writeOutputFile } from './file-writer.js';
export type { CompletionResult, AggregateOutcome, AggregatorOptions } from './aggregator.js';
export { ResponseAggregator } from './aggregator.js';
