export interface OutputRequest {
  streamed: boolean;
  returnRequested: boolean;
  outFile?: string;
}

/** Where one call's content goes. Derived once, before any I/O. */
export interface OutputPlan {
  readonly streamed: boolean;
  readonly emitToConsole: boolean;
  readonly captureForReturn: boolean;
  readonly writeToFile?: string;
}

/**
 * Naming an output file silences the console unless the caller also asked
 * for the content back. A streamed call only returns what was asked for,
 * since the console already received it piece by piece.
 */
export function deriveOutputPlan({ streamed, returnRequested, outFile }: OutputRequest): OutputPlan {
  const writeToFile = outFile ? outFile : undefined;
  const emitToConsole = !(writeToFile !== undefined && !returnRequested);
  return {
    streamed,
    emitToConsole,
    captureForReturn: emitToConsole && (returnRequested || !streamed),
    writeToFile,
  };
}

/** File-only mode: the caller sees nothing but the file. */
export function isFileOnly(plan: OutputPlan): boolean {
  return plan.writeToFile !== undefined && !plan.emitToConsole;
}
