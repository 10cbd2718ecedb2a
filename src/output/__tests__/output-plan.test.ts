import { describe, it, expect } from 'vitest';
import { deriveOutputPlan, isFileOnly } from '../output-plan.js';

describe('deriveOutputPlan', () => {
  it.each([
    { streamed: false, returnRequested: false, outFile: undefined, console: true, returned: true },
    { streamed: false, returnRequested: true, outFile: undefined, console: true, returned: true },
    { streamed: false, returnRequested: false, outFile: 'out.md', console: false, returned: false },
    { streamed: false, returnRequested: true, outFile: 'out.md', console: true, returned: true },
    { streamed: true, returnRequested: false, outFile: undefined, console: true, returned: false },
    { streamed: true, returnRequested: true, outFile: undefined, console: true, returned: true },
    { streamed: true, returnRequested: false, outFile: 'out.md', console: false, returned: false },
    { streamed: true, returnRequested: true, outFile: 'out.md', console: true, returned: true },
  ])(
    'streamed=$streamed return=$returnRequested file=$outFile',
    ({ streamed, returnRequested, outFile, console, returned }) => {
      const plan = deriveOutputPlan({ streamed, returnRequested, outFile });

      expect(plan.emitToConsole).toBe(console);
      expect(plan.captureForReturn).toBe(returned);
      expect(plan.writeToFile).toBe(outFile);
    }
  );

  it('treats an empty file name as no file', () => {
    const plan = deriveOutputPlan({ streamed: false, returnRequested: false, outFile: '' });

    expect(plan.writeToFile).toBeUndefined();
    expect(plan.emitToConsole).toBe(true);
  });

  it('flags file-only mode', () => {
    expect(isFileOnly(deriveOutputPlan({ streamed: true, returnRequested: false, outFile: 'a.md' }))).toBe(true);
    expect(isFileOnly(deriveOutputPlan({ streamed: true, returnRequested: true, outFile: 'a.md' }))).toBe(false);
    expect(isFileOnly(deriveOutputPlan({ streamed: true, returnRequested: false }))).toBe(false);
  });
});
