/** Receives model text destined for the terminal. */
export interface OutputSink {
  write(text: string): void;
}

export const stdoutSink: OutputSink = {
  write(text) {
    process.stdout.write(text);
  },
};
