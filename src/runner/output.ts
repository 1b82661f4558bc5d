import type { OutputSink } from './types.js';

/** Echo step output to this process's stdout/stderr */
export const processOutput: OutputSink = {
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

/** Capture only */
export const silentOutput: OutputSink = {
  stdout: () => {},
  stderr: () => {},
};
