/**
 * Graceful shutdown handler.
 *
 * - First Ctrl+C: abort `stopSignal`, the runner stops after the current step
 * - Second Ctrl+C: abort `killSignal`, the current step's process is terminated;
 *   the process exits with code 1 if still alive after `forceExitMs`
 * - Third Ctrl+C: exit immediately
 */

export interface ShutdownSignals {
  stopSignal: AbortSignal;
  killSignal: AbortSignal;
  /** Remove the SIGINT listener */
  dispose(): void;
}

export interface ShutdownOptions {
  log?: (message: string) => void;
  /** Source of SIGINT events. Defaults to `process`. */
  emitter?: NodeJS.EventEmitter;
  /** Defaults to `process.exit` */
  exit?: (code: number) => void;
  forceExitMs?: number;
}

export const FORCE_EXIT_MS = 3000;

export function installShutdownHandlers(options: ShutdownOptions = {}): ShutdownSignals {
  const emitter = options.emitter ?? process;
  const log = options.log ?? ((message: string) => console.error(message));
  const stop = new AbortController();
  const kill = new AbortController();
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let sigintCount = 0;
  let exitTimer: NodeJS.Timeout | undefined;

  const onSigint = (): void => {
    sigintCount++;
    if (sigintCount === 1) {
      log('\n⏸ Stopping after current step completes...');
      log('  Press Ctrl+C again to force quit.\n');
      stop.abort();
    } else if (sigintCount === 2) {
      log('\n⚡ Force quit. Terminating current step.');
      kill.abort();
      // Give the step a moment to die, then force exit
      exitTimer = setTimeout(() => exit(1), options.forceExitMs ?? FORCE_EXIT_MS);
      exitTimer.unref();
    } else {
      exit(1);
    }
  };

  emitter.on('SIGINT', onSigint);

  return {
    stopSignal: stop.signal,
    killSignal: kill.signal,
    dispose: () => {
      emitter.off('SIGINT', onSigint);
      if (exitTimer) clearTimeout(exitTimer);
    },
  };
}
