import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import treeKill from 'tree-kill';
import { debug } from '../lib/utils/debug.js';
import type { ActionOutcome, OutputSink } from './types.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*env\.\s*([a-zA-Z_]\w*)\s*\}\}/g;

/** Replace `${{ env.NAME }}` markers; unknown variables are left intact */
export function expandVariables(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(VARIABLE_PATTERN, (match, name: string) => env[name] ?? match);
}

// ── Passthrough arguments ──

const SAFE_ARG = /^[A-Za-z0-9_\-.,/:=@%+]+$/;

/** Quote an argument for a POSIX shell unless it only holds safe characters */
export function quoteShellArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Replace every `$@` with the passthrough arguments */
export function substitutePassthrough(command: string, args: readonly string[]): string {
  if (!command.includes('$@')) return command;
  const joined = args.map(quoteShellArg).join(' ');
  return command.replaceAll('$@', () => joined);
}

// ── Process execution ──

export interface ShellOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  output: OutputSink;
  signal?: AbortSignal;
  /** Delay between SIGTERM and SIGKILL once the signal aborts */
  killGraceMs?: number;
}

export const DEFAULT_KILL_GRACE_MS = 3000;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Exit code for a process that ended on a signal, shell-style */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  const number = signal ? SIGNAL_NUMBERS.get(signal) : undefined;
  return number === undefined ? 1 : 128 + number;
}

/**
 * Run a command through the system shell. Output is forwarded to the sink
 * as it arrives and captured in full. Aborting the signal terminates the child.
 */
export function runShellCommand(command: string, options: ShellOptions): Promise<ActionOutcome> {
  return new Promise<ActionOutcome>((resolvePromise, reject) => {
    debug('shell', `spawn: ${command}`, `(cwd: ${options.cwd})`);

    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env,
      shell: true,
      windowsHide: true,
      stdio: ['inherit', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
      options.output.stdout(chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
      options.output.stderr(chunk);
    });

    let killTimer: NodeJS.Timeout | undefined;
    const killTree = (pid: number, signal: NodeJS.Signals): void => {
      treeKill(pid, signal, (err) => {
        if (err) debug('shell', `${signal} to ${pid} failed:`, err.message);
      });
    };

    // Descendants of the shell hold the output pipes open; kill the whole tree
    const onAbort = (): void => {
      const pid = child.pid;
      if (pid === undefined) return;
      debug('shell', `abort: terminating process tree ${pid}`);
      killTree(pid, 'SIGTERM');
      killTimer = setTimeout(() => {
        debug('shell', `abort: ${pid} still running, sending SIGKILL`);
        killTree(pid, 'SIGKILL');
      }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    };
    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener('abort', onAbort, { once: true });

    const settle = (): void => {
      options.signal?.removeEventListener('abort', onAbort);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('error', (err) => {
      settle();
      reject(err);
    });

    child.on('close', (code, signal) => {
      settle();
      const exit_code = code ?? signalExitCode(signal);
      debug('shell', `exit ${exit_code}: ${command}`);
      resolvePromise({ exit_code, stdout, stderr });
    });
  });
}
