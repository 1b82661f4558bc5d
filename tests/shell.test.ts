import { describe, it, expect } from 'vitest';
import { realpathSync } from 'node:fs';
import { join } from 'node:path';
import {
  expandVariables,
  quoteShellArg,
  substitutePassthrough,
  signalExitCode,
  runShellCommand,
} from '../src/runner/shell.js';
import { silentOutput } from '../src/runner/output.js';
import type { OutputSink } from '../src/runner/types.js';
import { testContext } from './helpers/test-context.js';

const ctx = testContext();

function recordingSink(): OutputSink & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (chunk) => out.push(chunk),
    stderr: (chunk) => err.push(chunk),
  };
}

// ── Variable expansion ──

describe('expandVariables', () => {
  it('expands env variables', () => {
    expect(expandVariables('Deploy to ${{ env.TARGET }}', { TARGET: 'staging' })).toBe('Deploy to staging');
  });

  it('leaves unresolved variables intact', () => {
    expect(expandVariables('Key: ${{ env.MISSING }}', {})).toBe('Key: ${{ env.MISSING }}');
  });

  it('handles multiple variables', () => {
    expect(expandVariables('${{ env.A }} and ${{env.B}}', { A: 'hello', B: 'world' })).toBe('hello and world');
  });

  it('does not touch plain shell variables', () => {
    expect(expandVariables('echo $HOME', { HOME: '/home/x' })).toBe('echo $HOME');
  });
});

// ── Passthrough ──

describe('quoteShellArg', () => {
  it('leaves safe arguments alone', () => {
    expect(quoteShellArg('TEST')).toBe('TEST');
    expect(quoteShellArg('--flag=a/b.c')).toBe('--flag=a/b.c');
  });

  it('quotes arguments with spaces or metacharacters', () => {
    expect(quoteShellArg('hello world')).toBe("'hello world'");
    expect(quoteShellArg('$(rm -rf /)')).toBe("'$(rm -rf /)'");
  });

  it('escapes single quotes', () => {
    expect(quoteShellArg("it's")).toBe("'it'\\''s'");
  });

  it('quotes the empty string', () => {
    expect(quoteShellArg('')).toBe("''");
  });
});

describe('substitutePassthrough', () => {
  it('replaces $@ with the quoted arguments', () => {
    expect(substitutePassthrough('echo $@', ['a', 'b c'])).toBe("echo a 'b c'");
  });

  it('replaces every occurrence', () => {
    expect(substitutePassthrough('echo $@ && echo $@', ['x'])).toBe('echo x && echo x');
  });

  it('leaves commands without $@ unchanged', () => {
    expect(substitutePassthrough('make all', ['ignored'])).toBe('make all');
  });

  it('substitutes nothing when there are no arguments', () => {
    expect(substitutePassthrough('echo $@', [])).toBe('echo ');
  });

  it('does not interpret replacement patterns in arguments', () => {
    expect(substitutePassthrough('echo $@', ['$&'])).toBe("echo '$&'");
  });
});

describe('signalExitCode', () => {
  it('maps signals to 128 + number', () => {
    expect(signalExitCode('SIGTERM')).toBe(143);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });

  it('falls back to 1 without a signal', () => {
    expect(signalExitCode(null)).toBe(1);
  });
});

// ── runShellCommand ──

describe('runShellCommand', () => {
  it('captures stdout on exit 0', async () => {
    const dir = ctx.createTempDir();
    const result = await runShellCommand('echo hello', { cwd: dir, env: process.env, output: silentOutput });
    expect(result).toEqual({ exit_code: 0, stdout: 'hello\n', stderr: '' });
  });

  it('captures stderr and the exit code', async () => {
    const dir = ctx.createTempDir();
    const result = await runShellCommand('echo oops 1>&2; exit 3', {
      cwd: dir,
      env: process.env,
      output: silentOutput,
    });
    expect(result).toEqual({ exit_code: 3, stdout: '', stderr: 'oops\n' });
  });

  it('forwards output to the sink as it is captured', async () => {
    const dir = ctx.createTempDir();
    const sink = recordingSink();
    const result = await runShellCommand('echo out; echo err 1>&2', { cwd: dir, env: process.env, output: sink });
    expect(sink.out.join('')).toBe(result.stdout);
    expect(sink.err.join('')).toBe('err\n');
  });

  it('runs in the given working directory', async () => {
    const dir = ctx.createTempDir();
    const result = await runShellCommand('pwd', { cwd: dir, env: process.env, output: silentOutput });
    expect(realpathSync(result.stdout.trim())).toBe(realpathSync(dir));
  });

  it('passes the environment', async () => {
    const dir = ctx.createTempDir();
    const result = await runShellCommand('echo $GREETING', {
      cwd: dir,
      env: { ...process.env, GREETING: 'hi' },
      output: silentOutput,
    });
    expect(result.stdout).toBe('hi\n');
  });

  it('terminates the process when the signal aborts', async () => {
    const dir = ctx.createTempDir();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const result = await runShellCommand('exec sleep 10', {
      cwd: dir,
      env: process.env,
      output: silentOutput,
      signal: controller.signal,
    });
    expect(result.exit_code).toBe(143);
  }, 10_000);

  it('terminates the processes the shell started', async () => {
    const dir = ctx.createTempDir();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);
    const started = Date.now();
    const result = await runShellCommand('sleep 3; echo done', {
      cwd: dir,
      env: process.env,
      output: silentOutput,
      signal: controller.signal,
    });
    expect(Date.now() - started).toBeLessThan(2000);
    expect(result.exit_code).toBe(143);
    expect(result.stdout).toBe('');
  }, 10_000);

  it('kills a process that ignores SIGTERM after the grace period', async () => {
    const dir = ctx.createTempDir();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);
    const started = Date.now();
    const result = await runShellCommand("trap '' TERM; sleep 3", {
      cwd: dir,
      env: process.env,
      output: silentOutput,
      signal: controller.signal,
      killGraceMs: 200,
    });
    expect(Date.now() - started).toBeLessThan(2000);
    expect(result.exit_code).toBe(137);
  }, 10_000);

  it('terminates at once when the signal is already aborted', async () => {
    const dir = ctx.createTempDir();
    const controller = new AbortController();
    controller.abort();
    const result = await runShellCommand('exec sleep 10', {
      cwd: dir,
      env: process.env,
      output: silentOutput,
      signal: controller.signal,
    });
    expect(result.exit_code).toBe(143);
  }, 10_000);

  it('rejects when the process cannot be spawned', async () => {
    const dir = ctx.createTempDir();
    await expect(
      runShellCommand('echo hi', { cwd: join(dir, 'missing'), env: process.env, output: silentOutput }),
    ).rejects.toThrow('ENOENT');
  });
});
