import type { CallStep, ShellStep } from '../config/types.js';
import { expandVariables, runShellCommand, substitutePassthrough } from './shell.js';
import type { ActionOutcome, Callable, CommandResolver, StepAction } from './types.js';

/** Action that runs a `run:` step through the shell */
export function shellAction(step: ShellStep): StepAction {
  return (ctx) => {
    const command = substitutePassthrough(expandVariables(step.run, ctx.env), ctx.passthrough);
    return runShellCommand(command, {
      cwd: ctx.cwd,
      env: ctx.env,
      output: ctx.output,
      signal: ctx.signal,
      killGraceMs: ctx.killGraceMs,
    });
  };
}

function toOutcome(value: ActionOutcome | number | void): ActionOutcome {
  if (typeof value === 'number') return { exit_code: value, stdout: '', stderr: '' };
  if (typeof value === 'object') return value;
  return { exit_code: 0, stdout: '', stderr: '' };
}

/** Action that invokes a registered callable for a `call:` step */
export function callableAction(step: CallStep, fn: Callable): StepAction {
  return async (ctx) => toOutcome(await fn(step.with, ctx));
}

export interface DefaultResolverOptions {
  /** Functions reachable from `call:` steps, by name */
  callables?: Readonly<Record<string, Callable>>;
}

/** Shell steps run through the shell; call steps look up the callable registry */
export function createDefaultResolver(options: DefaultResolverOptions = {}): CommandResolver {
  const callables = new Map(Object.entries(options.callables ?? {}));
  return {
    resolve(step) {
      if (step.kind === 'shell') return shellAction(step);
      const fn = callables.get(step.call);
      return fn ? callableAction(step, fn) : null;
    },
  };
}

/** First resolver returning an action wins */
export function chainResolvers(...resolvers: CommandResolver[]): CommandResolver {
  return {
    resolve(step, section) {
      for (const resolver of resolvers) {
        const action = resolver.resolve(step, section);
        if (action) return action;
      }
      return null;
    },
  };
}
