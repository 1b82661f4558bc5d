import { Command } from 'commander';
import { createRunCommand, type RunCommandContext } from './commands/run/index.js';
import { createListCommand } from './commands/list/index.js';

export const VERSION = '0.1.0';

/** Split CLI arguments at the first `--`; everything after it is passed to `$@` */
export function splitPassthrough(args: readonly string[]): { args: string[]; passthrough: string[] } {
  const index = args.indexOf('--');
  if (index === -1) return { args: [...args], passthrough: [] };
  return { args: args.slice(0, index), passthrough: args.slice(index + 1) };
}

export function createProgram(context: RunCommandContext = {}): Command {
  const program = new Command();

  program
    .name('yaml-runner')
    .description('Run commands declared in a YAML config')
    .version(VERSION);

  program.addCommand(createRunCommand(context), { isDefault: true });
  program.addCommand(createListCommand());

  return program;
}

export interface MainOptions {
  resolver?: RunCommandContext['resolver'];
}

/** CLI entry point. `argv` is the full process argv (node, script, ...args). */
export async function main(argv: readonly string[] = process.argv, options: MainOptions = {}): Promise<void> {
  const { args, passthrough } = splitPassthrough(argv.slice(2));
  const program = createProgram({ resolver: options.resolver, passthrough });
  await program.parseAsync(args, { from: 'user' });
}
