import { Command, Option } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { ExitCode, withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadConfigFile } from '../../config/parser.js';
import type { ConfigDocument, StepDefinition } from '../../config/types.js';
import { planRun, runConfig, selectSections } from '../../runner/runner.js';
import { createDefaultResolver } from '../../runner/resolver.js';
import { substitutePassthrough } from '../../runner/shell.js';
import { processOutput, silentOutput } from '../../runner/output.js';
import { installShutdownHandlers } from '../../runner/shutdown.js';
import type { CommandResolver, RunStatus } from '../../runner/types.js';
import { createConsoleReporter } from '../../lib/ui/step-reporter.js';
import { formatSectionList } from '../../lib/ui/section-list.js';

export interface RunCommandContext {
  resolver?: CommandResolver;
  /** Arguments after `--` */
  passthrough?: readonly string[];
}

interface RunCommandOptions {
  config: string;
  all?: boolean;
  continueOnFailure?: boolean;
  cwd?: string;
  dryRun?: boolean;
  json?: boolean;
  quiet?: boolean;
}

export function exitCodeFor(status: RunStatus): ExitCode {
  switch (status) {
    case 'passed':
      return ExitCode.SUCCESS;
    case 'failed':
      return ExitCode.STEP_FAILED;
    case 'interrupted':
      return ExitCode.INTERRUPTED;
  }
}

function describeStep(step: StepDefinition, passthrough: readonly string[]): string {
  return step.kind === 'shell' ? substitutePassthrough(step.run, passthrough) : `call ${step.call}`;
}

function printPlan(
  doc: ConfigDocument,
  sections: readonly string[] | undefined,
  resolver: CommandResolver,
  passthrough: readonly string[],
  json: boolean,
): void {
  const selected = selectSections(doc, sections);
  planRun(selected, resolver);

  if (json) {
    console.log(JSON.stringify({
      config: doc.source,
      sections: selected.map((s) => ({
        name: s.name,
        steps: s.steps.map((step) => ({
          kind: step.kind,
          label: step.label,
          command: describeStep(step, passthrough),
          skip: step.skip,
        })),
      })),
      valid: true,
    }));
    return;
  }

  console.log(chalk.green(`✓ Config is valid`));
  for (const section of selected) {
    console.log(`\n▶ ${chalk.bold(section.name)}`);
    for (const step of section.steps) {
      const skipped = step.skip ? chalk.dim(' (skipped)') : '';
      console.log(`  ○ ${describeStep(step, passthrough)}${skipped}`);
    }
  }
}

export function createRunCommand(context: RunCommandContext = {}): Command {
  const resolver = context.resolver ?? createDefaultResolver();
  const passthrough = context.passthrough ?? [];

  return new Command('run')
    .description('Run sections of a YAML config in order')
    .argument('[sections...]', 'Sections to run, in order (lists sections when omitted)')
    .addOption(
      new Option('-c, --config <path>', 'Path to the YAML config')
        .env('YAML_RUNNER_CONFIG')
        .makeOptionMandatory(),
    )
    .option('--all', 'Run every section in declaration order')
    .option('--continue-on-failure', 'Keep running after a step fails')
    .option('--cwd <dir>', 'Working directory for steps (defaults to the config directory)')
    .option('--dry-run', 'Validate and print the steps, do not execute')
    .option('--json', 'Output result as JSON')
    .option('--quiet', 'Do not echo step output')
    .action(
      withErrorHandler(async (sectionArgs: string[], options: RunCommandOptions) => {
        const doc = loadConfigFile(options.config);

        if (sectionArgs.length === 0 && !options.all) {
          if (options.json) {
            console.log(JSON.stringify({ config: doc.source, sections: doc.sections.map((s) => s.name) }));
          } else {
            for (const line of formatSectionList(doc)) console.log(line);
          }
          return;
        }

        const sections = options.all ? undefined : sectionArgs;

        if (options.dryRun) {
          printPlan(doc, sections, resolver, passthrough, options.json === true);
          return;
        }

        const shutdown = installShutdownHandlers();
        try {
          const summary = await runConfig(doc, {
            sections,
            resolver,
            passthrough,
            continueOnFailure: options.continueOnFailure,
            cwd: options.cwd ? resolve(options.cwd) : undefined,
            hooks: options.json ? undefined : createConsoleReporter(),
            output: options.json || options.quiet ? silentOutput : processOutput,
            stopSignal: shutdown.stopSignal,
            killSignal: shutdown.killSignal,
          });

          if (options.json) {
            console.log(JSON.stringify({ config: doc.source, ...summary }));
          }
          process.exitCode = exitCodeFor(summary.status);
        } finally {
          shutdown.dispose();
        }
      }),
    );
}
