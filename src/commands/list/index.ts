import { Command, Option } from 'commander';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { loadConfigFile } from '../../config/parser.js';
import { describeSections, formatSectionList } from '../../lib/ui/section-list.js';

export function createListCommand(): Command {
  return new Command('list')
    .description('List the sections a config declares')
    .addOption(
      new Option('-c, --config <path>', 'Path to the YAML config')
        .env('YAML_RUNNER_CONFIG')
        .makeOptionMandatory(),
    )
    .option('--json', 'Output result as JSON')
    .action(
      withErrorHandler(async (options: { config: string; json?: boolean }) => {
        const doc = loadConfigFile(options.config);

        if (options.json) {
          console.log(JSON.stringify({ config: doc.source, sections: describeSections(doc) }));
          return;
        }

        for (const line of formatSectionList(doc)) console.log(line);
      }),
    );
}
