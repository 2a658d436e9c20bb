import { Command } from '@commander-js/extra-typings';

export type CliOptions = {
  quiet: boolean;
  force: boolean;
};

type CliAction = (options: CliOptions) => Promise<void>;

const EXAMPLES = `
Examples:
  $ agentation-update             # Check and update if needed
  $ agentation-update --quiet     # Silent mode (for wrapper scripts)
  $ agentation-update --force     # Force re-download`;

export function createProgram(action: CliAction) {
  return new Command()
    .name('agentation-update')
    .description('Update the agentation checkout and its OpenCode binary')
    .option('-q, --quiet', 'Suppress non-error output')
    .option('-f, --force', 'Force update even if up-to-date')
    .helpOption('-h, --help', 'Show this help message')
    .allowUnknownOption()
    .allowExcessArguments()
    .addHelpText('after', EXAMPLES)
    .action(async (options) => {
      await action({
        quiet: options.quiet ?? false,
        force: options.force ?? false,
      });
    });
}
