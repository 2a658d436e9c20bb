import { loadSettings } from './config.ts';
import { createUpdaterContext, runUpdate } from './orchestrator.ts';
import { createReporter, printError } from './output.ts';
import { createProgram, type CliOptions } from './program.ts';

async function main({ quiet, force }: CliOptions): Promise<void> {
  const settingsResult = await loadSettings();
  if (!settingsResult.success) {
    printError(`[update] Error reading config: ${settingsResult.error}`);
    process.exitCode = 1;
    return;
  }

  const reporter = createReporter({ quiet });
  const ctx = await createUpdaterContext(settingsResult.data, reporter);
  const summary = await runUpdate(ctx, { force });
  process.exitCode = summary.exitCode;
}

await createProgram(main).parseAsync();
