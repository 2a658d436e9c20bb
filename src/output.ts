const PREFIX = '[update]';

export function print(message: string): void {
  process.stdout.write(message + '\n');
}

export function printError(message: string): void {
  process.stderr.write(message + '\n');
}

export type Reporter = {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

type ReporterOptions = {
  quiet: boolean;
};

// Quiet mode silences everything except errors, which always go to stderr.
export function createReporter({ quiet }: ReporterOptions): Reporter {
  const write = (message: string) => {
    if (!quiet) print(`${PREFIX} ${message}`);
  };

  return {
    info: write,
    success: write,
    warn: write,
    error: (message) => printError(`${PREFIX} ${message}`),
  };
}
