import { DEFAULT_REVIEWS_DIRECTORY } from './run.js';

export type ParsedCli = Readonly<{
  directory: string;
  help: boolean;
}>;

export const USAGE = [
  'Usage: review-enhancer [directory]',
  '',
  `Adds a wordCount field to every review in the Reviews*.json files of <directory> (default: "${DEFAULT_REVIEWS_DIRECTORY}").`,
  '',
  'Environment:',
  '  LOG_LEVEL            debug | info | warn | error | fatal (default: info)',
  '  REVIEWS_STRICT_EXIT  exit with status 1 when any file fails (default: off)',
].join('\n');

// Only -h/--help is special; any other first argument is the directory.
export function parseCli(argv: readonly string[]): ParsedCli {
  const help = argv.some((a) => a === '-h' || a === '--help');
  const positional = argv.filter((a) => a !== '-h' && a !== '--help');
  return {
    directory: positional[0] ?? DEFAULT_REVIEWS_DIRECTORY,
    help,
  };
}
