/**
 * Command-line arguments for the fetch command
 *
 * Usage: nhl-score-ingest [--date YYYY-MM-DD]... [--force] [--migrate]
 */

import { ValidationError } from '../errors/index.js';
import { isValidDateISO } from '../util/validation.js';

export interface FetchArgs {
  /** Dates to fetch, in the order given; empty means "today" */
  dates: string[];
  force: boolean;
  migrate: boolean;
  help: boolean;
}

export const USAGE = `Usage: nhl-score-ingest [options]

Fetches the NHL scoreboard for one or more dates and stores it.

Options:
  --date YYYY-MM-DD  Date to fetch (repeatable). Defaults to FETCH_DATE or today.
  --force            Overwrite scores and state of games already final.
  --migrate          Apply pending database migrations before fetching.
  -h, --help         Show this help.
`;

function readDate(value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError('--date requires a value', 'date');
  }
  if (!isValidDateISO(value)) {
    throw new ValidationError(`Date must be in YYYY-MM-DD format, got "${value}"`, 'date');
  }
  return value;
}

/**
 * Parses argv (without the node and script entries)
 *
 * @throws ValidationError on unknown options or malformed dates
 */
export function parseArgs(argv: string[]): FetchArgs {
  const args: FetchArgs = { dates: [], force: false, migrate: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--force') {
      args.force = true;
    } else if (arg === '--migrate') {
      args.migrate = true;
    } else if (arg === '--date') {
      args.dates.push(readDate(argv[++i]));
    } else if (arg.startsWith('--date=')) {
      args.dates.push(readDate(arg.slice('--date='.length)));
    } else {
      throw new ValidationError(`Unknown argument: ${arg}`, 'argv');
    }
  }

  return args;
}
