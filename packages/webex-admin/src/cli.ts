import minimist from 'minimist';
import { ConfigurationError } from './api/errors';
import { disableUsersMain, DisableUsersArgs } from './workflows/disableUsers';
import { recordingReportMain, RecordingReportArgs } from './workflows/recordingReport';
import type { WorkflowContext } from './workflows/types';

export type Command =
  | ({ name: 'disable-users'; verbosity: number } & DisableUsersArgs)
  | ({ name: 'recording-report'; verbosity: number } & RecordingReportArgs)
  | { name: 'help'; verbosity: number };

export const USAGE = `Usage: webex-admin <command> [options]

Commands:
  disable-users      Disable Webex users listed in a CSV file
    -f, --file FILE      CSV file with users data (required)
    -c, --column NAME    Column holding the user email (default: email)
    -r, --report         Write a JSON report to the current directory
    -d, --dry-run        Show what would be disabled without changing anything

  recording-report   Generate a recording access audit report
    -p, --period DAYS    Report period in days (default 90, max 365)
    -s, --span DAYS      Days per request window (default 7, max 90)
    -w, --write FILE     Write the report to a CSV file

Options:
  -v, --verbose        More output; repeat for request tracing
  -h, --help           Show this help
`;

function text(value: unknown): string | undefined {
  if (Array.isArray(value)) return text(value[value.length - 1]);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

// minimist collapses repeated boolean flags, so -v is counted from the raw argv.
function verbosityOf(argv: string[]): number {
  let level = 0;
  for (const arg of argv) {
    if (arg === '--') break;
    if (arg === '--verbose') level++;
    else if (/^-[a-zA-Z]+$/.test(arg)) level += arg.split('v').length - 1;
  }
  return level;
}

function days(value: unknown, option: string, fallback: number): number {
  const raw = text(value);
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) throw new ConfigurationError(`--${option} must be a whole number of days, got "${raw}"`);
  return Number(raw);
}

export function parseCommand(argv: string[]): Command {
  const args = minimist(argv, {
    string: ['file', 'column', 'period', 'span', 'write'],
    boolean: ['report', 'dry-run', 'help', 'verbose'],
    alias: {
      f: 'file',
      c: 'column',
      r: 'report',
      d: 'dry-run',
      p: 'period',
      s: 'span',
      w: 'write',
      h: 'help',
      v: 'verbose',
    },
  });
  const verbosity = verbosityOf(argv);
  const name = text(args._[0]);

  if (args.help || name === undefined || name === 'help') {
    return { name: 'help', verbosity };
  }

  switch (name) {
    case 'disable-users': {
      const file = text(args.file);
      if (!file) throw new ConfigurationError('disable-users requires --file');
      return {
        name: 'disable-users',
        verbosity,
        file,
        column: text(args.column) || 'email',
        report: args.report === true,
        dryRun: args['dry-run'] === true,
      };
    }
    case 'recording-report':
      return {
        name: 'recording-report',
        verbosity,
        period: days(args.period, 'period', 90),
        span: days(args.span, 'span', 7),
        write: text(args.write) || undefined,
      };
    default:
      throw new ConfigurationError(`Unknown command "${name}"`);
  }
}

export async function runCommand(command: Command, ctx: WorkflowContext): Promise<void> {
  switch (command.name) {
    case 'help':
      process.stdout.write(USAGE);
      return;
    case 'disable-users':
      await disableUsersMain(command, ctx);
      return;
    case 'recording-report':
      await recordingReportMain(command, ctx);
      return;
  }
}
