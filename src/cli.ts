import { parseArgs } from 'util';

export interface CliOptions {
  configPath: string;
  startDate?: string;
  endDate?: string;
  generateIcs: boolean;
}

/** The outcome of reading argv: run a generation, or just print the usage text. */
export type CliCommand = { kind: 'run'; options: CliOptions } | { kind: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `
Rotation Scheduler

Generates a layered on-call schedule spreadsheet (xlsx), a timeline (svg)
and optionally one ICS calendar per team member from a YAML configuration.

Usage: rotation-scheduler --config <file.yaml> [options]

Options:
  --config <path>       Path to the YAML schedule configuration (required)
  --start-date <date>   YYYY-MM-DD (e.g. 2026-01-20), relative (e.g. +2w, +3m) or "today"
  --end-date <date>     YYYY-MM-DD, or relative to --start-date when given, otherwise to today
  --generate-ics        Also write one ICS calendar file per team member
  --help, -h            Show this help message

Outputs are written to <SCHEDULE_OUTPUT_ROOT>/<config name>/.
`;

export function parseCliArguments(argv: string[]): CliCommand {
  let values: { config?: string; 'start-date'?: string; 'end-date'?: string; 'generate-ics'?: boolean; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string' },
        'start-date': { type: 'string' },
        'end-date': { type: 'string' },
        'generate-ics': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    return { kind: 'help' };
  }

  if (!values.config) {
    throw new CliUsageError('Missing required option --config <path>');
  }

  return {
    kind: 'run',
    options: {
      configPath: values.config,
      startDate: values['start-date'],
      endDate: values['end-date'],
      generateIcs: values['generate-ics'] ?? false,
    },
  };
}
