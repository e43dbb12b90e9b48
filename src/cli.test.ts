import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArguments } from './cli.js';

describe('parseCliArguments', () => {
  it('should read every option', () => {
    expect(
      parseCliArguments(['--config', 'team.yaml', '--start-date', '+1w', '--end-date', '2026-06-01', '--generate-ics']),
    ).toEqual({
      kind: 'run',
      options: { configPath: 'team.yaml', startDate: '+1w', endDate: '2026-06-01', generateIcs: true },
    });
  });

  it('should default optional options', () => {
    expect(parseCliArguments(['--config=team.yaml'])).toEqual({
      kind: 'run',
      options: { configPath: 'team.yaml', startDate: undefined, endDate: undefined, generateIcs: false },
    });
  });

  it('should return help without requiring a config', () => {
    expect(parseCliArguments(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArguments(['-h', '--config', 'team.yaml'])).toEqual({ kind: 'help' });
  });

  it('should require --config', () => {
    expect(() => parseCliArguments(['--generate-ics'])).toThrow('Missing required option --config <path>');
  });

  it('should reject unknown options and positionals as usage errors', () => {
    expect(() => parseCliArguments(['--config', 'team.yaml', '--verbose'])).toThrow(CliUsageError);
    expect(() => parseCliArguments(['team.yaml'])).toThrow(CliUsageError);
  });
});
