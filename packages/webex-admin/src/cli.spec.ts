import { ConfigurationError } from './api/errors';
import { parseCommand } from './cli';

describe('parseCommand', () => {
  it('parses disable-users with defaults', () => {
    expect(parseCommand(['disable-users', '-f', 'users.csv'])).toEqual({
      name: 'disable-users',
      verbosity: 0,
      file: 'users.csv',
      column: 'email',
      report: false,
      dryRun: false,
    });
  });

  it('parses every disable-users flag', () => {
    expect(parseCommand(['disable-users', '--file', 'users.csv', '-c', 'Mail', '-r', '--dry-run', '-vv'])).toEqual({
      name: 'disable-users',
      verbosity: 2,
      file: 'users.csv',
      column: 'Mail',
      report: true,
      dryRun: true,
    });
  });

  it('requires a file for disable-users', () => {
    expect(() => parseCommand(['disable-users'])).toThrow(ConfigurationError);
  });

  it('parses recording-report options', () => {
    expect(parseCommand(['recording-report', '-p', '30', '-s', '10', '-w', 'out', '--verbose'])).toEqual({
      name: 'recording-report',
      verbosity: 1,
      period: 30,
      span: 10,
      write: 'out',
    });
    expect(parseCommand(['recording-report'])).toEqual({
      name: 'recording-report',
      verbosity: 0,
      period: 90,
      span: 7,
      write: undefined,
    });
  });

  it('rejects non-numeric day counts', () => {
    expect(() => parseCommand(['recording-report', '--period', 'ninety'])).toThrow(ConfigurationError);
  });

  it('falls back to help', () => {
    expect(parseCommand([])).toEqual({ name: 'help', verbosity: 0 });
    expect(parseCommand(['disable-users', '--help'])).toEqual({ name: 'help', verbosity: 0 });
  });

  it('rejects unknown commands', () => {
    expect(() => parseCommand(['delete-everything'])).toThrow(ConfigurationError);
  });
});
