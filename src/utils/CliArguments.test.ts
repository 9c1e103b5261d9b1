/**
 * @fileoverview Tests for CLI argument parsing and validation
 */

import { describe, it, expect } from '@jest/globals';
import { parseCliArguments, validateCliConfig } from './CliArguments';

describe('parseCliArguments', () => {
  it('should parse flags and the command', () => {
    expect(parseCliArguments(['--host=192.168.1.1', '--port=2102', '--verbose', 'status', '2'])).toEqual({
      host: '192.168.1.1',
      port: 2102,
      configPath: undefined,
      verbose: true,
      command: 'status',
      commandArgs: ['2']
    });
  });

  it('should strip quotes from flag values', () => {
    expect(parseCliArguments(['--config="./printer.json"', 'faults']).configPath).toBe('./printer.json');
  });

  it('should mark a non-numeric port as NaN', () => {
    expect(parseCliArguments(['--port=abc']).port).toBeNaN();
  });

  it('should keep every positional when the command is unknown', () => {
    const config = parseCliArguments(['--host=printer', 'explode', 'now']);

    expect(config.command).toBeUndefined();
    expect(config.commandArgs).toEqual(['explode', 'now']);
  });
});

describe('validateCliConfig', () => {
  function errorsFor(args: string[]): string[] {
    return validateCliConfig(parseCliArguments(args)).errors;
  }

  it('should accept a complete invocation', () => {
    expect(validateCliConfig(parseCliArguments(['--host=printer', 'dialog']))).toEqual({ valid: true, errors: [] });
    expect(errorsFor(['--host=printer', 'set-date', '2024-05-01T10:00:00'])).toEqual([]);
  });

  it('should require a host and a command', () => {
    expect(errorsFor([])).toEqual([
      'Missing --host',
      'Missing command (one of: dialog, start, stop-short, stop-long, status, counter, reset-counter, ' +
        'speed, faults, reset-faults, parameters, jets, date, set-date)'
    ]);
  });

  it('should name an unknown command', () => {
    expect(errorsFor(['--host=printer', 'explode'])).toEqual(['Unknown command "explode"']);
  });

  it('should reject ports outside 1..65535', () => {
    expect(errorsFor(['--host=printer', '--port=0', 'dialog'])).toEqual(['Port must be between 1 and 65535']);
    expect(errorsFor(['--host=printer', '--port=abc', 'dialog'])).toEqual(['Port must be between 1 and 65535']);
  });

  it('should require one integer jet id for jet commands', () => {
    expect(errorsFor(['--host=printer', 'speed'])).toEqual(['Command "speed" requires a jet id']);
    expect(errorsFor(['--host=printer', 'speed', 'one'])).toEqual(['Command "speed" requires a jet id']);
  });

  it('should reject arguments for commands that take none', () => {
    expect(errorsFor(['--host=printer', 'faults', '1'])).toEqual(['Command "faults" takes no arguments']);
    expect(errorsFor(['--host=printer', 'set-date', 'a', 'b'])).toEqual(['Command "set-date" takes at most one ISO date']);
  });
});
