/**
 * @fileoverview CLI argument parser for the v24-dialog command-line wrapper
 *
 * Parses and validates command-line arguments. The CLI is a thin layer over
 * V24PrinterClient: one connection, one command, JSON result on stdout.
 *
 * Examples:
 *   v24-dialog --host=192.168.1.1 dialog
 *   v24-dialog --host=192.168.1.1 --port=2101 start
 *   v24-dialog --host=192.168.1.1 status 1
 *   v24-dialog --host=192.168.1.1 --config=./printer.json faults
 */

import { coerceToInteger } from './validation.utils';

export const CLI_COMMANDS = [
  'dialog',
  'start',
  'stop-short',
  'stop-long',
  'status',
  'counter',
  'reset-counter',
  'speed',
  'faults',
  'reset-faults',
  'parameters',
  'jets',
  'date',
  'set-date'
] as const;

export type CliCommand = typeof CLI_COMMANDS[number];

/**
 * Commands taking a jet id as their single positional argument
 */
export const JET_COMMANDS: ReadonlySet<CliCommand> = new Set<CliCommand>([
  'status',
  'counter',
  'reset-counter',
  'speed'
]);

/**
 * Configuration parsed from CLI arguments
 */
export interface CliConfig {
  host?: string;
  port?: number;
  configPath?: string;
  verbose: boolean;
  command?: CliCommand;
  commandArgs: string[];
}

/**
 * Validation result for configuration
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some(command => command === value);
}

/**
 * Parse command-line arguments to extract configuration
 *
 * @param args Arguments after the script name (process.argv.slice(2))
 * @returns CliConfig with parsed arguments
 */
export function parseCliArguments(args: string[]): CliConfig {
  const positional = args.filter(arg => !arg.startsWith('--'));
  const [commandArg, ...commandArgs] = positional;

  const portArg = parseStringArgument(args, '--port');
  const port = portArg === undefined ? undefined : coerceToInteger(portArg) ?? NaN;

  return {
    host: parseStringArgument(args, '--host'),
    port,
    configPath: parseStringArgument(args, '--config'),
    verbose: args.includes('--verbose'),
    command: commandArg !== undefined && isCliCommand(commandArg) ? commandArg : undefined,
    commandArgs: commandArg !== undefined && !isCliCommand(commandArg) ? positional : commandArgs
  };
}

/**
 * Parse a string argument from command-line args
 *
 * @param args Argument array
 * @param flag Flag to search for (e.g., '--host')
 * @returns Parsed string or undefined
 */
function parseStringArgument(args: string[], flag: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) {
    return undefined;
  }

  const value = arg.slice(flag.length + 1);
  // Remove quotes if present
  return value.replace(/^["']|["']$/g, '');
}

/**
 * Validate configuration
 *
 * @param config CliConfig to validate
 * @returns ValidationResult with errors if any
 */
export function validateCliConfig(config: CliConfig): ValidationResult {
  const errors: string[] = [];

  if (!config.host) {
    errors.push('Missing --host');
  }

  if (config.port !== undefined) {
    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
      errors.push('Port must be between 1 and 65535');
    }
  }

  if (!config.command) {
    const given = config.commandArgs[0];
    errors.push(given ? `Unknown command "${given}"` : `Missing command (one of: ${CLI_COMMANDS.join(', ')})`);
  } else if (JET_COMMANDS.has(config.command)) {
    if (config.commandArgs.length !== 1 || coerceToInteger(config.commandArgs[0]) === null) {
      errors.push(`Command "${config.command}" requires a jet id`);
    }
  } else if (config.command === 'set-date') {
    if (config.commandArgs.length > 1) {
      errors.push('Command "set-date" takes at most one ISO date');
    }
  } else if (config.commandArgs.length > 0) {
    errors.push(`Command "${config.command}" takes no arguments`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

export const USAGE = [
  'Usage: v24-dialog --host=<ip> [--port=<port>] [--config=<file>] [--verbose] <command> [arg]',
  '',
  'Commands:',
  '  dialog               check whether the printer is ready to dialog',
  '  start                start the jet',
  '  stop-short           short shutdown',
  '  stop-long            long shutdown with auto-clean',
  '  status <jet>         jet status',
  '  counter <jet>        jet print counter',
  '  reset-counter <jet>  reset the jet print counter',
  '  speed <jet>          jet speed in m/s',
  '  faults               printer and jet faults',
  '  reset-faults         clear printer faults',
  '  parameters           printer parameters',
  '  jets                 number of jets present',
  '  date                 date and time stored on the printer',
  '  set-date [iso]       set the printer clock (default: now)'
].join('\n');
