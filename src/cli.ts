#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point for the V24 dialog client
 *
 * Connects to one printer, runs one command, prints the result as JSON and exits with
 * status 0 on success, 1 on failure. The session is closed on every exit path.
 */

import * as fs from 'fs';
import { ZodError } from 'zod';
import type { ClientConfig } from './types/config';
import { sanitizeConfig } from './types/config';
import { SHUTDOWN_MODE } from './types/commands';
import { V24PrinterClient } from './services/V24PrinterClient';
import {
  CliConfig,
  USAGE,
  parseCliArguments,
  validateCliConfig
} from './utils/CliArguments';
import { ErrorCode, V24Error, createErrorResult, toV24Error } from './utils/error.utils';
import { formatValidationErrors } from './utils/validation.utils';
import { logError, logInfo, setVerboseLogging } from './utils/logging';

const NAMESPACE = 'CLI';

/**
 * Read and validate the JSON file given with --config
 */
function loadConfigFile(configPath: string): ClientConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new V24Error(
      `Failed to read config file ${configPath}`,
      ErrorCode.CONFIG_INVALID,
      { configPath },
      error instanceof Error ? error : undefined
    );
  }
  return sanitizeConfig(raw);
}

function jetArgument(cli: CliConfig): number {
  return parseInt(cli.commandArgs[0], 10);
}

/**
 * Run the parsed command and return the value to print
 */
async function runCommand(client: V24PrinterClient, cli: CliConfig): Promise<unknown> {
  switch (cli.command) {
    case 'dialog':
      return { ready: await client.getV24Dialog() };
    case 'start':
      return { acknowledged: await client.startStopPrinter(SHUTDOWN_MODE.START_UP) };
    case 'stop-short':
      return { acknowledged: await client.startStopPrinter(SHUTDOWN_MODE.SHORT_SHUTDOWN) };
    case 'stop-long':
      return { acknowledged: await client.startStopPrinter(SHUTDOWN_MODE.LONG_SHUTDOWN) };
    case 'status':
      return client.getJetStatus(jetArgument(cli));
    case 'counter':
      return client.getJetCounter(jetArgument(cli));
    case 'reset-counter':
      return { acknowledged: await client.resetJetCounter(jetArgument(cli)) };
    case 'speed':
      return client.getJetSpeed(jetArgument(cli));
    case 'faults':
      return client.getPrinterFaults();
    case 'reset-faults':
      return { acknowledged: await client.resetPrinterFaults() };
    case 'parameters':
      return client.getParameters();
    case 'jets':
      return client.getAvailableJetCount();
    case 'date':
      return client.getAutodatingTable();
    case 'set-date': {
      const date = cli.commandArgs[0] ? new Date(cli.commandArgs[0]) : new Date();
      return { acknowledged: await client.setAutodatingTable(date) };
    }
    case undefined:
      throw new V24Error('No command given', ErrorCode.VALIDATION);
  }
}

/**
 * Whether a printed result counts as success for the exit code
 */
function isSuccessful(result: unknown): boolean {
  if (typeof result !== 'object' || result === null) {
    return false;
  }
  if ('success' in result) {
    return result.success === true;
  }
  if ('acknowledged' in result) {
    return result.acknowledged === true;
  }
  return 'ready' in result && result.ready === true;
}

export async function main(argv: string[]): Promise<number> {
  const cli = parseCliArguments(argv);
  setVerboseLogging(cli.verbose);

  const validation = validateCliConfig(cli);
  if (!validation.valid || !cli.host) {
    validation.errors.forEach(error => logError(NAMESPACE, error));
    console.error(USAGE);
    return 1;
  }

  let client: V24PrinterClient | null = null;
  try {
    const fileConfig = cli.configPath ? loadConfigFile(cli.configPath) : sanitizeConfig({});
    const port = cli.port ?? fileConfig.port;

    logInfo(NAMESPACE, `Connecting to ${cli.host}:${port}`);
    client = await V24PrinterClient.connect(cli.host, port, fileConfig);

    const result = await runCommand(client, cli);
    console.log(JSON.stringify(result, null, 2));
    return isSuccessful(result) ? 0 : 1;
  } catch (error) {
    const v24Error = toV24Error(error);
    if (v24Error.originalError instanceof ZodError) {
      logError(NAMESPACE, formatValidationErrors(v24Error.originalError));
    } else {
      logError(NAMESPACE, v24Error.message, v24Error.context ?? '');
    }
    console.log(JSON.stringify(createErrorResult(v24Error), null, 2));
    return 1;
  } finally {
    client?.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logError(NAMESPACE, 'Unexpected failure', error);
      process.exitCode = 1;
    });
}
