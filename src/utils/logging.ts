/**
 * @fileoverview Logging utilities for verbose debug output
 *
 * Provides centralized logging with namespace support for debugging
 */

let verboseEnabled = false;

/**
 * Enable or disable verbose output regardless of the DEBUG environment variable
 */
export function setVerboseLogging(enabled: boolean): void {
  verboseEnabled = enabled;
}

/**
 * Whether verbose messages are currently written
 */
export function isVerboseLogging(): boolean {
  return verboseEnabled || Boolean(process.env.DEBUG);
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (isVerboseLogging()) {
    console.debug(`[${namespace}]`, message, ...args);
  }
}

/**
 * Log info message with namespace
 */
export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  console.info(`[${namespace}]`, message, ...args);
}

/**
 * Log warning message with namespace
 */
export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}]`, message, ...args);
}

/**
 * Log error message with namespace
 */
export function logError(namespace: string, message: string, ...args: unknown[]): void {
  console.error(`[${namespace}]`, message, ...args);
}
