/**
 * @fileoverview Client configuration type definitions
 *
 * Key Features:
 * - ClientConfig interface with readonly properties for immutability
 * - DEFAULT_CONFIG with the values used when a field is not supplied
 * - sanitizeConfig() merging validated input over the defaults
 *
 * The library itself reads no files or environment variables; the CLI loads an optional
 * JSON file and passes its contents through sanitizeConfig.
 *
 * @module types/config
 */

import { ClientConfigSchema } from '../schemas/config.schemas';
import { ErrorCode } from '../utils/error.utils';
import { validateOrThrow } from '../utils/validation.utils';
import type { PrinterFamily } from './protocol';

/**
 * Individual grammar fields a config may override
 */
export interface GrammarOverrides {
  readonly opcodeWidth?: 1 | 2;
  readonly lengthWidth?: 1 | 2;
  readonly byteOrder?: 'big' | 'little';
  readonly checksum?: 'xor' | 'sum8' | 'none';
  readonly terminator?: number;
  readonly control?: { readonly enq: number; readonly ack: number; readonly nak: number };
  readonly maxPayloadLength?: number;
}

export interface ClientConfig {
  readonly port: number;
  readonly connectTimeoutMs: number;
  readonly responseTimeoutMs: number;
  readonly printerFamily: PrinterFamily;
  readonly grammar?: GrammarOverrides;
}

/**
 * Defaults come from the schema: port 2101, 5s connect, 3s reply, 9040 grammar
 */
export const DEFAULT_CONFIG: ClientConfig = Object.freeze(sanitizeConfig({}));

export const DEFAULT_PORT = DEFAULT_CONFIG.port;

/**
 * Validate a partial configuration and fill in defaults
 *
 * @throws V24Error CONFIG_INVALID listing every offending field
 */
export function sanitizeConfig(input: unknown = {}): ClientConfig {
  return validateOrThrow(ClientConfigSchema, input ?? {}, ErrorCode.CONFIG_INVALID);
}
