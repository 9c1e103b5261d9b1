/**
 * @fileoverview Frame grammar presets and grammar construction.
 *
 * The codec never hard-codes byte values; it is handed one of these grammars. The default
 * layout matches traffic captured from 9040-family printers:
 *
 *   opcode (1) | length (2, big endian) | payload | XOR of all preceding bytes
 *
 * with ENQ 0x05 as the readiness query and ACK 0x06 / NAK 0x15 as replies. No capture is
 * available for the other families, so they start from the same layout; pass overrides
 * through `resolveGrammar` once a capture shows a difference.
 *
 * @module protocol/grammars
 */

import type { FrameGrammar, PrinterFamily } from '../types/protocol';
import { FrameGrammarSchema, GrammarOverridesSchema } from '../schemas/config.schemas';
import { ErrorCode } from '../utils/error.utils';
import { validateOrThrow } from '../utils/validation.utils';

export const V24_DEFAULT_GRAMMAR: FrameGrammar = Object.freeze({
  opcodeWidth: 1,
  lengthWidth: 2,
  byteOrder: 'big',
  checksum: 'xor',
  control: Object.freeze({ enq: 0x05, ack: 0x06, nak: 0x15 }),
  maxPayloadLength: 1024
});

export const PRINTER_FAMILY_GRAMMARS: Readonly<Record<PrinterFamily, FrameGrammar>> = Object.freeze({
  '9040': V24_DEFAULT_GRAMMAR,
  '9042': V24_DEFAULT_GRAMMAR,
  'ip65': V24_DEFAULT_GRAMMAR,
  'contrast': V24_DEFAULT_GRAMMAR
});

/**
 * Validate a complete grammar, throwing CONFIG_INVALID on mismatch
 */
export function validateGrammar(grammar: unknown): FrameGrammar {
  return validateOrThrow(FrameGrammarSchema, grammar, ErrorCode.CONFIG_INVALID);
}

/**
 * Build the grammar for a printer family with optional field overrides
 *
 * @param family - Preset to start from
 * @param overrides - Individual fields replacing the preset's values
 * @returns Validated grammar
 */
export function resolveGrammar(family: PrinterFamily = '9040', overrides?: unknown): FrameGrammar {
  const base = PRINTER_FAMILY_GRAMMARS[family];
  if (overrides === undefined) {
    return base;
  }

  const parsed = validateOrThrow(GrammarOverridesSchema, overrides, ErrorCode.CONFIG_INVALID);
  return validateGrammar({ ...base, ...parsed });
}
