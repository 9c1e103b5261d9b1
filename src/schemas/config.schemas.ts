/**
 * @fileoverview Zod validation schemas for frame grammars and client configuration.
 *
 * Grammars and configuration come from callers and from JSON files loaded by the CLI, so
 * both are validated at runtime before they reach the codec or the session.
 *
 * Key exports:
 * - ByteSchema, PortSchema, HostSchema: primitive validators
 * - FrameGrammarSchema: full grammar with cross-field checks
 * - GrammarOverridesSchema: partial grammar merged over a family preset
 * - ClientConfigSchema: client configuration with defaults applied
 */

import { z } from 'zod';

// ============================================================================
// PRIMITIVES
// ============================================================================

export const ByteSchema = z.number().int().min(0).max(0xff);

export const PortSchema = z.number().int().min(1).max(65535);

export const HostSchema = z.string().trim().min(1, 'Host is required');

export const TimeoutSchema = z.number().int().positive().max(600_000);

export const EndpointSchema = z.object({
  host: HostSchema,
  port: PortSchema
});

export const PrinterFamilySchema = z.enum(['9040', '9042', 'ip65', 'contrast']);

// ============================================================================
// FRAME GRAMMAR
// ============================================================================

export const ControlBytesSchema = z.object({
  enq: ByteSchema,
  ack: ByteSchema,
  nak: ByteSchema
}).refine(
  control => new Set([control.enq, control.ack, control.nak]).size === 3,
  'Control bytes must be distinct'
);

const FrameGrammarShape = z.object({
  opcodeWidth: z.union([z.literal(1), z.literal(2)]),
  lengthWidth: z.union([z.literal(1), z.literal(2)]),
  byteOrder: z.enum(['big', 'little']),
  checksum: z.enum(['xor', 'sum8', 'none']),
  terminator: ByteSchema.optional(),
  control: ControlBytesSchema,
  maxPayloadLength: z.number().int().positive()
});

export const FrameGrammarSchema = FrameGrammarShape.refine(
  grammar => grammar.maxPayloadLength < 2 ** (8 * grammar.lengthWidth),
  { message: 'maxPayloadLength does not fit in lengthWidth bytes', path: ['maxPayloadLength'] }
);

export const GrammarOverridesSchema = FrameGrammarShape.partial();

// ============================================================================
// CLIENT CONFIGURATION
// ============================================================================

export const ClientConfigSchema = z.object({
  port: PortSchema.default(2101),
  connectTimeoutMs: TimeoutSchema.default(5000),
  responseTimeoutMs: TimeoutSchema.default(3000),
  printerFamily: PrinterFamilySchema.default('9040'),
  grammar: GrammarOverridesSchema.optional()
});
