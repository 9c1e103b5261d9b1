/**
 * @fileoverview Command table types and the domain values decoded from printer replies.
 *
 * A command is a (request, argument domain, response shape, interpreter) entry. The codec
 * and the session only see the generic CommandDefinition; the concrete table lives in
 * protocol/CommandTable.
 *
 * @module types/commands
 */

import type { z } from 'zod';
import type { Response, ResponseShape } from './protocol';

// ============================================================================
// COMMAND DEFINITIONS
// ============================================================================

/**
 * How the request is put on the wire
 */
export type CommandRequest =
  | { readonly kind: 'control'; readonly control: 'enq' }
  | { readonly kind: 'data'; readonly opcode: number };

/**
 * Why a command did not produce a domain value
 */
export type FailureReason = 'rejected' | 'unreadable';

/**
 * Domain-level outcome of one command
 */
export type QueryResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly reason: FailureReason; readonly detail?: string };

/**
 * Type-erased view of a table entry, for lookups by name or opcode
 */
export interface CommandDescriptor {
  readonly name: string;
  readonly request: CommandRequest;
  readonly response: ResponseShape;
  /** Inverse of encodePayload, used to read requests back (stub printers, traces) */
  readonly decodePayload: (payload: Uint8Array) => unknown;
}

/**
 * One entry of the closed command table
 */
export interface CommandDefinition<TArg, TResult> extends CommandDescriptor {
  /** Allowed arguments; anything else is rejected before encoding */
  readonly argument: z.ZodType<TArg, z.ZodTypeDef, unknown>;
  readonly encodePayload: (argument: TArg) => Uint8Array;
  readonly decodePayload: (payload: Uint8Array) => TArg | null;
  readonly interpret: (response: Response) => QueryResult<TResult>;
}

// ============================================================================
// ARGUMENT DOMAINS
// ============================================================================

/**
 * 0 = long shutdown with auto-clean, 1 = short shutdown, 255 = start-up
 */
export type ShutdownMode = 0 | 1 | 255;

export const SHUTDOWN_MODE = {
  LONG_SHUTDOWN: 0,
  SHORT_SHUTDOWN: 1,
  START_UP: 255
} as const satisfies Record<string, ShutdownMode>;

/**
 * Print head number, 1..4
 */
export type JetId = 1 | 2 | 3 | 4;

export interface ExternalVariablesArgument {
  readonly jetId: JetId;
  readonly variables: readonly string[];
}

// ============================================================================
// DOMAIN VALUES
// ============================================================================

export type JetStatus =
  | 'stopped'
  | 'starting'
  | 'refresh'
  | 'stability-check'
  | 'solvent-feed'
  | 'nozzle-unclog'
  | 'adjustment'
  | 'running';

export interface PrinterParameters {
  readonly motorSpeed: number;
  readonly pressure: number;
  readonly viscoFillingTimes: number;
  readonly additiveAdded: number;
  readonly averageJetSpeed: number;
  readonly electronicsTemperature: number;
  readonly inkCircuitTemperature: number;
}

export interface PrinterLevelFaults {
  readonly inkLevelLow: boolean;
  readonly pressureError: boolean;
  readonly cpuHardwareError: boolean;
  readonly memoryLost: boolean;
  readonly head1Faulty: boolean;
  readonly head2Faulty: boolean;
  readonly motorCycleFault: boolean;
  readonly pigmentedInkCircuitFault: boolean;
  readonly autodatingFault: boolean;
  readonly ramFault: boolean;
  readonly romFault: boolean;
  readonly v24Fault: boolean;
  readonly recoveryTankTooFull: boolean;
  readonly inkTankTooFull: boolean;
  readonly accuEmpty: boolean;
  readonly temperatureFault: boolean;
  readonly viscosityFault: boolean;
  readonly fanFault: boolean;
  readonly additiveFault: boolean;
}

export interface JetFaults {
  readonly jetId: JetId;
  readonly printingHardwareFault: boolean;
  readonly frameGeneratorFault: boolean;
  readonly charGeneratorFault: boolean;
  readonly coverFault: boolean;
  readonly ehvFault: boolean;
  readonly recovery: boolean;
  readonly phaseDetection: boolean;
  readonly notPresent: boolean;
  readonly cpuPrinterCommunication: boolean;
  readonly printingSpeedFault: boolean;
  readonly dtopFiltering: boolean;
  readonly noMessageToPrint: boolean;
  readonly incorrectCharGenerator: boolean;
  readonly dtopPrinting: boolean;
}

export interface PrinterFaults {
  readonly printer: PrinterLevelFaults;
  readonly jets: readonly JetFaults[];
}
