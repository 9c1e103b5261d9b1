/**
 * @fileoverview Closed table of V24 dialog commands.
 *
 * Each entry pairs a request (control byte or opcode), the zod schema of its argument,
 * the payload encoder and its inverse, the reply shape, and the interpreter turning the
 * reply into a domain value. Adding a printer operation means adding an entry here; the
 * codec and the session stay untouched.
 *
 * Reply payloads of the query commands:
 * - 0xD6 autodating: ASCII text whose digits read ss mm hh DD MM YY
 * - 0x39 jet counter: nine ASCII digits
 * - 0x32 jet status: one status byte 0..7
 * - 0x33 jet speed: one BCD byte, tenths of m/s
 * - 0x20 parameters: 26 ASCII characters, comma as decimal separator
 * - 0x3B faults: 15 bitfield bytes (3 printer-level, then 3 per jet)
 */

import { z } from 'zod';
import type {
  CommandDefinition,
  CommandDescriptor,
  ExternalVariablesArgument,
  JetFaults,
  JetId,
  JetStatus,
  PrinterFaults,
  PrinterLevelFaults,
  PrinterParameters,
  QueryResult,
  ShutdownMode
} from '../types/commands';
import type { DataFrame, Response } from '../types/protocol';
import { invalidArgumentError } from '../utils/error.utils';
import {
  asciiToBytes,
  bytesToAscii,
  concatBytes,
  fromBcd,
  isPrintableAscii,
  toBcd
} from '../utils/bytes.utils';

// ============================================================================
// ARGUMENT SCHEMAS
// ============================================================================

const NoArgumentSchema = z.undefined();

export const ShutdownModeSchema = z.union(
  [z.literal(0), z.literal(1), z.literal(255)],
  { errorMap: () => ({ message: 'Shutdown mode must be 0, 1 or 255' }) }
);

export const JetIdSchema = z.union(
  [z.literal(1), z.literal(2), z.literal(3), z.literal(4)],
  { errorMap: () => ({ message: 'Jet id must be 1, 2, 3 or 4' }) }
);

/** 0x12 delimits variables on the wire; the printable ASCII check keeps it out of a variable */
const VARIABLE_DELIMITER = 0x12;

export const ExternalVariablesSchema = z.object({
  jetId: JetIdSchema,
  variables: z.array(
    z.string().refine(isPrintableAscii, 'Variables must be printable ASCII')
  ).min(1, 'At least one variable is required').max(10, 'At most 10 variables can be set')
});

export const AutodatingSchema = z.date().refine(
  date => !Number.isNaN(date.getTime()) && date.getFullYear() >= 2000 && date.getFullYear() <= 2099,
  'Date must be a valid date between 2000 and 2099'
);

// ============================================================================
// INTERPRETERS
// ============================================================================

const JET_STATUSES: readonly JetStatus[] = [
  'stopped',
  'starting',
  'refresh',
  'stability-check',
  'solvent-feed',
  'nozzle-unclog',
  'adjustment',
  'running'
];

function rejected<T>(): QueryResult<T> {
  return { success: false, reason: 'rejected' };
}

function unreadable<T>(detail: string): QueryResult<T> {
  return { success: false, reason: 'unreadable', detail };
}

/**
 * ACK means accepted, NAK means rejected
 */
function interpretAcknowledgement(response: Response): QueryResult<boolean> {
  return response.kind === 'ack' ? { success: true, data: true } : rejected();
}

/**
 * Run `read` over the payload of an ACK reply whose frame echoes `opcode`
 */
function interpretPayload<T>(
  opcode: number,
  read: (payload: Uint8Array) => QueryResult<T>
): (response: Response) => QueryResult<T> {
  return (response: Response): QueryResult<T> => {
    if (response.kind === 'nak') {
      return rejected();
    }
    const frame: DataFrame | undefined = response.frame;
    if (!frame) {
      return unreadable('reply carried no data frame');
    }
    if (frame.opcode !== opcode) {
      return unreadable(`reply opcode 0x${frame.opcode.toString(16)} does not match request`);
    }
    return read(frame.payload);
  };
}

function readDigits(text: string): string {
  return text.replace(/[^0-9]/g, '');
}

/**
 * Two-digit years pivot at 69: 69..99 read as 1969..1999, 00..68 as 2000..2068
 */
export function parseAutodating(payload: Uint8Array): QueryResult<Date> {
  const digits = readDigits(bytesToAscii(payload.subarray(0, 22)));
  if (digits.length < 12) {
    return unreadable(`expected 12 date digits, got ${digits.length}`);
  }
  const [second, minute, hour, day, month, year] = [0, 2, 4, 6, 8, 10].map(i =>
    parseInt(digits.slice(i, i + 2), 10)
  );
  const date = new Date(year < 69 ? 2000 + year : 1900 + year, month - 1, day, hour, minute, second);
  if (
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return unreadable(`invalid date digits ${digits.slice(0, 12)}`);
  }
  return { success: true, data: date };
}

export function parseJetCounter(payload: Uint8Array): QueryResult<number> {
  const text = bytesToAscii(payload.subarray(0, 9)).trim();
  if (!/^\d+$/.test(text)) {
    return unreadable(`counter "${text}" is not numeric`);
  }
  return { success: true, data: parseInt(text, 10) };
}

export function parseJetStatus(payload: Uint8Array): QueryResult<JetStatus> {
  if (payload.length < 1) {
    return unreadable('empty status payload');
  }
  const status = JET_STATUSES[payload[0]];
  return status === undefined ? unreadable(`unknown jet status ${payload[0]}`) : { success: true, data: status };
}

export function parseJetSpeed(payload: Uint8Array): QueryResult<number> {
  if (payload.length < 1) {
    return unreadable('empty speed payload');
  }
  const tenths = fromBcd(payload[0]);
  return tenths === null ? unreadable(`speed byte ${payload[0]} is not BCD`) : { success: true, data: tenths / 10 };
}

function parseDecimal(text: string): number {
  return /^\s*-?\d+([.,]\d+)?\s*$/.test(text) ? parseFloat(text.replace(',', '.')) : NaN;
}

export function parseParameters(payload: Uint8Array): QueryResult<PrinterParameters> {
  const data = bytesToAscii(payload.subarray(0, 26));
  if (data.length < 26) {
    return unreadable(`expected 26 parameter characters, got ${data.length}`);
  }
  const parameters: PrinterParameters = {
    motorSpeed: parseDecimal(data.slice(0, 4)),
    pressure: parseDecimal(data.slice(5, 9)),
    viscoFillingTimes: parseDecimal(data.slice(10, 12)),
    additiveAdded: parseDecimal(data.slice(13, 15)),
    averageJetSpeed: parseDecimal(data.slice(16, 20)),
    electronicsTemperature: parseDecimal(data.slice(21, 23)),
    inkCircuitTemperature: parseDecimal(data.slice(24, 26))
  };
  const invalid = Object.entries(parameters).find(([, value]) => Number.isNaN(value));
  return invalid ? unreadable(`parameter ${invalid[0]} is not numeric`) : { success: true, data: parameters };
}

function bit(byte: number, index: number): boolean {
  return ((byte >> index) & 1) === 1;
}

const JET_IDS: readonly JetId[] = [1, 2, 3, 4];

export function parsePrinterFaults(payload: Uint8Array): QueryResult<PrinterFaults> {
  if (payload.length < 15) {
    return unreadable(`expected 15 fault bytes, got ${payload.length}`);
  }
  const [b0, b1, b2] = payload;
  const printer: PrinterLevelFaults = {
    inkLevelLow: bit(b0, 0),
    pressureError: bit(b0, 1),
    cpuHardwareError: bit(b0, 2),
    memoryLost: bit(b0, 3),
    head1Faulty: bit(b0, 4),
    head2Faulty: bit(b0, 5),
    motorCycleFault: bit(b0, 6),
    pigmentedInkCircuitFault: bit(b0, 7),
    autodatingFault: bit(b1, 5),
    ramFault: bit(b1, 6),
    romFault: bit(b1, 7),
    v24Fault: bit(b2, 0),
    recoveryTankTooFull: bit(b2, 1),
    inkTankTooFull: bit(b2, 2),
    accuEmpty: bit(b2, 3),
    temperatureFault: bit(b2, 4),
    viscosityFault: bit(b2, 5),
    fanFault: bit(b2, 6),
    additiveFault: bit(b2, 7)
  };

  const jets = JET_IDS.map((jetId, index): JetFaults => {
    const base = 3 + index * 3;
    const [j0, j1, j2] = [payload[base], payload[base + 1], payload[base + 2]];
    return {
      jetId,
      printingHardwareFault: bit(j0, 0),
      frameGeneratorFault: bit(j0, 5),
      charGeneratorFault: bit(j0, 6),
      coverFault: bit(j1, 4),
      ehvFault: bit(j1, 5),
      recovery: bit(j1, 6),
      phaseDetection: bit(j1, 7),
      notPresent: bit(j2, 0),
      cpuPrinterCommunication: bit(j2, 1),
      printingSpeedFault: bit(j2, 2),
      dtopFiltering: bit(j2, 3),
      noMessageToPrint: bit(j2, 4),
      incorrectCharGenerator: bit(j2, 5),
      dtopPrinting: bit(j2, 6)
    };
  });

  return { success: true, data: { printer, jets } };
}

// ============================================================================
// PAYLOAD CODECS
// ============================================================================

function emptyPayload(): Uint8Array {
  return new Uint8Array(0);
}

function decodeEmpty(payload: Uint8Array): undefined | null {
  return payload.length === 0 ? undefined : null;
}

function decodeSingleByte<T extends number>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (payload: Uint8Array): T | null => {
    if (payload.length !== 1) {
      return null;
    }
    const parsed = schema.safeParse(payload[0]);
    return parsed.success ? parsed.data : null;
  };
}

function encodeExternalVariables(argument: ExternalVariablesArgument): Uint8Array {
  const parts = argument.variables.map(variable => {
    return concatBytes(Uint8Array.of(VARIABLE_DELIMITER), asciiToBytes(variable), Uint8Array.of(VARIABLE_DELIMITER));
  });
  return concatBytes(Uint8Array.of(argument.jetId), ...parts);
}

function decodeExternalVariables(payload: Uint8Array): ExternalVariablesArgument | null {
  const jetId = JetIdSchema.safeParse(payload[0]);
  if (!jetId.success) {
    return null;
  }
  const variables: string[] = [];
  let offset = 1;
  while (offset < payload.length) {
    if (payload[offset] !== VARIABLE_DELIMITER) {
      return null;
    }
    const end = payload.indexOf(VARIABLE_DELIMITER, offset + 1);
    if (end < 0) {
      return null;
    }
    variables.push(bytesToAscii(payload.subarray(offset + 1, end)));
    offset = end + 1;
  }
  return variables.length > 0 ? { jetId: jetId.data, variables } : null;
}

function encodeAutodating(date: Date): Uint8Array {
  return Uint8Array.of(
    toBcd(date.getSeconds()),
    toBcd(date.getMinutes()),
    toBcd(date.getHours()),
    toBcd(date.getDate()),
    toBcd(date.getMonth() + 1),
    toBcd(date.getFullYear() % 100),
    0x20
  );
}

function decodeAutodating(payload: Uint8Array): Date | null {
  if (payload.length !== 7 || payload[6] !== 0x20) {
    return null;
  }
  const fields = Array.from(payload.subarray(0, 6), fromBcd);
  if (fields.some(field => field === null)) {
    return null;
  }
  const [second, minute, hour, day, month, year] = fields.map(field => field ?? 0);
  return new Date(2000 + year, month - 1, day, hour, minute, second);
}

// ============================================================================
// THE TABLE
// ============================================================================

/**
 * Identity helper that lets TypeScript infer argument and result types per entry
 */
function defineCommand<TArg, TResult>(definition: CommandDefinition<TArg, TResult>): CommandDefinition<TArg, TResult> {
  return Object.freeze(definition);
}

function jetCommand<TResult>(
  name: string,
  opcode: number,
  response: CommandDefinition<JetId, TResult>['response'],
  interpret: (response: Response) => QueryResult<TResult>
): CommandDefinition<JetId, TResult> {
  return defineCommand({
    name,
    request: { kind: 'data', opcode },
    argument: JetIdSchema,
    encodePayload: jetId => Uint8Array.of(jetId),
    decodePayload: decodeSingleByte(JetIdSchema),
    response,
    interpret
  });
}

function queryCommand<TResult>(
  name: string,
  opcode: number,
  read: (payload: Uint8Array) => QueryResult<TResult>
): CommandDefinition<undefined, TResult> {
  return defineCommand({
    name,
    request: { kind: 'data', opcode },
    argument: NoArgumentSchema,
    encodePayload: emptyPayload,
    decodePayload: decodeEmpty,
    response: 'ack-frame',
    interpret: interpretPayload(opcode, read)
  });
}

export const V24_COMMANDS = Object.freeze({
  dialogCheck: defineCommand<undefined, boolean>({
    name: 'dialogCheck',
    request: { kind: 'control', control: 'enq' },
    argument: NoArgumentSchema,
    encodePayload: emptyPayload,
    decodePayload: decodeEmpty,
    response: 'ack',
    interpret: interpretAcknowledgement
  }),

  startStop: defineCommand<ShutdownMode, boolean>({
    name: 'startStop',
    request: { kind: 'data', opcode: 0x30 },
    argument: ShutdownModeSchema,
    encodePayload: mode => Uint8Array.of(mode),
    decodePayload: decodeSingleByte(ShutdownModeSchema),
    response: 'ack',
    interpret: interpretAcknowledgement
  }),

  getAutodatingTable: queryCommand('getAutodatingTable', 0xd6, parseAutodating),

  setAutodatingTable: defineCommand<Date, boolean>({
    name: 'setAutodatingTable',
    request: { kind: 'data', opcode: 0xc8 },
    argument: AutodatingSchema,
    encodePayload: encodeAutodating,
    decodePayload: decodeAutodating,
    response: 'ack',
    interpret: interpretAcknowledgement
  }),

  setExternalVariables: defineCommand<ExternalVariablesArgument, boolean>({
    name: 'setExternalVariables',
    request: { kind: 'data', opcode: 0x5b },
    argument: ExternalVariablesSchema,
    encodePayload: encodeExternalVariables,
    decodePayload: decodeExternalVariables,
    response: 'ack',
    interpret: interpretAcknowledgement
  }),

  getJetCounter: jetCommand('getJetCounter', 0x39, 'ack-frame', interpretPayload(0x39, parseJetCounter)),
  resetJetCounter: jetCommand('resetJetCounter', 0x3a, 'ack', interpretAcknowledgement),
  getJetStatus: jetCommand('getJetStatus', 0x32, 'ack-frame', interpretPayload(0x32, parseJetStatus)),
  getJetSpeed: jetCommand('getJetSpeed', 0x33, 'ack-frame', interpretPayload(0x33, parseJetSpeed)),

  getParameters: queryCommand('getParameters', 0x20, parseParameters),
  getPrinterFaults: queryCommand('getPrinterFaults', 0x3b, parsePrinterFaults),

  resetPrinterFaults: defineCommand<undefined, boolean>({
    name: 'resetPrinterFaults',
    request: { kind: 'data', opcode: 0x3c },
    argument: NoArgumentSchema,
    encodePayload: emptyPayload,
    decodePayload: decodeEmpty,
    response: 'ack',
    interpret: interpretAcknowledgement
  })
});

export type CommandName = keyof typeof V24_COMMANDS;

export function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(V24_COMMANDS, name);
}

export const COMMAND_NAMES: readonly CommandName[] = Object.keys(V24_COMMANDS).filter(isCommandName);

/**
 * Look up a command by name, rejecting anything outside the table
 *
 * @throws V24Error INVALID_ARGUMENT for unknown names
 */
export function getCommand(name: string): CommandDescriptor {
  if (!isCommandName(name)) {
    throw invalidArgumentError(`Unknown command "${name}"`, { command: name });
  }
  return V24_COMMANDS[name];
}

/**
 * Find the table entry whose request uses `opcode`
 */
export function findCommandByOpcode(opcode: number): CommandDescriptor | undefined {
  return Object.values<CommandDescriptor>(V24_COMMANDS).find(
    command => command.request.kind === 'data' && command.request.opcode === opcode
  );
}
