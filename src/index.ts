/**
 * @fileoverview Public API of the V24 dialog client
 *
 * Caller API:
 *   const printer = await V24PrinterClient.connect('192.168.1.1', 2101);
 *   if (await printer.getV24Dialog()) {
 *     await printer.startStopPrinter(SHUTDOWN_MODE.START_UP);
 *   }
 *   printer.close();
 *
 * Lower layers (PrinterSession, FrameCodec, the command table and grammars) are exported
 * for callers that bring their own transport or frame layout.
 */

export { V24PrinterClient } from './services/V24PrinterClient';
export type { ClientOptions } from './services/V24PrinterClient';
export { PrinterSession } from './services/PrinterSession';
export type { SessionOptions } from './services/PrinterSession';
export { TcpByteStream, connectTcp } from './services/TcpTransport';

export { FrameCodec } from './protocol/FrameCodec';
export {
  V24_COMMANDS,
  COMMAND_NAMES,
  getCommand,
  findCommandByOpcode,
  isCommandName
} from './protocol/CommandTable';
export type { CommandName } from './protocol/CommandTable';
export {
  V24_DEFAULT_GRAMMAR,
  PRINTER_FAMILY_GRAMMARS,
  resolveGrammar,
  validateGrammar
} from './protocol/grammars';

export { DEFAULT_CONFIG, DEFAULT_PORT, sanitizeConfig } from './types/config';
export type { ClientConfig, GrammarOverrides } from './types/config';
export { SHUTDOWN_MODE } from './types/commands';
export type {
  CommandDefinition,
  CommandDescriptor,
  CommandRequest,
  ExternalVariablesArgument,
  FailureReason,
  JetFaults,
  JetId,
  JetStatus,
  PrinterFaults,
  PrinterLevelFaults,
  PrinterParameters,
  QueryResult,
  ShutdownMode
} from './types/commands';
export type * from './types/protocol';
export type * from './types/transport';

export {
  ErrorCode,
  V24Error,
  isV24Error,
  hasErrorCode,
  toV24Error
} from './utils/error.utils';
export { setVerboseLogging } from './utils/logging';
