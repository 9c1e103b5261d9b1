/**
 * @fileoverview Command facade presenting each printer operation as one named call.
 *
 * Every operation is dispatched through `execute()`: encode via the session's codec
 * (arguments outside a command's domain fail with INVALID_ARGUMENT before any byte is
 * written), serialized exchange on the session, then the table entry's interpreter.
 *
 * Result conventions:
 * - Acknowledgement commands resolve to `true` on ACK and `false` on NAK or an
 *   unreadable reply
 * - Query commands resolve to a QueryResult; a NAK or unreadable payload is a failed
 *   result, not an exception
 * - Transport and protocol failures reject with a V24Error
 *
 * Retries are left to the caller. After a fatal error the session is closed and
 * `reconnect()` opens a fresh one to the same endpoint.
 *
 * Key exports:
 * - V24PrinterClient class
 * - ClientOptions interface
 */

import type { ClientConfig } from '../types/config';
import { DEFAULT_CONFIG, DEFAULT_PORT, sanitizeConfig } from '../types/config';
import type { TransportConnector } from '../types/transport';
import type { SessionState } from '../types/protocol';
import type {
  CommandDefinition,
  JetStatus,
  PrinterFaults,
  PrinterParameters,
  QueryResult
} from '../types/commands';
import { V24_COMMANDS } from '../protocol/CommandTable';
import { FrameCodec } from '../protocol/FrameCodec';
import { resolveGrammar } from '../protocol/grammars';
import { PrinterSession } from './PrinterSession';
import { malformedFrameError, sessionClosedError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';

const NAMESPACE = 'V24PrinterClient';

export interface ClientOptions extends Partial<Omit<ClientConfig, 'port'>> {
  readonly connector?: TransportConnector;
}

export class V24PrinterClient {
  private session: PrinterSession;
  private readonly config: ClientConfig;
  private readonly connector?: TransportConnector;
  private reconnecting: Promise<void> | null = null;
  private closeCount = 0;

  constructor(session: PrinterSession, config: ClientConfig = DEFAULT_CONFIG, connector?: TransportConnector) {
    this.session = session;
    this.config = config;
    this.connector = connector;
  }

  /**
   * Connect to a printer and return a client bound to that session
   *
   * @param host - Printer IP address or host name
   * @param port - V24 dialog port
   * @param options - Timeouts, printer family, grammar overrides, transport
   */
  public static async connect(
    host: string,
    port: number = DEFAULT_PORT,
    options: ClientOptions = {}
  ): Promise<V24PrinterClient> {
    const { connector, ...settings } = options;
    const config = sanitizeConfig({ ...settings, port });
    const session = await V24PrinterClient.openSession(host, config, connector);
    return new V24PrinterClient(session, config, connector);
  }

  private static openSession(
    host: string,
    config: ClientConfig,
    connector?: TransportConnector
  ): Promise<PrinterSession> {
    return PrinterSession.connect(
      { host, port: config.port },
      {
        connectTimeoutMs: config.connectTimeoutMs,
        connector,
        codec: new FrameCodec(resolveGrammar(config.printerFamily, config.grammar))
      }
    );
  }

  public getSession(): PrinterSession {
    return this.session;
  }

  public getState(): SessionState {
    return this.session.getState();
  }

  /**
   * Replace a closed (or open) session with a fresh one to the same endpoint.
   * Overlapping calls share one attempt; a `close()` issued while it is in
   * flight discards the new session and rejects with SESSION_CLOSED.
   */
  public reconnect(): Promise<void> {
    if (this.reconnecting === null) {
      this.reconnecting = this.replaceSession().finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  private async replaceSession(): Promise<void> {
    const closeCount = this.closeCount;
    this.session.close();

    const session = await V24PrinterClient.openSession(this.session.endpoint.host, this.config, this.connector);
    if (this.closeCount !== closeCount) {
      session.close();
      throw sessionClosedError('reconnect');
    }
    this.session = session;
  }

  /**
   * Release the session. Idempotent.
   */
  public close(): void {
    this.closeCount += 1;
    this.session.close();
  }

  /**
   * Run one table command and interpret the reply
   */
  public async execute<TArg, TResult>(
    command: CommandDefinition<TArg, TResult>,
    argument?: unknown
  ): Promise<QueryResult<TResult>> {
    const codec = this.session.codec;
    const request = codec.encode(command, argument);

    const reply = await this.session.transact(request, {
      timeoutMs: this.config.responseTimeoutMs,
      shape: command.response
    });

    const decoded = codec.decodeResponse(reply, command.response);
    if (decoded.status !== 'complete') {
      throw malformedFrameError(`${command.name} reply did not decode`, reply);
    }

    const result = command.interpret(decoded.value);
    if (result.success) {
      logVerbose(NAMESPACE, `${command.name} succeeded`);
    } else if (result.reason === 'unreadable') {
      logWarning(NAMESPACE, `${command.name} reply unreadable: ${result.detail ?? 'no detail'}`);
    } else {
      logVerbose(NAMESPACE, `${command.name} rejected by printer`);
    }
    return result;
  }

  private async acknowledged<TArg>(command: CommandDefinition<TArg, boolean>, argument?: unknown): Promise<boolean> {
    const result = await this.execute(command, argument);
    return result.success && result.data;
  }

  // ==========================================================================
  // OPERATIONS
  // ==========================================================================

  /**
   * Whether the printer is ready to dialog. Says nothing about whether the jet is running.
   */
  public getV24Dialog(): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.dialogCheck);
  }

  /**
   * Start or stop the printer
   *
   * @param mode - 0 long shutdown with auto-clean, 1 short shutdown, 255 start-up
   * @returns true only when the printer acknowledged the command
   */
  public startStopPrinter(mode: number): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.startStop, mode);
  }

  /**
   * Date and time currently stored on the printer
   */
  public getAutodatingTable(): Promise<QueryResult<Date>> {
    return this.execute(V24_COMMANDS.getAutodatingTable);
  }

  public setAutodatingTable(date: Date): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.setAutodatingTable, date);
  }

  /**
   * Update 1 to 10 external variables of a jet
   */
  public setExternalVariables(jetId: number, variables: readonly string[]): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.setExternalVariables, { jetId, variables });
  }

  /**
   * Print counter of a jet, incremented by one per print
   */
  public getJetCounter(jetId: number): Promise<QueryResult<number>> {
    return this.execute(V24_COMMANDS.getJetCounter, jetId);
  }

  public resetJetCounter(jetId: number): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.resetJetCounter, jetId);
  }

  public getJetStatus(jetId: number): Promise<QueryResult<JetStatus>> {
    return this.execute(V24_COMMANDS.getJetStatus, jetId);
  }

  /**
   * Jet speed in m/s
   */
  public getJetSpeed(jetId: number): Promise<QueryResult<number>> {
    return this.execute(V24_COMMANDS.getJetSpeed, jetId);
  }

  public getParameters(): Promise<QueryResult<PrinterParameters>> {
    return this.execute(V24_COMMANDS.getParameters);
  }

  public getPrinterFaults(): Promise<QueryResult<PrinterFaults>> {
    return this.execute(V24_COMMANDS.getPrinterFaults);
  }

  public resetPrinterFaults(): Promise<boolean> {
    return this.acknowledged(V24_COMMANDS.resetPrinterFaults);
  }

  /**
   * Number of jets present, derived from the fault table
   */
  public async getAvailableJetCount(): Promise<QueryResult<number>> {
    const faults = await this.getPrinterFaults();
    if (!faults.success) {
      return faults;
    }
    return { success: true, data: faults.data.jets.filter(jet => !jet.notPresent).length };
  }
}
