/**
 * @fileoverview One V24 dialog session to one printer endpoint.
 *
 * Owns the transport and runs the session state machine:
 *
 *   disconnected -> idle              (connect)
 *   idle -> awaiting-response         (request written)
 *   awaiting-response -> idle         (well-formed reply decoded)
 *   any -> closed                     (timeout, I/O failure, malformed reply, close())
 *
 * The protocol is strictly half-duplex, so at most one request is outstanding.
 * `exchange()` enforces that and fails with PROTOCOL_VIOLATION when called while a reply
 * is pending; `transact()` is the serialized entry point that queues concurrent callers.
 * A closed session stays closed: a partially read reply cannot be resynchronized, so
 * callers connect again. The session never retries.
 *
 * Events:
 * - 'state-changed' (SessionStateChange)
 *
 * Key exports:
 * - PrinterSession class
 * - SessionOptions interface
 */

import { EventEmitter } from 'events';
import type {
  Endpoint,
  ExchangeOptions,
  ResponseShape,
  SessionState,
  SessionStateChange
} from '../types/protocol';
import type { ByteStream, TransportConnector } from '../types/transport';
import { DEFAULT_CONFIG } from '../types/config';
import { FrameCodec } from '../protocol/FrameCodec';
import { connectTcp } from './TcpTransport';
import { EndpointSchema } from '../schemas/config.schemas';
import {
  ErrorCode,
  V24Error,
  connectionError,
  ioError,
  malformedFrameError,
  protocolViolationError,
  sessionClosedError
} from '../utils/error.utils';
import { withTimeout } from '../utils/OperationTimeout';
import { validateOrThrow } from '../utils/validation.utils';
import { concatBytes, toHex } from '../utils/bytes.utils';
import { logVerbose, logWarning } from '../utils/logging';

const NAMESPACE = 'PrinterSession';

export interface SessionOptions {
  readonly connectTimeoutMs?: number;
  readonly connector?: TransportConnector;
  readonly codec?: FrameCodec;
}

/**
 * Reply being accumulated for the outstanding request
 */
interface PendingExchange {
  buffer: Uint8Array;
  readonly shape: ResponseShape;
  readonly resolve: (response: Uint8Array) => void;
  readonly reject: (error: V24Error) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class PrinterSession extends EventEmitter {
  public readonly endpoint: Endpoint;
  public readonly codec: FrameCodec;

  private state: SessionState = 'disconnected';
  private stream: ByteStream | null = null;
  private pending: PendingExchange | null = null;
  private queue: Promise<void> = Promise.resolve();

  private constructor(endpoint: Endpoint, codec: FrameCodec) {
    super();
    this.endpoint = endpoint;
    this.codec = codec;
  }

  /**
   * Open a session to `endpoint`
   *
   * @throws V24Error INVALID_ARGUMENT for a bad host or port, CONNECTION when the
   *   transport cannot be established within the connect timeout
   */
  public static async connect(endpoint: Endpoint, options: SessionOptions = {}): Promise<PrinterSession> {
    const validated = validateOrThrow(EndpointSchema, endpoint, ErrorCode.INVALID_ARGUMENT);
    const session = new PrinterSession(
      Object.freeze({ host: validated.host, port: validated.port }),
      options.codec ?? new FrameCodec()
    );
    await session.open(
      options.connector ?? connectTcp,
      options.connectTimeoutMs ?? DEFAULT_CONFIG.connectTimeoutMs
    );
    return session;
  }

  public getState(): SessionState {
    return this.state;
  }

  public isOpen(): boolean {
    return this.state === 'idle' || this.state === 'awaiting-response';
  }

  /**
   * Write one request and read until the codec reports a complete reply
   *
   * @returns Raw reply bytes, exactly one complete frame
   * @throws V24Error PROTOCOL_VIOLATION when a reply is already pending,
   *   SESSION_CLOSED when the session is closed, TIMEOUT / IO / MALFORMED_FRAME
   *   after which the session is closed
   */
  public async exchange(request: Uint8Array, options: ExchangeOptions): Promise<Uint8Array> {
    if (this.state === 'awaiting-response') {
      throw protocolViolationError('A request is already awaiting its response');
    }
    const stream = this.stream;
    if (this.state !== 'idle' || !stream) {
      throw sessionClosedError('exchange');
    }

    const response = new Promise<Uint8Array>((resolve, reject) => {
      this.pending = { buffer: new Uint8Array(0), shape: options.shape, resolve, reject };
    });
    this.transition('awaiting-response');
    logVerbose(NAMESPACE, `-> ${toHex(request)}`);

    void stream.write(request).catch((error: unknown) => {
      this.terminate(ioError('Failed to write request', toError(error)));
    });

    return withTimeout(response, {
      timeoutMs: options.timeoutMs,
      operation: 'exchange',
      onTimeout: () => {
        logWarning(NAMESPACE, `No complete reply from ${this.describe()} within ${options.timeoutMs}ms`);
        this.terminate();
      }
    });
  }

  /**
   * Serialized exchange: waits for earlier callers to finish before sending
   */
  public transact(request: Uint8Array, options: ExchangeOptions): Promise<Uint8Array> {
    const run = this.queue.then(() => this.exchange(request, options));
    // Failures are delivered to the caller through `run`; the queue only tracks completion.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Release the transport. Idempotent; a pending exchange fails with SESSION_CLOSED.
   */
  public close(): void {
    if (this.state === 'closed') {
      return;
    }
    logVerbose(NAMESPACE, `Closing session to ${this.describe()}`);
    this.terminate(sessionClosedError('complete exchange'));
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async open(connector: TransportConnector, timeoutMs: number): Promise<void> {
    const connecting = connector(this.endpoint, timeoutMs);

    let stream: ByteStream;
    try {
      stream = await withTimeout(connecting, {
        timeoutMs,
        operation: 'connect',
        onTimeout: () => {
          // A connector that completes after the deadline hands back a stream nobody owns.
          void connecting.then(
            late => late.destroy(),
            (error: unknown) => logVerbose(NAMESPACE, 'Late connect attempt failed', error)
          );
        }
      });
    } catch (error) {
      this.transition('closed');
      throw connectionError(this.endpoint.host, this.endpoint.port, toError(error));
    }

    this.stream = stream;
    stream.onData(chunk => this.handleData(chunk));
    stream.onClose(error => this.handleClose(error));
    this.transition('idle');
  }

  private handleData(chunk: Uint8Array): void {
    if (this.state === 'closed') {
      return;
    }

    const pending = this.pending;
    if (!pending) {
      this.terminate();
      logWarning(NAMESPACE, `Unsolicited bytes from ${this.describe()}: ${toHex(chunk)}`);
      return;
    }

    pending.buffer = concatBytes(pending.buffer, chunk);
    const result = this.codec.decodeResponse(pending.buffer, pending.shape);

    switch (result.status) {
      case 'need-more-data':
        return;
      case 'malformed':
        this.terminate(malformedFrameError(`${result.reason} at offset ${result.offset}`, pending.buffer));
        return;
      case 'complete':
        if (result.bytesConsumed < pending.buffer.length) {
          this.terminate(malformedFrameError('trailing bytes after reply', pending.buffer));
          return;
        }
        this.pending = null;
        logVerbose(NAMESPACE, `<- ${toHex(pending.buffer)}`);
        this.transition('idle');
        pending.resolve(pending.buffer);
    }
  }

  private handleClose(error?: Error): void {
    if (this.state === 'closed') {
      return;
    }
    this.terminate(
      ioError(
        error ? `Connection to ${this.describe()} failed: ${error.message}` : `${this.describe()} closed the connection`,
        error
      )
    );
  }

  /**
   * Move to `closed`, release the transport and fail the pending exchange with `error`
   */
  private terminate(error?: V24Error): void {
    const pending = this.pending;
    this.pending = null;

    if (error && error.code !== ErrorCode.SESSION_CLOSED) {
      logWarning(NAMESPACE, `Closing session to ${this.describe()}: ${error.message}`);
    }

    if (this.state !== 'closed') {
      this.transition('closed');
    }
    if (this.stream) {
      this.stream.destroy();
      this.stream = null;
    }
    if (pending && error) {
      pending.reject(error);
    }
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    logVerbose(NAMESPACE, `${this.describe()}: ${previous} -> ${next}`);
    const change: SessionStateChange = { previous, current: next, endpoint: this.endpoint };
    this.emit('state-changed', change);
  }

  private describe(): string {
    return `${this.endpoint.host}:${this.endpoint.port}`;
  }
}
