/**
 * @fileoverview Abstract duplex byte stream the session runs over.
 *
 * The session needs nothing transport-specific: write bytes, be told about incoming
 * chunks and about the stream ending, and tear it down. TCP is the default
 * implementation (services/TcpTransport); tests substitute an in-process stub.
 *
 * @module types/transport
 */

import type { Endpoint } from './protocol';

export interface ByteStream {
  /** Resolves once the bytes are handed to the OS; rejects on write failure */
  write(data: Uint8Array): Promise<void>;
  onData(listener: (chunk: Uint8Array) => void): void;
  /** Called once when the stream ends; `error` is set when it ended abnormally */
  onClose(listener: (error?: Error) => void): void;
  /** Release the underlying resource. Safe to call more than once. */
  destroy(): void;
}

/**
 * Opens a stream to `endpoint`, rejecting when it cannot be established within `timeoutMs`
 */
export type TransportConnector = (endpoint: Endpoint, timeoutMs: number) => Promise<ByteStream>;
