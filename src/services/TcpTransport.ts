/**
 * @fileoverview TCP implementation of the session byte stream.
 *
 * Wraps a `net.Socket` as a ByteStream. Connect failures (refusal, DNS errors, timeout)
 * reject the connector promise with the underlying error; the session turns them into
 * CONNECTION errors. Once connected, a socket error or end is reported once through
 * `onClose`.
 *
 * Key exports:
 * - TcpByteStream class: ByteStream over a connected socket
 * - connectTcp(): TransportConnector used by default
 */

import * as net from 'net';
import type { Endpoint } from '../types/protocol';
import type { ByteStream } from '../types/transport';
import { logVerbose } from '../utils/logging';

const NAMESPACE = 'TcpTransport';

export class TcpByteStream implements ByteStream {
  private readonly socket: net.Socket;
  private readonly closeListeners: Array<(error?: Error) => void> = [];
  private closed = false;
  private lastError: Error | undefined;

  constructor(socket: net.Socket) {
    this.socket = socket;

    socket.on('error', (error: Error) => {
      this.lastError = error;
    });

    socket.on('close', () => {
      this.closed = true;
      const error = this.lastError;
      for (const listener of this.closeListeners.splice(0)) {
        listener(error);
      }
    });
  }

  public write(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed || this.socket.destroyed) {
        reject(new Error('Socket is closed'));
        return;
      }
      this.socket.write(data, (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public onData(listener: (chunk: Uint8Array) => void): void {
    this.socket.on('data', (chunk: Buffer) => {
      listener(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    });
  }

  public onClose(listener: (error?: Error) => void): void {
    if (this.closed) {
      listener(this.lastError);
      return;
    }
    this.closeListeners.push(listener);
  }

  public destroy(): void {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
  }
}

/**
 * Open a TCP connection to the printer
 *
 * @param endpoint - Printer address
 * @param timeoutMs - Connect deadline
 * @returns Connected stream
 */
export function connectTcp(endpoint: Endpoint, timeoutMs: number): Promise<ByteStream> {
  return new Promise<ByteStream>((resolve, reject) => {
    logVerbose(NAMESPACE, `Connecting to ${endpoint.host}:${endpoint.port}`);

    const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
    socket.setNoDelay(true);

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connect timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      logVerbose(NAMESPACE, `Connected to ${endpoint.host}:${endpoint.port}`);
      resolve(new TcpByteStream(socket));
    });
  });
}
