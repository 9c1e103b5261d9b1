/**
 * @fileoverview Wire-level type definitions for the V24 dialog protocol.
 *
 * Key exports:
 * - Endpoint: immutable printer address
 * - FrameGrammar: injectable description of the byte layout
 * - Frame / Response: decoded wire units
 * - DecodeResult: tagged result separating incomplete from invalid input
 * - SessionState: connection state machine states
 *
 * @module types/protocol
 */

/**
 * Printer address, fixed for the lifetime of a session
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * Integrity scheme appended after the payload
 */
export type ChecksumScheme = 'xor' | 'sum8' | 'none';

export type ByteOrder = 'big' | 'little';

/**
 * Single-byte control codes used outside of data frames
 */
export interface ControlBytes {
  readonly enq: number; // dialog readiness query
  readonly ack: number; // command accepted
  readonly nak: number; // command rejected
}

/**
 * Byte layout of a data frame:
 * opcode (opcodeWidth) | payload length (lengthWidth) | payload | checksum? | terminator?
 *
 * The checksum covers opcode, length and payload.
 */
export interface FrameGrammar {
  readonly opcodeWidth: 1 | 2;
  readonly lengthWidth: 1 | 2;
  readonly byteOrder: ByteOrder;
  readonly checksum: ChecksumScheme;
  readonly terminator?: number;
  readonly control: ControlBytes;
  readonly maxPayloadLength: number;
}

/**
 * Printer families with a grammar preset
 */
export type PrinterFamily = '9040' | '9042' | 'ip65' | 'contrast';

// ============================================================================
// FRAMES
// ============================================================================

/**
 * Opcode plus payload, the body of every request and every data response
 */
export interface DataFrame {
  readonly kind: 'data';
  readonly opcode: number;
  readonly payload: Uint8Array;
}

/**
 * Bare control byte sent by the client (ENQ)
 */
export interface ControlFrame {
  readonly kind: 'control';
  readonly code: number;
}

export type Frame = DataFrame | ControlFrame;

/**
 * Printer accepted the command; `frame` is present for commands that return data
 */
export interface AckResponse {
  readonly kind: 'ack';
  readonly frame?: DataFrame;
}

/**
 * Printer rejected the command or is not ready
 */
export interface NakResponse {
  readonly kind: 'nak';
}

export type Response = AckResponse | NakResponse;

/**
 * What the printer replies with after a given request
 */
export type ResponseShape = 'ack' | 'ack-frame';

// ============================================================================
// DECODE RESULTS
// ============================================================================

export interface DecodeComplete<T> {
  readonly status: 'complete';
  readonly value: T;
  readonly bytesConsumed: number;
}

/**
 * Buffer is a valid prefix; keep reading
 */
export interface DecodeNeedMoreData {
  readonly status: 'need-more-data';
}

/**
 * Buffer can never become a valid frame
 */
export interface DecodeMalformed {
  readonly status: 'malformed';
  readonly reason: string;
  readonly offset: number;
}

export type DecodeResult<T> = DecodeComplete<T> | DecodeNeedMoreData | DecodeMalformed;

// ============================================================================
// SESSION
// ============================================================================

export type SessionState = 'disconnected' | 'idle' | 'awaiting-response' | 'closed';

/**
 * Payload of the session `state-changed` event
 */
export interface SessionStateChange {
  readonly previous: SessionState;
  readonly current: SessionState;
  readonly endpoint: Endpoint;
}

/**
 * Options for a single request/response exchange
 */
export interface ExchangeOptions {
  readonly timeoutMs: number;
  readonly shape: ResponseShape;
}
