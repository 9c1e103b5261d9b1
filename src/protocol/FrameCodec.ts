/**
 * @fileoverview Grammar-driven encoder/decoder for V24 dialog frames.
 *
 * Pure transformations over byte buffers. The byte layout (opcode and length widths,
 * byte order, checksum scheme, terminator, control bytes) comes from the injected
 * FrameGrammar; nothing here assumes a particular printer family.
 *
 * Decoding is incremental: callers pass everything received so far and get back one of
 * - complete: a frame plus how many bytes it used
 * - need-more-data: the buffer is a valid prefix
 * - malformed: no amount of further input can make the buffer valid
 *
 * Key exports:
 * - FrameCodec class: encode(), encodeFrame(), decode(), decodeResponse()
 */

import type {
  DataFrame,
  DecodeResult,
  Frame,
  FrameGrammar,
  Response,
  ResponseShape
} from '../types/protocol';
import type { CommandDefinition } from '../types/commands';
import { V24_DEFAULT_GRAMMAR, validateGrammar } from './grammars';
import { invalidArgumentError } from '../utils/error.utils';
import { readUInt, toHex, writeUInt } from '../utils/bytes.utils';

const NEED_MORE_DATA = Object.freeze({ status: 'need-more-data' } as const);

function malformed(reason: string, offset: number): DecodeResult<never> {
  return { status: 'malformed', reason, offset };
}

function formatByte(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

export class FrameCodec {
  public readonly grammar: FrameGrammar;
  private readonly controlBytes: ReadonlySet<number>;

  constructor(grammar: FrameGrammar = V24_DEFAULT_GRAMMAR) {
    this.grammar = grammar === V24_DEFAULT_GRAMMAR ? grammar : validateGrammar(grammar);
    const { enq, ack, nak } = this.grammar.control;
    this.controlBytes = new Set([enq, ack, nak]);
  }

  // ==========================================================================
  // ENCODING
  // ==========================================================================

  /**
   * Validate `argument` against the command's domain and produce the request bytes
   *
   * @throws V24Error INVALID_ARGUMENT when the argument is outside the domain
   */
  public encode<TArg>(command: CommandDefinition<TArg, unknown>, argument?: unknown): Uint8Array {
    const parsed = command.argument.safeParse(argument);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(issue => issue.message).join('; ');
      throw invalidArgumentError(`${command.name}: ${detail}`, {
        command: command.name,
        argument
      });
    }

    if (command.request.kind === 'control') {
      return this.encodeFrame({ kind: 'control', code: this.grammar.control[command.request.control] });
    }

    return this.encodeFrame({
      kind: 'data',
      opcode: command.request.opcode,
      payload: command.encodePayload(parsed.data)
    });
  }

  /**
   * Encode a raw frame. Opcodes outside the command table are representable here.
   */
  public encodeFrame(frame: Frame): Uint8Array {
    if (frame.kind === 'control') {
      if (!this.controlBytes.has(frame.code)) {
        throw invalidArgumentError(`${formatByte(frame.code)} is not a control byte`);
      }
      return Uint8Array.of(frame.code);
    }

    const { opcodeWidth, lengthWidth, byteOrder, checksum, terminator, maxPayloadLength } = this.grammar;

    if (!Number.isInteger(frame.opcode) || frame.opcode < 0 || frame.opcode >= 2 ** (8 * opcodeWidth)) {
      throw invalidArgumentError(`Opcode ${frame.opcode} does not fit in ${opcodeWidth} byte(s)`);
    }
    if (frame.payload.length > maxPayloadLength) {
      throw invalidArgumentError(
        `Payload of ${frame.payload.length} bytes exceeds the ${maxPayloadLength} byte limit`
      );
    }

    const headerLength = opcodeWidth + lengthWidth;
    const bodyLength = headerLength + frame.payload.length;
    const total = bodyLength + (checksum === 'none' ? 0 : 1) + (terminator === undefined ? 0 : 1);
    const bytes = new Uint8Array(total);

    writeUInt(bytes, 0, opcodeWidth, byteOrder, frame.opcode);
    if (this.controlBytes.has(bytes[0])) {
      throw invalidArgumentError(`Opcode ${formatByte(frame.opcode)} starts with a control byte`);
    }
    writeUInt(bytes, opcodeWidth, lengthWidth, byteOrder, frame.payload.length);
    bytes.set(frame.payload, headerLength);

    let offset = bodyLength;
    if (checksum !== 'none') {
      bytes[offset++] = this.computeChecksum(bytes.subarray(0, bodyLength));
    }
    if (terminator !== undefined) {
      bytes[offset] = terminator;
    }
    return bytes;
  }

  /**
   * Checksum of `bytes` under the grammar's scheme (0 for `none`)
   */
  public computeChecksum(bytes: Uint8Array): number {
    switch (this.grammar.checksum) {
      case 'xor':
        return bytes.reduce((acc, byte) => acc ^ byte, 0);
      case 'sum8':
        return bytes.reduce((acc, byte) => (acc + byte) & 0xff, 0);
      case 'none':
        return 0;
    }
  }

  // ==========================================================================
  // DECODING
  // ==========================================================================

  /**
   * Decode one frame as sent by the client (control byte or data frame)
   */
  public decode(bytes: Uint8Array): DecodeResult<Frame> {
    if (bytes.length === 0) {
      return NEED_MORE_DATA;
    }
    if (this.controlBytes.has(bytes[0])) {
      return { status: 'complete', value: { kind: 'control', code: bytes[0] }, bytesConsumed: 1 };
    }
    return this.decodeDataFrame(bytes, 0);
  }

  /**
   * Decode a printer reply. `ack-frame` replies carry a data frame after the ACK byte;
   * a NAK is always complete on its own.
   */
  public decodeResponse(bytes: Uint8Array, shape: ResponseShape): DecodeResult<Response> {
    if (bytes.length === 0) {
      return NEED_MORE_DATA;
    }

    const { ack, nak } = this.grammar.control;
    const lead = bytes[0];

    if (lead === nak) {
      return { status: 'complete', value: { kind: 'nak' }, bytesConsumed: 1 };
    }
    if (lead !== ack) {
      return malformed(`unexpected leading byte ${formatByte(lead)}`, 0);
    }
    if (shape === 'ack') {
      return { status: 'complete', value: { kind: 'ack' }, bytesConsumed: 1 };
    }

    const inner = this.decodeDataFrame(bytes, 1);
    if (inner.status !== 'complete') {
      return inner;
    }
    return {
      status: 'complete',
      value: { kind: 'ack', frame: inner.value },
      bytesConsumed: 1 + inner.bytesConsumed
    };
  }

  private decodeDataFrame(bytes: Uint8Array, start: number): DecodeResult<DataFrame> {
    const { opcodeWidth, lengthWidth, byteOrder, checksum, terminator, maxPayloadLength } = this.grammar;
    const available = bytes.length - start;
    const headerLength = opcodeWidth + lengthWidth;

    if (available > 0 && this.controlBytes.has(bytes[start])) {
      return malformed(`control byte ${formatByte(bytes[start])} where an opcode was expected`, start);
    }
    if (available < headerLength) {
      return NEED_MORE_DATA;
    }

    const opcode = readUInt(bytes, start, opcodeWidth, byteOrder);
    const payloadLength = readUInt(bytes, start + opcodeWidth, lengthWidth, byteOrder);
    if (payloadLength > maxPayloadLength) {
      return malformed(
        `declared payload length ${payloadLength} exceeds ${maxPayloadLength}`,
        start + opcodeWidth
      );
    }

    const bodyLength = headerLength + payloadLength;
    const frameLength = bodyLength + (checksum === 'none' ? 0 : 1) + (terminator === undefined ? 0 : 1);
    if (available < frameLength) {
      return NEED_MORE_DATA;
    }

    let offset = start + bodyLength;
    if (checksum !== 'none') {
      const expected = this.computeChecksum(bytes.subarray(start, offset));
      if (bytes[offset] !== expected) {
        return malformed(
          `checksum ${formatByte(bytes[offset])} does not match ${formatByte(expected)} ` +
            `over ${toHex(bytes.subarray(start, start + bodyLength))}`,
          offset
        );
      }
      offset++;
    }
    if (terminator !== undefined && bytes[offset] !== terminator) {
      return malformed(`expected terminator ${formatByte(terminator)}, got ${formatByte(bytes[offset])}`, offset);
    }

    return {
      status: 'complete',
      value: {
        kind: 'data',
        opcode,
        payload: bytes.slice(start + headerLength, start + bodyLength)
      },
      bytesConsumed: frameLength
    };
  }
}
