/**
 * @fileoverview Tests for the V24 command table
 * Tests argument domains, payload codecs and reply interpreters
 */

import { describe, it, expect } from '@jest/globals';
import {
  COMMAND_NAMES,
  V24_COMMANDS,
  findCommandByOpcode,
  getCommand,
  parseAutodating,
  parseJetCounter,
  parseJetSpeed,
  parseJetStatus,
  parseParameters,
  parsePrinterFaults
} from './CommandTable';
import { FrameCodec } from './FrameCodec';
import { ErrorCode, hasErrorCode } from '../utils/error.utils';
import { asciiToBytes } from '../utils/bytes.utils';

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

describe('CommandTable', () => {
  const codec = new FrameCodec();

  it('should list every command once', () => {
    expect(COMMAND_NAMES).toEqual([
      'dialogCheck',
      'startStop',
      'getAutodatingTable',
      'setAutodatingTable',
      'setExternalVariables',
      'getJetCounter',
      'resetJetCounter',
      'getJetStatus',
      'getJetSpeed',
      'getParameters',
      'getPrinterFaults',
      'resetPrinterFaults'
    ]);
  });

  describe('lookups', () => {
    it('should find commands by name', () => {
      expect(getCommand('startStop')).toBe(V24_COMMANDS.startStop);
    });

    it('should reject names outside the table', () => {
      expect(() => getCommand('formatDisk')).toThrow('Unknown command "formatDisk"');
    });

    it('should find commands by request opcode', () => {
      expect(findCommandByOpcode(0x3b)).toBe(V24_COMMANDS.getPrinterFaults);
      expect(findCommandByOpcode(0x99)).toBeUndefined();
    });
  });

  describe('setExternalVariables', () => {
    it('should wrap each variable in 0x12 delimiters after the jet id', () => {
      const request = codec.encode(V24_COMMANDS.setExternalVariables, { jetId: 1, variables: ['AB', 'C'] });
      expect(request).toEqual(bytes(
        0x5b, 0x00, 0x08,
        0x01, 0x12, 0x41, 0x42, 0x12, 0x12, 0x43, 0x12,
        0x12
      ));
    });

    it('should read the payload back', () => {
      const payload = bytes(0x02, 0x12, 0x4c, 0x4f, 0x54, 0x31, 0x12);
      expect(V24_COMMANDS.setExternalVariables.decodePayload(payload)).toEqual({ jetId: 2, variables: ['LOT1'] });
      expect(V24_COMMANDS.setExternalVariables.decodePayload(bytes(0x02, 0x41))).toBeNull();
    });

    it('should reject more than ten variables', () => {
      const variables = Array.from({ length: 11 }, (_, i) => `V${i}`);
      expect(() => codec.encode(V24_COMMANDS.setExternalVariables, { jetId: 1, variables }))
        .toThrow('setExternalVariables: At most 10 variables can be set');
    });

    it('should reject an empty variable list', () => {
      expect(() => codec.encode(V24_COMMANDS.setExternalVariables, { jetId: 1, variables: [] }))
        .toThrow('setExternalVariables: At least one variable is required');
    });

    it('should reject the 0x12 delimiter inside a variable', () => {
      expect(() => codec.encode(V24_COMMANDS.setExternalVariables, { jetId: 1, variables: ['A\u0012B'] }))
        .toThrow('setExternalVariables: Variables must be printable ASCII');
    });

    it('should reject non-printable characters', () => {
      let caught: unknown;
      try {
        codec.encode(V24_COMMANDS.setExternalVariables, { jetId: 1, variables: ['A\u0012B'] });
      } catch (error) {
        caught = error;
      }
      expect(hasErrorCode(caught, ErrorCode.INVALID_ARGUMENT)).toBe(true);
    });
  });

  describe('setAutodatingTable', () => {
    const date = new Date(2023, 11, 24, 12, 30, 45);

    it('should encode the date as BCD seconds first', () => {
      expect(codec.encode(V24_COMMANDS.setAutodatingTable, date)).toEqual(bytes(
        0xc8, 0x00, 0x07,
        0x45, 0x30, 0x12, 0x24, 0x12, 0x23, 0x20,
        0x9d
      ));
    });

    it('should read the payload back', () => {
      const payload = bytes(0x45, 0x30, 0x12, 0x24, 0x12, 0x23, 0x20);
      expect(V24_COMMANDS.setAutodatingTable.decodePayload(payload)).toEqual(date);
    });

    it('should reject dates outside the two-digit year range', () => {
      expect(() => codec.encode(V24_COMMANDS.setAutodatingTable, new Date(1999, 0, 1)))
        .toThrow('setAutodatingTable: Date must be a valid date between 2000 and 2099');
    });
  });

  describe('interpreters', () => {
    it('should treat ACK as accepted and NAK as rejected', () => {
      expect(V24_COMMANDS.startStop.interpret({ kind: 'ack' })).toEqual({ success: true, data: true });
      expect(V24_COMMANDS.startStop.interpret({ kind: 'nak' })).toEqual({ success: false, reason: 'rejected' });
    });

    it('should report a query reply without a frame as unreadable', () => {
      expect(V24_COMMANDS.getParameters.interpret({ kind: 'ack' })).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'reply carried no data frame'
      });
    });

    it('should report a reply echoing another opcode as unreadable', () => {
      const result = V24_COMMANDS.getJetSpeed.interpret({
        kind: 'ack',
        frame: { kind: 'data', opcode: 0x32, payload: bytes(0x25) }
      });
      expect(result).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'reply opcode 0x32 does not match request'
      });
    });
  });

  describe('parsers', () => {
    it('should parse the autodating table', () => {
      const payload = asciiToBytes('45 30 12 24 12 23'.padEnd(22, ' '));
      expect(parseAutodating(payload)).toEqual({ success: true, data: new Date(2023, 11, 24, 12, 30, 45) });
    });

    it('should reject impossible calendar dates', () => {
      const payload = asciiToBytes('00 00 00 31 02 23'.padEnd(22, ' '));
      expect(parseAutodating(payload)).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'invalid date digits 000000310223'
      });
    });

    it('should pivot two-digit years at 69', () => {
      expect(parseAutodating(asciiToBytes('00 00 00 01 01 68'.padEnd(22, ' ')))).toEqual({
        success: true,
        data: new Date(2068, 0, 1, 0, 0, 0)
      });
      expect(parseAutodating(asciiToBytes('59 59 23 31 12 99'.padEnd(22, ' ')))).toEqual({
        success: true,
        data: new Date(1999, 11, 31, 23, 59, 59)
      });
      expect(parseAutodating(asciiToBytes('00 00 00 01 01 69'.padEnd(22, ' ')))).toEqual({
        success: true,
        data: new Date(1969, 0, 1, 0, 0, 0)
      });
    });

    it('should reject a truncated autodating table', () => {
      expect(parseAutodating(asciiToBytes('45 30'))).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'expected 12 date digits, got 4'
      });
    });

    it('should parse the jet counter', () => {
      expect(parseJetCounter(asciiToBytes('000001234'))).toEqual({ success: true, data: 1234 });
      expect(parseJetCounter(asciiToBytes('00000ABCD')).success).toBe(false);
    });

    it('should map status bytes to jet states', () => {
      expect(parseJetStatus(bytes(0))).toEqual({ success: true, data: 'stopped' });
      expect(parseJetStatus(bytes(7))).toEqual({ success: true, data: 'running' });
      expect(parseJetStatus(bytes(8))).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'unknown jet status 8'
      });
      expect(parseJetStatus(bytes()).success).toBe(false);
    });

    it('should read jet speed as BCD tenths', () => {
      expect(parseJetSpeed(bytes(0x25))).toEqual({ success: true, data: 2.5 });
      expect(parseJetSpeed(bytes(0x1a))).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'speed byte 26 is not BCD'
      });
    });

    it('should parse parameters with comma decimals', () => {
      expect(parseParameters(asciiToBytes('1500 3,25 05 02 20,1 35 28'))).toEqual({
        success: true,
        data: {
          motorSpeed: 1500,
          pressure: 3.25,
          viscoFillingTimes: 5,
          additiveAdded: 2,
          averageJetSpeed: 20.1,
          electronicsTemperature: 35,
          inkCircuitTemperature: 28
        }
      });
    });

    it('should name the first non-numeric parameter', () => {
      expect(parseParameters(asciiToBytes('1500 x,25 05 02 20,1 35 28'))).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'parameter pressure is not numeric'
      });
    });

    it('should decode printer and jet fault bits', () => {
      const payload = bytes(0x01, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x01);
      const result = parsePrinterFaults(payload);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.printer.inkLevelLow).toBe(true);
        expect(result.data.printer.romFault).toBe(true);
        expect(result.data.printer.ramFault).toBe(false);
        expect(result.data.jets.map(jet => jet.jetId)).toEqual([1, 2, 3, 4]);
        expect(result.data.jets.map(jet => jet.notPresent)).toEqual([false, false, true, true]);
      }
    });

    it('should reject a short fault table', () => {
      expect(parsePrinterFaults(new Uint8Array(14))).toEqual({
        success: false,
        reason: 'unreadable',
        detail: 'expected 15 fault bytes, got 14'
      });
    });
  });
});
