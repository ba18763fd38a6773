import { describe, expect, it } from 'vitest';
import {
  SD_COMMAND_KINDS,
  SD_OPCODES,
  commandKindForOpcode,
  decodeCommand,
  encodeCommand,
} from '../../../src/platforms/sdcard/commands';

describe('SD command codec', () => {
  it('maps every supported opcode back to its command', () => {
    for (const kind of SD_COMMAND_KINDS) {
      expect(commandKindForOpcode(SD_OPCODES[kind])).toBe(kind);
    }
    expect(commandKindForOpcode(0x7a)).toBe('CMD58');
    expect(commandKindForOpcode(0x69)).toBe('ACMD41');
  });

  it('rejects bytes outside the command set', () => {
    expect(commandKindForOpcode(0x00)).toBeUndefined();
    expect(commandKindForOpcode(0xff)).toBeUndefined();
    expect(commandKindForOpcode(0x58)).toBeUndefined(); // CMD24 is not modeled
  });

  it('decodes the CMD17 block index as big-endian', () => {
    const command = decodeCommand([0x51, 0x01, 0x02, 0x03, 0x04, 0xff]);
    expect(command).toEqual({ kind: 'CMD17', arg: 0x01020304, crc: 0xff, blockIndex: 0x01020304 });
  });

  it('keeps the argument unsigned when the top bit is set', () => {
    const command = decodeCommand([0x51, 0x80, 0x00, 0x00, 0x00, 0xff]);
    expect(command?.kind).toBe('CMD17');
    expect(command?.arg).toBe(0x80000000);
  });

  it('decodes non-block commands without a block index', () => {
    expect(decodeCommand([0x48, 0x00, 0x00, 0x01, 0xaa, 0x87])).toEqual({
      kind: 'CMD8',
      arg: 0x1aa,
      crc: 0x87,
    });
  });

  it('returns undefined for short or unknown frames', () => {
    expect(decodeCommand([0x40, 0x00, 0x00])).toBeUndefined();
    expect(decodeCommand([0x00, 0x00, 0x00, 0x00, 0x00, 0x00])).toBeUndefined();
  });

  it('encodes frames with a big-endian argument and default filler crc', () => {
    expect(encodeCommand('CMD8', 0x1aa, 0x87)).toEqual([0x48, 0x00, 0x00, 0x01, 0xaa, 0x87]);
    expect(encodeCommand('CMD16', 512)).toEqual([0x50, 0x00, 0x00, 0x02, 0x00, 0xff]);
    expect(encodeCommand('ACMD41', 0x40000000)).toEqual([0x69, 0x40, 0x00, 0x00, 0x00, 0xff]);
  });
});
