/**
 * @file SD command set understood by the card, and 6-byte frame codec.
 */

import {
  SD_FILLER,
  SD_FRAME_LENGTH,
  SD_OP_ACMD41,
  SD_OP_CMD0,
  SD_OP_CMD16,
  SD_OP_CMD17,
  SD_OP_CMD55,
  SD_OP_CMD58,
  SD_OP_CMD8,
} from './constants';

export const SD_COMMAND_KINDS = ['CMD0', 'CMD8', 'CMD16', 'CMD17', 'CMD55', 'CMD58', 'ACMD41'] as const;
export type SdCommandKind = (typeof SD_COMMAND_KINDS)[number];

export const SD_OPCODES: Readonly<Record<SdCommandKind, number>> = {
  CMD0: SD_OP_CMD0,
  CMD8: SD_OP_CMD8,
  CMD16: SD_OP_CMD16,
  CMD17: SD_OP_CMD17,
  CMD55: SD_OP_CMD55,
  CMD58: SD_OP_CMD58,
  ACMD41: SD_OP_ACMD41,
};

const KIND_BY_OPCODE = new Map<number, SdCommandKind>(
  SD_COMMAND_KINDS.map((kind) => [SD_OPCODES[kind], kind])
);

type SdCommandFields = {
  arg: number;
  crc: number;
};

/**
 * A decoded command frame. Only CMD17 carries a payload the card acts on.
 */
export type SdCommand =
  | (SdCommandFields & { kind: 'CMD17'; blockIndex: number })
  | (SdCommandFields & { kind: Exclude<SdCommandKind, 'CMD17'> });

/**
 * Looks up the command started by an opcode byte.
 */
export function commandKindForOpcode(value: number): SdCommandKind | undefined {
  return KIND_BY_OPCODE.get(value & 0xff);
}

/**
 * Decodes the first six bytes of a command buffer whose opcode was
 * already recognized. Returns undefined for a short or unknown frame.
 */
export function decodeCommand(frame: ArrayLike<number>): SdCommand | undefined {
  if (frame.length < SD_FRAME_LENGTH) {
    return undefined;
  }
  const kind = commandKindForOpcode(frame[0]);
  if (kind === undefined) {
    return undefined;
  }
  const arg =
    (((frame[1] & 0xff) << 24) |
      ((frame[2] & 0xff) << 16) |
      ((frame[3] & 0xff) << 8) |
      (frame[4] & 0xff)) >>>
    0;
  const crc = frame[5] & 0xff;
  if (kind === 'CMD17') {
    return { kind, arg, crc, blockIndex: arg };
  }
  return { kind, arg, crc };
}

/**
 * Builds a frame `[opcode, a3, a2, a1, a0, crc]` with a big-endian argument.
 */
export function encodeCommand(kind: SdCommandKind, arg = 0, crc = SD_FILLER): number[] {
  const value = arg >>> 0;
  return [
    SD_OPCODES[kind],
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff,
    crc & 0xff,
  ];
}
