/**
 * @file SPI-mode SD card constants.
 * @fileoverview
 */

// ===== Card Geometry =====
/** Bytes per addressable block. */
export const SD_BLOCK_SIZE = 512;
/** Default card capacity (4 MiB). */
export const SD_DEFAULT_CAPACITY = 4 * 1024 * 1024;

// ===== Register Window =====
/** SPI1 window base on the board. */
export const SD_MMIO_BASE = 0x10024000;
/** SPI1 window size. */
export const SD_MMIO_SIZE = 0x1000;
/** Transmit data register (guest writes clock bytes in). */
export const SD_REG_TXDATA = 72;
/** Receive data register (guest reads reply bytes out). */
export const SD_REG_RXDATA = 76;

// ===== Framing =====
/** Bytes in one command frame. */
export const SD_FRAME_LENGTH = 6;
/** Command bytes that may be buffered before a reply completes. */
export const SD_COMMAND_BUFFER_SIZE = 32;
/** Idle/filler byte on both lines. */
export const SD_FILLER = 0xff;
/** Marks the start of a data block. */
export const SD_START_TOKEN = 0xfe;
/** Byte that follows the data block. */
export const SD_TRAILING_BYTE = 0xff;
/** Bytes in a block-read reply: start token, data, trailing byte. */
export const SD_BLOCK_REPLY_LENGTH = 1 + SD_BLOCK_SIZE + 1;

// ===== Timing =====
/** Simulated media access time for a block read. */
export const SD_DEFAULT_LATENCY_MS = 30;

// ===== Opcodes (0x40 | command index) =====
export const SD_OP_CMD0 = 0x40;
export const SD_OP_CMD8 = 0x48;
export const SD_OP_CMD16 = 0x50;
export const SD_OP_CMD17 = 0x51;
export const SD_OP_ACMD41 = 0x69;
export const SD_OP_CMD55 = 0x77;
export const SD_OP_CMD58 = 0x7a;

// ===== Fixed Replies =====
/** R1 with the idle bit set. */
export const SD_R1_IDLE = 0x01;
/** R1 with no flags. */
export const SD_R1_READY = 0x00;
/** R7: idle R1, voltage accepted, check pattern echoed. */
export const SD_CMD8_REPLY = [0x01, 0x00, 0x00, 0x01, 0xaa] as const;
/** R3: ready R1, OCR 0xC0FF8000. */
export const SD_CMD58_REPLY = [0x00, 0xc0, 0xff, 0x80, 0x00] as const;
