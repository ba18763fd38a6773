/**
 * @file Guest-side SPI SD driver.
 * Talks to the card through the bus the way a boot loader does: every byte
 * is an exchange (write TX, then read RX), and 0xFF clocks replies out.
 */

import { SdResponseError } from '../../host/errors';
import { MmioBus } from '../mmio-bus';
import { SdCommandKind, encodeCommand } from './commands';
import {
  SD_BLOCK_SIZE,
  SD_FILLER,
  SD_MMIO_BASE,
  SD_R1_IDLE,
  SD_R1_READY,
  SD_REG_RXDATA,
  SD_REG_TXDATA,
  SD_START_TOKEN,
} from './constants';

export type SpiSdDriverOptions = {
  base?: number;
  txOffset?: number;
  rxOffset?: number;
  blockSize?: number;
  /** Filler exchanges to wait for a reply before giving up */
  maxPolls?: number;
  /** CMD55+ACMD41 rounds before giving up on initialization */
  maxInitTries?: number;
};

export type SdCardInfo = {
  /** Last four bytes of the CMD8 reply */
  interfaceCondition: number;
  ocr: number;
  /** OCR bit 30 */
  highCapacity: boolean;
};

const CMD0_CRC = 0x95;
const CMD8_ARG = 0x000001aa;
const CMD8_CRC = 0x87;
const ACMD41_HCS = 0x40000000;
const WAKE_CLOCK_BYTES = 10;
const DEFAULT_MAX_POLLS = 8;
const DEFAULT_MAX_INIT_TRIES = 16;

const hex = (value: number): string => `0x${value.toString(16).padStart(2, '0')}`;

export class SpiSdDriver {
  private readonly txAddress: number;
  private readonly rxAddress: number;
  private readonly blockSize: number;
  private readonly maxPolls: number;
  private readonly maxInitTries: number;

  public constructor(
    private readonly bus: MmioBus,
    options: SpiSdDriverOptions = {}
  ) {
    const base = options.base ?? SD_MMIO_BASE;
    this.txAddress = base + (options.txOffset ?? SD_REG_TXDATA);
    this.rxAddress = base + (options.rxOffset ?? SD_REG_RXDATA);
    this.blockSize = options.blockSize ?? SD_BLOCK_SIZE;
    this.maxPolls = options.maxPolls ?? DEFAULT_MAX_POLLS;
    this.maxInitTries = options.maxInitTries ?? DEFAULT_MAX_INIT_TRIES;
  }

  exchange(value: number): number {
    this.bus.write(this.txAddress, 1, value & 0xff);
    return this.bus.read(this.rxAddress, 1) & 0xff;
  }

  /**
   * Sends one frame and returns the first non-filler reply byte.
   */
  command(kind: SdCommandKind, arg = 0, crc = SD_FILLER): number {
    for (const byte of encodeCommand(kind, arg, crc)) {
      this.bus.write(this.txAddress, 1, byte);
    }
    return this.readResponse(kind);
  }

  /**
   * Clocks fillers until the card answers.
   * @throws {SdResponseError} If only fillers arrive within `maxPolls`
   */
  readResponse(label: string): number {
    for (let i = 0; i < this.maxPolls; i += 1) {
      const value = this.exchange(SD_FILLER);
      if (value !== SD_FILLER) {
        return value;
      }
    }
    throw new SdResponseError(`${label}: no response after ${this.maxPolls} polls`, label);
  }

  /**
   * Runs the boot-loader init sequence: CMD0, CMD8, CMD55+ACMD41 until
   * ready, CMD58, CMD16.
   */
  initialize(): SdCardInfo {
    for (let i = 0; i < WAKE_CLOCK_BYTES; i += 1) {
      this.exchange(SD_FILLER);
    }

    this.expect('CMD0', this.command('CMD0', 0, CMD0_CRC), SD_R1_IDLE);

    this.expect('CMD8', this.command('CMD8', CMD8_ARG, CMD8_CRC), SD_R1_IDLE);
    const interfaceCondition = this.readWord();
    if ((interfaceCondition & 0xff) !== (CMD8_ARG & 0xff)) {
      throw new SdResponseError(
        `CMD8: check pattern ${hex(interfaceCondition & 0xff)} does not echo ${hex(CMD8_ARG & 0xff)}`,
        'CMD8',
        interfaceCondition & 0xff
      );
    }

    let ready = false;
    for (let attempt = 0; attempt < this.maxInitTries && !ready; attempt += 1) {
      const r1 = this.command('CMD55');
      if (r1 !== SD_R1_READY && r1 !== SD_R1_IDLE) {
        throw new SdResponseError(`CMD55: unexpected R1 ${hex(r1)}`, 'CMD55', r1);
      }
      const status = this.command('ACMD41', ACMD41_HCS);
      if (status !== SD_R1_READY && status !== SD_R1_IDLE) {
        throw new SdResponseError(`ACMD41: unexpected R1 ${hex(status)}`, 'ACMD41', status);
      }
      ready = status === SD_R1_READY;
    }
    if (!ready) {
      throw new SdResponseError(
        `ACMD41: card still idle after ${this.maxInitTries} attempts`,
        'ACMD41',
        SD_R1_IDLE
      );
    }

    this.expect('CMD58', this.command('CMD58'), SD_R1_READY);
    const ocr = this.readWord();

    this.expect('CMD16', this.command('CMD16', this.blockSize), SD_R1_READY);

    return {
      interfaceCondition,
      ocr,
      highCapacity: (ocr & 0x40000000) !== 0,
    };
  }

  /**
   * Reads one block with CMD17. An R1 ahead of the start token is skipped.
   */
  readBlock(index: number): Uint8Array {
    let token = this.command('CMD17', index);
    if (token === SD_R1_READY) {
      token = this.readResponse('CMD17');
    }
    if (token !== SD_START_TOKEN) {
      throw new SdResponseError(`CMD17: expected start token, got ${hex(token)}`, 'CMD17', token);
    }
    const data = new Uint8Array(this.blockSize);
    for (let i = 0; i < data.length; i += 1) {
      data[i] = this.exchange(SD_FILLER);
    }
    // Trailing byte after the data.
    this.exchange(SD_FILLER);
    return data;
  }

  private readWord(): number {
    let value = 0;
    for (let i = 0; i < 4; i += 1) {
      value = ((value << 8) | this.exchange(SD_FILLER)) >>> 0;
    }
    return value;
  }

  private expect(label: string, received: number, expected: number): void {
    if (received !== expected) {
      throw new SdResponseError(
        `${label}: expected ${hex(expected)}, got ${hex(received)}`,
        label,
        received
      );
    }
  }
}
