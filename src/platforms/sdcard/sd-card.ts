/**
 * @file SD card protocol engine behind a byte-wide TX/RX register pair.
 *
 * Guest writes to TX feed the command accumulator; guest reads from RX pull
 * the next reply byte, computed lazily from the current state. Nothing runs
 * between register accesses.
 */

import { SdSpiError, ProtocolViolationError } from '../../host/errors';
import { Logger, silentLogger } from '../../host/logger';
import { BlockStore } from './block-store';
import { SdCommand, SdCommandKind, commandKindForOpcode, decodeCommand } from './commands';
import {
  SD_BLOCK_REPLY_LENGTH,
  SD_CMD58_REPLY,
  SD_CMD8_REPLY,
  SD_COMMAND_BUFFER_SIZE,
  SD_DEFAULT_LATENCY_MS,
  SD_FILLER,
  SD_FRAME_LENGTH,
  SD_R1_IDLE,
  SD_R1_READY,
  SD_START_TOKEN,
  SD_TRAILING_BYTE,
} from './constants';
import { StallFn, blockingStall } from './latency';

/**
 * `idle` only lasts until the first frame completes; from then on the
 * engine rests in `ready` between commands.
 */
export type SdCardMode =
  | { kind: 'idle' }
  | { kind: 'ready' }
  | { kind: 'collecting'; command: SdCommandKind };

export type SdCardOptions = {
  /** Stall before a block read starts streaming (default 30 ms) */
  latencyMs?: number;
  /** Replaces the blocking stall, e.g. with a spy in tests */
  stall?: StallFn;
  logger?: Logger;
};

export interface SdCardSnapshot {
  mode: SdCardMode;
  initialized: boolean;
  commandBytes: number[];
  replyCursor: number | null;
  pendingBlockIndex: number | null;
  faulted: boolean;
}

type SdReply = {
  bytes: ArrayLike<number>;
  cursor: number;
};

const IDLE: SdCardMode = { kind: 'idle' };
const READY: SdCardMode = { kind: 'ready' };
const R1_IDLE_REPLY = [SD_R1_IDLE] as const;
const R1_READY_REPLY = [SD_R1_READY] as const;

/**
 * Minimal SPI-mode SD card: enough of CMD0/8/16/17/55/58 and ACMD41 for a
 * boot loader's init sequence and single-block reads.
 */
export class SdCard {
  private readonly latencyMs: number;
  private readonly stall: StallFn;
  private readonly logger: Logger;
  private mode: SdCardMode = IDLE;
  private initialized = false;
  private readonly commandBuffer = new Uint8Array(SD_COMMAND_BUFFER_SIZE);
  private commandLength = 0;
  private frame: SdCommand | undefined;
  private reply: SdReply | null = null;
  private pendingBlockIndex: number | null = null;
  private readonly blockFrame = new Uint8Array(SD_BLOCK_REPLY_LENGTH);
  private fault: SdSpiError | null = null;

  public constructor(
    private readonly store: BlockStore,
    options: SdCardOptions = {}
  ) {
    this.latencyMs = Math.max(0, options.latencyMs ?? SD_DEFAULT_LATENCY_MS);
    this.stall = options.stall ?? blockingStall;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Handles a guest write to the transmit register.
   * @throws {ProtocolViolationError} On an unknown opcode or a buffer overflow
   */
  public write(value: number): void {
    this.assertHealthy();
    const byte = value & 0xff;
    if (this.mode.kind === 'collecting') {
      this.collect(byte);
    } else {
      this.startCommand(byte);
    }
  }

  /**
   * Handles a guest read of the receive register.
   */
  public read(): number {
    this.assertHealthy();
    if (this.mode.kind !== 'collecting' || this.frame === undefined) {
      return SD_FILLER;
    }
    if (this.reply === null) {
      this.reply = this.beginReply(this.frame);
    }
    const reply = this.reply;
    const byte = reply.bytes[reply.cursor] & 0xff;
    reply.cursor += 1;
    if (reply.cursor >= reply.bytes.length) {
      this.finishCommand();
    }
    return byte;
  }

  /**
   * Clears all transient state, including the post-init `ready` baseline
   * and any recorded fault.
   */
  public reset(): void {
    this.mode = IDLE;
    this.initialized = false;
    this.commandBuffer.fill(0);
    this.commandLength = 0;
    this.frame = undefined;
    this.reply = null;
    this.pendingBlockIndex = null;
    this.fault = null;
  }

  /**
   * Puts the engine into the fatal state; every later access rethrows
   * `error` until {@link SdCard.reset}.
   */
  public fail(error: SdSpiError): void {
    this.recordFault(error);
  }

  public snapshot(): SdCardSnapshot {
    return {
      mode: { ...this.mode },
      initialized: this.initialized,
      commandBytes: Array.from(this.commandBuffer.subarray(0, this.commandLength)),
      replyCursor: this.reply === null ? null : this.reply.cursor,
      pendingBlockIndex: this.pendingBlockIndex,
      faulted: this.fault !== null,
    };
  }

  private startCommand(byte: number): void {
    if (byte === SD_FILLER) {
      return;
    }
    const kind = commandKindForOpcode(byte);
    if (kind === undefined) {
      throw this.recordFault(ProtocolViolationError.unknownCommand(byte));
    }
    this.commandLength = 0;
    this.commandBuffer[this.commandLength++] = byte;
    this.mode = { kind: 'collecting', command: kind };
  }

  private collect(byte: number): void {
    // Once the frame is complete, 0xFF only clocks reply bytes out.
    if (this.commandLength >= SD_FRAME_LENGTH && byte === SD_FILLER) {
      return;
    }
    if (this.commandLength >= SD_COMMAND_BUFFER_SIZE) {
      throw this.recordFault(ProtocolViolationError.overflow(SD_COMMAND_BUFFER_SIZE));
    }
    this.commandBuffer[this.commandLength++] = byte;
    if (this.commandLength === SD_FRAME_LENGTH) {
      this.frame = decodeCommand(this.commandBuffer);
      this.initialized = true;
    }
  }

  private beginReply(command: SdCommand): SdReply {
    switch (command.kind) {
      case 'CMD0':
        return { bytes: R1_IDLE_REPLY, cursor: 0 };
      case 'CMD8':
        return { bytes: SD_CMD8_REPLY, cursor: 0 };
      case 'CMD58':
        return { bytes: SD_CMD58_REPLY, cursor: 0 };
      case 'CMD16':
      case 'CMD55':
      case 'ACMD41':
        return { bytes: R1_READY_REPLY, cursor: 0 };
      case 'CMD17':
        return { bytes: this.loadBlockFrame(command.blockIndex), cursor: 0 };
      default: {
        const unreachable: never = command;
        return unreachable;
      }
    }
  }

  private loadBlockFrame(blockIndex: number): Uint8Array {
    this.pendingBlockIndex = blockIndex;
    this.logger.debug(`CMD17 read block ${blockIndex}`);
    this.stall(this.latencyMs);
    let block: Uint8Array;
    try {
      block = this.store.readBlock(blockIndex);
    } catch (err) {
      if (err instanceof SdSpiError) {
        throw this.recordFault(err);
      }
      throw err;
    }
    this.blockFrame[0] = SD_START_TOKEN;
    this.blockFrame.set(block, 1);
    this.blockFrame[SD_BLOCK_REPLY_LENGTH - 1] = SD_TRAILING_BYTE;
    return this.blockFrame;
  }

  private finishCommand(): void {
    this.mode = this.initialized ? READY : IDLE;
    this.commandLength = 0;
    this.frame = undefined;
    this.reply = null;
    this.pendingBlockIndex = null;
  }

  private recordFault(error: SdSpiError): SdSpiError {
    this.logger.error(error.message);
    this.fault = error;
    return error;
  }

  private assertHealthy(): void {
    if (this.fault !== null) {
      throw this.fault;
    }
  }
}
