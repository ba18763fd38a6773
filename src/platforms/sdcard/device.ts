/**
 * @file SD card device: engine + block store behind the SPI1 register window.
 */

import path from 'path';
import { ConfigurationError, SdSpiError } from '../../host/errors';
import { Logger, silentLogger } from '../../host/logger';
import { MmioBus, MmioDevice, MmioRegion } from '../mmio-bus';
import { SdCardPlatformConfig, SdCardPlatformConfigNormalized } from '../types';
import { BlockStore } from './block-store';
import {
  SD_BLOCK_SIZE,
  SD_DEFAULT_CAPACITY,
  SD_DEFAULT_LATENCY_MS,
  SD_MMIO_BASE,
  SD_MMIO_SIZE,
  SD_REG_RXDATA,
  SD_REG_TXDATA,
} from './constants';
import { StallFn } from './latency';
import { SdCard } from './sd-card';

export const SD_DEFAULT_IMAGE = path.join('tools', 'disk.img');
export const SD_DEVICE_NAME = 'sdcard';

export type SdCardDeviceOptions = {
  stall?: StallFn;
  logger?: Logger;
};

const pickNumber = (value: number | undefined, fallback: number): number =>
  Number.isFinite(value) && value !== undefined ? value : fallback;

/**
 * Fills defaults and checks the geometry and register layout.
 * @param cfg - Raw platform config
 * @param baseDir - Directory relative image paths resolve against
 * @throws {ConfigurationError} If the values cannot describe a working card
 */
export function normalizeSdCardConfig(
  cfg?: SdCardPlatformConfig,
  baseDir: string = process.cwd()
): SdCardPlatformConfigNormalized {
  const config = cfg ?? {};
  const image =
    typeof config.image === 'string' && config.image.trim() !== ''
      ? config.image.trim()
      : SD_DEFAULT_IMAGE;
  const normalized: SdCardPlatformConfigNormalized = {
    image: path.resolve(baseDir, image),
    capacity: pickNumber(config.capacity, SD_DEFAULT_CAPACITY),
    blockSize: pickNumber(config.blockSize, SD_BLOCK_SIZE),
    latencyMs: Math.max(0, pickNumber(config.latencyMs, SD_DEFAULT_LATENCY_MS)),
    base: pickNumber(config.base, SD_MMIO_BASE),
    windowSize: pickNumber(config.windowSize, SD_MMIO_SIZE),
    txOffset: pickNumber(config.txOffset, SD_REG_TXDATA),
    rxOffset: pickNumber(config.rxOffset, SD_REG_RXDATA),
    verbose: config.verbose === true,
  };

  const { capacity, blockSize, windowSize, txOffset, rxOffset } = normalized;
  if (blockSize <= 0 || capacity <= 0 || capacity % blockSize !== 0) {
    throw new ConfigurationError(
      `capacity (${capacity}) must be a positive multiple of blockSize (${blockSize})`,
      { capacity, blockSize }
    );
  }
  for (const [name, offset] of [
    ['txOffset', txOffset],
    ['rxOffset', rxOffset],
  ] as const) {
    if (offset < 0 || offset >= windowSize) {
      throw new ConfigurationError(`${name} (${offset}) lies outside the ${windowSize}-byte window`, {
        [name]: offset,
        windowSize,
      });
    }
  }
  if (txOffset === rxOffset) {
    throw new ConfigurationError('txOffset and rxOffset must differ', { txOffset, rxOffset });
  }
  return normalized;
}

/**
 * Exposes an {@link SdCard} as two byte-wide registers. Any access width is
 * taken; only the low byte matters. Other offsets read 0 and drop writes.
 */
export class SdCardDevice implements MmioDevice {
  readonly store: BlockStore;
  readonly card: SdCard;
  private readonly logger: Logger;

  public constructor(
    readonly config: SdCardPlatformConfigNormalized,
    options: SdCardDeviceOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.store = new BlockStore({ capacity: config.capacity, blockSize: config.blockSize });
    this.card = new SdCard(this.store, {
      latencyMs: config.latencyMs,
      logger: this.logger,
      ...(options.stall ? { stall: options.stall } : {}),
    });
  }

  read(offset: number, _size: number): number {
    if (offset !== this.config.rxOffset) {
      return 0;
    }
    return this.card.read();
  }

  write(offset: number, _size: number, value: number): void {
    if (offset !== this.config.txOffset) {
      return;
    }
    this.card.write(value & 0xff);
  }

  /**
   * Machine reset: clears the engine and reloads the image. A failed reload
   * leaves the engine faulted.
   */
  reset(): void {
    this.card.reset();
    try {
      this.loadImage();
    } catch (err) {
      if (err instanceof SdSpiError) {
        this.card.fail(err);
      }
      throw err;
    }
    this.logger.debug('reset');
  }

  /**
   * Fills the block store from the configured image.
   * @throws {DiskImageError} If the image is missing or the wrong size
   */
  loadImage(): void {
    this.store.load(this.config.image);
    this.logger.info(`loaded ${this.config.image} (${this.config.capacity} bytes)`);
  }

  attach(bus: MmioBus): MmioRegion {
    return bus.map(SD_DEVICE_NAME, this.config.base, this.config.windowSize, this);
  }
}

/**
 * Builds a device and loads its image, so a bad image fails before the guest
 * can touch a register.
 */
export function createSdCardDevice(
  config: SdCardPlatformConfigNormalized,
  options: SdCardDeviceOptions = {}
): SdCardDevice {
  const device = new SdCardDevice(config, options);
  device.loadImage();
  return device;
}
