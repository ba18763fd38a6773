/**
 * @fileoverview Raw card contents, filled from a flat image file at reset.
 */

import fs from 'fs';
import { BlockRangeError, ConfigurationError, DiskImageError, getErrorMessage } from '../../host/errors';
import { SD_BLOCK_SIZE, SD_DEFAULT_CAPACITY } from './constants';

export type BlockStoreGeometry = {
  capacity: number;
  blockSize: number;
};

/**
 * Fixed-size byte array addressed in blocks. Contents only change through
 * {@link BlockStore.load} / {@link BlockStore.loadBytes}.
 */
export class BlockStore {
  readonly capacity: number;
  readonly blockSize: number;
  readonly blockCount: number;
  private readonly contents: Uint8Array;

  public constructor(geometry: Partial<BlockStoreGeometry> = {}) {
    const capacity = geometry.capacity ?? SD_DEFAULT_CAPACITY;
    const blockSize = geometry.blockSize ?? SD_BLOCK_SIZE;
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new ConfigurationError(`blockSize must be a positive integer, got ${blockSize}`, {
        blockSize,
      });
    }
    if (!Number.isInteger(capacity) || capacity <= 0 || capacity % blockSize !== 0) {
      throw new ConfigurationError(
        `capacity must be a positive multiple of ${blockSize}, got ${capacity}`,
        { capacity, blockSize }
      );
    }
    this.capacity = capacity;
    this.blockSize = blockSize;
    this.blockCount = capacity / blockSize;
    this.contents = new Uint8Array(capacity);
  }

  /**
   * Replaces the contents with the whole of an image file.
   * @throws {DiskImageError} If the file is missing or its size is not the capacity
   */
  load(imagePath: string): void {
    let size: number;
    try {
      const stat = fs.statSync(imagePath);
      if (!stat.isFile()) {
        throw DiskImageError.missing(imagePath);
      }
      size = stat.size;
    } catch (err) {
      if (err instanceof DiskImageError) {
        throw err;
      }
      throw DiskImageError.missing(imagePath);
    }
    if (size !== this.capacity) {
      throw DiskImageError.sizeMismatch(imagePath, this.capacity, size);
    }
    let bytes: Buffer;
    try {
      bytes = fs.readFileSync(imagePath);
    } catch (err) {
      throw DiskImageError.unreadable(imagePath, getErrorMessage(err));
    }
    // The file may have changed between stat and read.
    if (bytes.length !== this.capacity) {
      throw DiskImageError.sizeMismatch(imagePath, this.capacity, bytes.length);
    }
    this.contents.set(bytes);
  }

  /**
   * Replaces the contents with an in-memory image of exactly `capacity` bytes.
   */
  loadBytes(bytes: Uint8Array): void {
    if (bytes.length !== this.capacity) {
      throw DiskImageError.sizeMismatch(undefined, this.capacity, bytes.length);
    }
    this.contents.set(bytes);
  }

  /**
   * Returns a view of one block. Callers must treat it as read-only.
   * @throws {BlockRangeError} If the index is outside the card
   */
  readBlock(index: number): Uint8Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.blockCount) {
      throw new BlockRangeError(index, this.blockCount);
    }
    const start = index * this.blockSize;
    return this.contents.subarray(start, start + this.blockSize);
  }
}
