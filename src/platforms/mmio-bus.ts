/**
 * @file Memory-mapped I/O registration point.
 * Routes guest loads/stores to the device whose window covers the address.
 */

import { BusAccessError, ConfigurationError } from '../host/errors';

/**
 * A device reachable through a window on the bus. Offsets are relative to
 * the window base; `size` is the access width in bytes.
 */
export interface MmioDevice {
  read(offset: number, size: number): number;
  write(offset: number, size: number, value: number): void;
  reset?(): void;
}

export interface MmioRegion {
  name: string;
  base: number;
  size: number;
  device: MmioDevice;
}

const ACCESS_SIZES = new Set([1, 2, 3, 4]);

export class MmioBus {
  private regions: MmioRegion[] = [];

  /**
   * Maps a device window.
   * @throws {ConfigurationError} If the window is empty or overlaps another one
   */
  map(name: string, base: number, size: number, device: MmioDevice): MmioRegion {
    if (!Number.isInteger(base) || base < 0 || !Number.isInteger(size) || size <= 0) {
      throw new ConfigurationError(`Invalid window for ${name}: base=${base} size=${size}`, {
        name,
        base,
        size,
      });
    }
    const clash = this.regions.find(
      (region) => base < region.base + region.size && region.base < base + size
    );
    if (clash) {
      throw new ConfigurationError(
        `${name} window 0x${base.toString(16)}+0x${size.toString(16)} overlaps ${clash.name}`,
        { name, base, size, overlaps: clash.name }
      );
    }
    const region: MmioRegion = { name, base, size, device };
    const index = this.regions.findIndex((item) => item.base > base);
    if (index === -1) {
      this.regions.push(region);
    } else {
      this.regions.splice(index, 0, region);
    }
    return region;
  }

  /**
   * Returns the region covering an address, if any.
   */
  find(address: number): MmioRegion | undefined {
    return this.regions.find(
      (region) => address >= region.base && address < region.base + region.size
    );
  }

  /**
   * Loads `size` bytes. Unmapped addresses read as 0.
   */
  read(address: number, size: number): number {
    this.checkAccess(address, size);
    const region = this.find(address);
    if (!region) {
      return 0;
    }
    return region.device.read(address - region.base, size);
  }

  /**
   * Stores `size` bytes. Unmapped addresses ignore the store.
   */
  write(address: number, size: number, value: number): void {
    this.checkAccess(address, size);
    const region = this.find(address);
    if (!region) {
      return;
    }
    region.device.write(address - region.base, size, value >>> 0);
  }

  /**
   * Resets every mapped device that supports it, in address order.
   */
  reset(): void {
    for (const region of this.regions) {
      region.device.reset?.();
    }
  }

  private checkAccess(address: number, size: number): void {
    if (!ACCESS_SIZES.has(size)) {
      throw new BusAccessError(
        `Unsupported access width ${size} at 0x${address.toString(16)}`,
        address,
        size
      );
    }
  }
}
