/**
 * @file SD card platform configuration types.
 */

export interface SdCardPlatformConfig {
  /** Backing image path; relative paths resolve against the config file */
  image?: string;
  capacity?: number;
  blockSize?: number;
  latencyMs?: number;
  /** Window base on the bus */
  base?: number;
  windowSize?: number;
  txOffset?: number;
  rxOffset?: number;
  verbose?: boolean;
}

export interface SdCardPlatformConfigNormalized {
  image: string;
  capacity: number;
  blockSize: number;
  latencyMs: number;
  base: number;
  windowSize: number;
  txOffset: number;
  rxOffset: number;
  verbose: boolean;
}
