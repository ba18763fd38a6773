export * from './host/errors';
export * from './host/logger';
export * from './host/config-validation';
export * from './host/config-loader';
export { formatHexDump } from './host/hex-dump';
export * from './platforms/types';
export * from './platforms/mmio-bus';
export * from './platforms/sdcard/constants';
export * from './platforms/sdcard/commands';
export { BlockStore } from './platforms/sdcard/block-store';
export type { BlockStoreGeometry } from './platforms/sdcard/block-store';
export { blockingStall } from './platforms/sdcard/latency';
export type { StallFn } from './platforms/sdcard/latency';
export { SdCard } from './platforms/sdcard/sd-card';
export type { SdCardMode, SdCardOptions, SdCardSnapshot } from './platforms/sdcard/sd-card';
export * from './platforms/sdcard/device';
export * from './platforms/sdcard/spi-driver';
