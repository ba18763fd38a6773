#!/usr/bin/env node
/**
 * @fileoverview sdspi command line: attaches the SD card to a bus, runs the
 * boot-loader init sequence and dumps blocks read through the registers.
 */

import path from 'path';
import { resolveConfig, mergeConfig } from './host/config-loader';
import { validateSdCardConfig } from './host/config-validation';
import { ConfigurationError, getErrorMessage } from './host/errors';
import { formatHexDump } from './host/hex-dump';
import { DEFAULT_LOG_PREFIX, LogSink, createLogger } from './host/logger';
import { MmioBus } from './platforms/mmio-bus';
import { SdCardPlatformConfig } from './platforms/types';
import { createSdCardDevice, normalizeSdCardConfig } from './platforms/sdcard/device';
import { StallFn } from './platforms/sdcard/latency';
import { SpiSdDriver } from './platforms/sdcard/spi-driver';

export interface CliIo {
  stdout: LogSink;
  stderr: LogSink;
  cwd: string;
  /** Overrides the blocking stall (tests) */
  stall?: StallFn;
}

export interface CliOptions {
  image?: string;
  config?: string;
  block: number;
  count: number;
  latencyMs?: number;
  init: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage:
  sdspi [image] [--config path] [--block N] [--count N] [--latency MS] [--no-init] [--verbose]

Reads blocks from an SD card image through the emulated SPI registers and
prints them as a hex dump. Numbers accept a 0x prefix.

Examples:
  sdspi tools/disk.img
  sdspi --block 0x10 --count 2 --latency 0`;

function parseNum(flag: string, val: string | undefined): number {
  if (val === undefined) {
    throw new ConfigurationError(`${flag} needs a value`);
  }
  const s = val.trim();
  const n = s.startsWith('0x') || s.startsWith('0X') ? Number.parseInt(s.slice(2), 16) : Number(s);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(`${flag} expects a non-negative integer, got "${val}"`);
  }
  return n;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { block: 0, count: 1, init: true, verbose: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    switch (a) {
      case '--config':
        opts.config = argv[++i];
        if (opts.config === undefined) {
          throw new ConfigurationError('--config needs a value');
        }
        break;
      case '--block':
        opts.block = parseNum(a, argv[++i]);
        break;
      case '--count':
        opts.count = parseNum(a, argv[++i]);
        break;
      case '--latency':
        opts.latencyMs = parseNum(a, argv[++i]);
        break;
      case '--no-init':
        opts.init = false;
        break;
      case '--verbose':
        opts.verbose = true;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        if (a.startsWith('-')) {
          throw new ConfigurationError(`Unknown option ${a}`);
        }
        if (opts.image !== undefined) {
          throw new ConfigurationError(`Unexpected argument ${a}`);
        }
        opts.image = a;
    }
  }
  return opts;
}

/**
 * Runs the CLI and returns the process exit status.
 */
export function runCli(argv: string[], io: CliIo): number {
  try {
    const opts = parseCliArgs(argv);
    if (opts.help) {
      io.stdout(USAGE);
      return 0;
    }

    const loaded = resolveConfig(io.cwd, opts.config);
    const overrides: SdCardPlatformConfig = {
      ...(opts.image !== undefined ? { image: path.resolve(io.cwd, opts.image) } : {}),
      ...(opts.latencyMs !== undefined ? { latencyMs: opts.latencyMs } : {}),
      ...(opts.verbose ? { verbose: true } : {}),
    };
    const merged = mergeConfig(loaded.config, overrides);
    const config = normalizeSdCardConfig(merged, loaded.baseDir);
    const logger = createLogger({ verbose: config.verbose, log: io.stderr, logError: io.stderr });
    for (const warning of validateSdCardConfig(merged).warnings) {
      logger.warn(warning);
    }
    if (loaded.configPath !== undefined) {
      logger.debug(`config ${loaded.configPath}`);
    }

    const bus = new MmioBus();
    const device = createSdCardDevice(config, {
      logger,
      ...(io.stall ? { stall: io.stall } : {}),
    });
    device.attach(bus);

    const driver = new SpiSdDriver(bus, {
      base: config.base,
      txOffset: config.txOffset,
      rxOffset: config.rxOffset,
      blockSize: config.blockSize,
    });
    if (opts.init) {
      const info = driver.initialize();
      logger.info(`card ready, OCR=0x${info.ocr.toString(16).padStart(8, '0')}`);
    }
    for (let block = opts.block; block < opts.block + opts.count; block += 1) {
      const data = driver.readBlock(block);
      for (const line of formatHexDump(data, block * config.blockSize)) {
        io.stdout(line);
      }
    }
    return 0;
  } catch (err) {
    io.stderr(`${DEFAULT_LOG_PREFIX} ${getErrorMessage(err)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    cwd: process.cwd(),
  });
}
