/**
 * @file Tests for config validation module
 */

import { describe, it, expect } from 'vitest';
import {
  CONFIG_KEYS,
  assertValidConfig,
  validateAddress,
  validateBoolean,
  validateInteger,
  validateLatency,
  validatePath,
  validateSdCardConfig,
} from '../../src/host/config-validation';
import { ConfigurationError } from '../../src/host/errors';

describe('config-validation', () => {
  describe('validateInteger', () => {
    it('should accept undefined and in-range integers', () => {
      expect(validateInteger(undefined, 'capacity').valid).toBe(true);
      expect(validateInteger(512, 'blockSize', 1).valid).toBe(true);
    });

    it('should reject non-numbers, fractions and values below the minimum', () => {
      expect(validateInteger('512', 'blockSize').errors).toEqual([
        'blockSize must be a number, got string',
      ]);
      expect(validateInteger(1.5, 'blockSize').errors).toEqual([
        'blockSize must be an integer, got 1.5',
      ]);
      expect(validateInteger(0, 'capacity', 1).errors).toEqual([
        'capacity must be at least 1, got 0',
      ]);
    });
  });

  describe('validateAddress', () => {
    it('should accept 32-bit addresses', () => {
      expect(validateAddress(0x10024000, 'base').valid).toBe(true);
      expect(validateAddress(0xffffffff, 'base').valid).toBe(true);
    });

    it('should reject addresses beyond 32 bits', () => {
      expect(validateAddress(0x100000000, 'base').errors).toEqual([
        'base must not exceed 0xffffffff, got 0x100000000',
      ]);
    });
  });

  describe('validatePath', () => {
    it('should accept strings and treat empty as absent', () => {
      expect(validatePath('tools/disk.img', 'image').valid).toBe(true);
      expect(validatePath('', 'image').valid).toBe(true);
    });

    it('should enforce required and string type', () => {
      expect(validatePath(undefined, 'image', true).errors).toEqual(['image is required']);
      expect(validatePath(42, 'image').errors).toEqual(['image must be a string, got number']);
      expect(validatePath('a\0b', 'image').valid).toBe(false);
    });
  });

  describe('validateBoolean', () => {
    it('should accept booleans only', () => {
      expect(validateBoolean(true, 'verbose').valid).toBe(true);
      expect(validateBoolean('yes', 'verbose').errors).toEqual([
        'verbose must be a boolean, got string',
      ]);
    });
  });

  describe('validateLatency', () => {
    it('should warn for very long stalls', () => {
      const result = validateLatency(5000, 'latencyMs');
      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        'latencyMs is very large (5000 ms). Every block read will stall that long.',
      ]);
      expect(validateLatency(30, 'latencyMs').warnings).toEqual([]);
    });
  });

  describe('validateSdCardConfig', () => {
    it('should accept a missing or complete config', () => {
      expect(validateSdCardConfig(undefined).valid).toBe(true);
      const result = validateSdCardConfig({
        image: 'tools/disk.img',
        capacity: 4194304,
        blockSize: 512,
        latencyMs: 30,
        base: 0x10024000,
        windowSize: 0x1000,
        txOffset: 72,
        rxOffset: 76,
        verbose: false,
      });
      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should reject non-objects', () => {
      expect(validateSdCardConfig([]).errors).toEqual(['config must be an object, got array']);
      expect(validateSdCardConfig('x').errors).toEqual(['config must be an object, got string']);
    });

    it('should collect every field error', () => {
      const result = validateSdCardConfig({ capacity: -1, blockSize: 'big', verbose: 1 });
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'capacity must be at least 1, got -1',
        'blockSize must be a number, got string',
        'verbose must be a boolean, got number',
      ]);
    });

    it('should reject a capacity that is not a multiple of the block size', () => {
      expect(validateSdCardConfig({ capacity: 1000, blockSize: 512 }).errors).toEqual([
        'capacity (1000) must be a multiple of blockSize (512)',
      ]);
    });

    it('should warn about unknown keys', () => {
      const result = validateSdCardConfig({ image: 'a.img', colour: 'red', size: 1 });
      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['Unknown config keys ignored: colour, size']);
    });

    it('should know every config key', () => {
      expect(CONFIG_KEYS).toContain('latencyMs');
      expect(CONFIG_KEYS).toHaveLength(9);
    });
  });

  describe('assertValidConfig', () => {
    it('should throw a ConfigurationError listing the problems', () => {
      expect(() => assertValidConfig({ capacity: 0 })).toThrow(ConfigurationError);
      expect(() => assertValidConfig({ capacity: 0 })).toThrow(
        'Invalid sdspi configuration:\n- capacity must be at least 1, got 0'
      );
    });

    it('should pass valid configs', () => {
      expect(() => assertValidConfig({ latencyMs: 0 })).not.toThrow();
    });
  });
});
