/**
 * @file Configuration validation for sdspi config files.
 * @description Provides runtime validation of the SD card platform config with
 * detailed error messages for invalid values.
 * @module host/config-validation
 */

import { ConfigurationError } from './errors';
import { SdCardPlatformConfig } from '../platforms/types';

// ============================================================================
// Constants
// ============================================================================

/** Keys a config object may carry */
export const CONFIG_KEYS = [
  'image',
  'capacity',
  'blockSize',
  'latencyMs',
  'base',
  'windowSize',
  'txOffset',
  'rxOffset',
  'verbose',
] as const;

/** Valid range for a 32-bit bus address */
const ADDRESS_MIN = 0;
const ADDRESS_MAX = 0xffffffff;

/** Latency above which a warning is raised */
const LATENCY_WARN_MS = 1000;

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Validation result containing all issues found.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

// ============================================================================
// Individual Validators
// ============================================================================

/**
 * Validates an optional integer with a lower bound.
 * @param value - Value to validate
 * @param fieldName - Name of the field for error messages
 * @param min - Smallest accepted value
 */
export function validateInteger(value: unknown, fieldName: string, min = 0): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'number') {
    errors.push(`${fieldName} must be a number, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (!Number.isInteger(value)) {
    errors.push(`${fieldName} must be an integer, got ${value}`);
    return { valid: false, errors, warnings };
  }

  if (value < min) {
    errors.push(`${fieldName} must be at least ${min}, got ${value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates a bus address is within the 32-bit range.
 */
export function validateAddress(value: unknown, fieldName: string): ValidationResult {
  const result = validateInteger(value, fieldName, ADDRESS_MIN);
  if (!result.valid || typeof value !== 'number') {
    return result;
  }
  if (value > ADDRESS_MAX) {
    return {
      valid: false,
      errors: [`${fieldName} must not exceed 0x${ADDRESS_MAX.toString(16)}, got 0x${value.toString(16)}`],
      warnings: [],
    };
  }
  return result;
}

/**
 * Validates a file path string.
 * @param required - Whether the field is required
 */
export function validatePath(
  value: unknown,
  fieldName: string,
  required = false
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null || value === '') {
    if (required) {
      errors.push(`${fieldName} is required`);
      return { valid: false, errors, warnings };
    }
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'string') {
    errors.push(`${fieldName} must be a string, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  if (value.includes('\0')) {
    errors.push(`${fieldName} contains invalid null character`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates a boolean value.
 */
export function validateBoolean(value: unknown, fieldName: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }

  if (typeof value !== 'boolean') {
    errors.push(`${fieldName} must be a boolean, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }

  return { valid: true, errors, warnings };
}

/**
 * Validates the simulated access latency.
 */
export function validateLatency(value: unknown, fieldName: string): ValidationResult {
  const result = validateInteger(value, fieldName, 0);
  if (result.valid && typeof value === 'number' && value > LATENCY_WARN_MS) {
    result.warnings.push(`${fieldName} is very large (${value} ms). Every block read will stall that long.`);
  }
  return result;
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validates a complete SD card config object.
 * @param config - Parsed config to validate
 * @returns Validation result with all errors and warnings
 */
export function validateSdCardConfig(config: unknown): ValidationResult {
  if (config === undefined || config === null) {
    return { valid: true, errors: [], warnings: [] };
  }

  if (typeof config !== 'object' || Array.isArray(config)) {
    return {
      valid: false,
      errors: [`config must be an object, got ${Array.isArray(config) ? 'array' : typeof config}`],
      warnings: [],
    };
  }

  const entries = new Map<string, unknown>(Object.entries(config));
  const results: ValidationResult[] = [];

  results.push(validatePath(entries.get('image'), 'image'));
  results.push(validateInteger(entries.get('capacity'), 'capacity', 1));
  results.push(validateInteger(entries.get('blockSize'), 'blockSize', 1));
  results.push(validateLatency(entries.get('latencyMs'), 'latencyMs'));
  results.push(validateAddress(entries.get('base'), 'base'));
  results.push(validateInteger(entries.get('windowSize'), 'windowSize', 1));
  results.push(validateInteger(entries.get('txOffset'), 'txOffset', 0));
  results.push(validateInteger(entries.get('rxOffset'), 'rxOffset', 0));
  results.push(validateBoolean(entries.get('verbose'), 'verbose'));

  const known = new Set<string>(CONFIG_KEYS);
  const unknownKeys = [...entries.keys()].filter((key) => !known.has(key));
  if (unknownKeys.length > 0) {
    results.push({
      valid: true,
      errors: [],
      warnings: [`Unknown config keys ignored: ${unknownKeys.join(', ')}`],
    });
  }

  const capacity = entries.get('capacity');
  const blockSize = entries.get('blockSize');
  if (
    typeof capacity === 'number' &&
    typeof blockSize === 'number' &&
    blockSize > 0 &&
    capacity % blockSize !== 0
  ) {
    results.push({
      valid: false,
      errors: [`capacity (${capacity}) must be a multiple of blockSize (${blockSize})`],
      warnings: [],
    });
  }

  return mergeResults(results);
}

/**
 * Validates a config object and throws on error.
 * @throws {ConfigurationError} If validation fails
 */
export function assertValidConfig(config: unknown): asserts config is SdCardPlatformConfig {
  const result = validateSdCardConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid sdspi configuration:\n- ${result.errors.join('\n- ')}`, {
      errors: result.errors,
    });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Merges multiple validation results into one.
 */
function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
