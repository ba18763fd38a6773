/**
 * @file sdspi Error Types
 * @description Custom error classes for the SD card peripheral and its host.
 * Every device error is fatal: the emulated guest has no way to observe it,
 * and the host terminates the emulation when one escapes.
 * @module host/errors
 */

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all sdspi errors.
 * Provides a consistent error structure with error codes and context.
 */
export class SdSpiError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /**
   * Creates a new SdSpiError.
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param context - Optional additional context
   */
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SdSpiError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    // Maintains proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigurationError extends SdSpiError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when required configuration is missing.
 */
export class MissingConfigError extends ConfigurationError {
  /** The missing configuration key(s) */
  readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[]) {
    super(message, { missingKeys });
    this.name = 'MissingConfigError';
    this.missingKeys = missingKeys;
  }
}

// ============================================================================
// Disk Image Errors
// ============================================================================

/**
 * Error thrown when the backing image cannot be used to fill the block store.
 */
export class DiskImageError extends SdSpiError {
  /** Path of the image, when it came from a file */
  readonly imagePath?: string;
  /** Capacity the block store expects */
  readonly expectedSize?: number;
  /** Size actually found */
  readonly actualSize?: number;

  constructor(message: string, imagePath?: string, expectedSize?: number, actualSize?: number) {
    super(message, 'DISK_IMAGE_ERROR', { imagePath, expectedSize, actualSize });
    this.name = 'DiskImageError';
    if (imagePath !== undefined) {
      this.imagePath = imagePath;
    }
    if (expectedSize !== undefined) {
      this.expectedSize = expectedSize;
    }
    if (actualSize !== undefined) {
      this.actualSize = actualSize;
    }
  }

  /**
   * Creates an error for an image file that does not exist.
   */
  static missing(imagePath: string): DiskImageError {
    return new DiskImageError(`Disk image ${imagePath} does not exist`, imagePath);
  }

  /**
   * Creates an error for an image file that exists but cannot be read.
   */
  static unreadable(imagePath: string, reason: string): DiskImageError {
    return new DiskImageError(`Cannot read disk image ${imagePath}: ${reason}`, imagePath);
  }

  /**
   * Creates an error for an image whose size differs from the card capacity.
   * @param imagePath - Source file, or undefined for an in-memory image
   */
  static sizeMismatch(
    imagePath: string | undefined,
    expectedSize: number,
    actualSize: number
  ): DiskImageError {
    const label = imagePath ?? 'in-memory image';
    return new DiskImageError(
      `${label} is ${actualSize} instead of ${expectedSize} bytes`,
      imagePath,
      expectedSize,
      actualSize
    );
  }
}

/**
 * Error thrown when a block outside the store is requested.
 */
export class BlockRangeError extends SdSpiError {
  readonly blockIndex: number;
  readonly blockCount: number;

  constructor(blockIndex: number, blockCount: number) {
    super(
      `Block ${blockIndex} is outside the card (${blockCount} blocks)`,
      'BLOCK_RANGE_ERROR',
      { blockIndex, blockCount }
    );
    this.name = 'BlockRangeError';
    this.blockIndex = blockIndex;
    this.blockCount = blockCount;
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Error thrown when the guest breaks SD command framing.
 */
export class ProtocolViolationError extends SdSpiError {
  /** The offending byte, when one byte caused the violation */
  readonly value?: number;

  constructor(message: string, value?: number) {
    super(message, 'PROTOCOL_VIOLATION', { value });
    this.name = 'ProtocolViolationError';
    if (value !== undefined) {
      this.value = value;
    }
  }

  /**
   * Creates an error for a byte that starts no recognized command.
   */
  static unknownCommand(value: number): ProtocolViolationError {
    return new ProtocolViolationError(
      `unknown SD command type=0x${value.toString(16)}`,
      value
    );
  }

  /**
   * Creates an error for a command buffer that filled without completing a reply.
   */
  static overflow(capacity: number): ProtocolViolationError {
    return new ProtocolViolationError(
      `SD command buffer overflow: more than ${capacity} bytes written without a completed reply`
    );
  }
}

/**
 * Error thrown when a guest-side driver receives a reply it cannot accept.
 */
export class SdResponseError extends SdSpiError {
  /** Name of the command whose reply was rejected */
  readonly command: string;
  /** The reply byte received, or undefined on timeout */
  readonly received?: number;

  constructor(message: string, command: string, received?: number) {
    super(message, 'SD_RESPONSE_ERROR', { command, received });
    this.name = 'SdResponseError';
    this.command = command;
    if (received !== undefined) {
      this.received = received;
    }
  }
}

// ============================================================================
// Bus Errors
// ============================================================================

/**
 * Error thrown for a memory-mapped access the bus cannot perform.
 */
export class BusAccessError extends SdSpiError {
  readonly address: number;
  readonly size: number;

  constructor(message: string, address: number, size: number) {
    super(message, 'BUS_ACCESS_ERROR', { address, size });
    this.name = 'BusAccessError';
    this.address = address;
    this.size = size;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if an error is an SdSpiError.
 */
export function isSdSpiError(error: unknown): error is SdSpiError {
  return error instanceof SdSpiError;
}

/**
 * Type guard to check if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Type guard to check if an error is a DiskImageError.
 */
export function isDiskImageError(error: unknown): error is DiskImageError {
  return error instanceof DiskImageError;
}

/**
 * Type guard to check if an error is a ProtocolViolationError.
 */
export function isProtocolViolationError(error: unknown): error is ProtocolViolationError {
  return error instanceof ProtocolViolationError;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Wraps an unknown error in an SdSpiError if it isn't already one.
 * @param error - The error to wrap
 * @param defaultMessage - Default message if error is not an Error
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): SdSpiError {
  if (isSdSpiError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new SdSpiError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new SdSpiError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

/**
 * Gets a user-friendly error message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
