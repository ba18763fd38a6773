/**
 * @fileoverview Configuration loading and merging for the SD card host.
 * Handles reading sdspi.json files and merging configuration layers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { assertValidConfig } from './config-validation';
import { ConfigurationError, getErrorMessage } from './errors';
import { SdCardPlatformConfig } from '../platforms/types';

/** Key of the config section inside package.json */
export const PACKAGE_CONFIG_KEY = 'sdspi';

export interface LoadedConfig {
  config: SdCardPlatformConfig;
  /** File the config came from, if any */
  configPath?: string;
  /** Directory relative paths in the config resolve against */
  baseDir: string;
}

const readJson = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${filePath}: ${getErrorMessage(err)}`, {
      configPath: filePath,
    });
  }
};

const packageSection = (pkg: unknown): unknown => {
  if (typeof pkg !== 'object' || pkg === null || Array.isArray(pkg)) {
    return undefined;
  }
  return new Map<string, unknown>(Object.entries(pkg)).get(PACKAGE_CONFIG_KEY);
};

const hasPackageSection = (pkgPath: string): boolean => {
  try {
    return packageSection(readJson(pkgPath)) !== undefined;
  } catch {
    /* ignore parse errors; only loadConfigFile is strict */
    return false;
  }
};

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree.
 *
 * @param startDir - Directory to start searching from
 * @param configCandidates - List of config file names to look for
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(
  startDir: string,
  configCandidates: string[]
): string | undefined {
  const dirsToCheck: string[] = [];
  for (let dir = path.resolve(startDir); ; ) {
    dirsToCheck.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  for (const dir of dirsToCheck) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    // Check package.json for an sdspi section
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath) && hasPackageSection(pkgPath)) {
      return pkgPath;
    }
  }

  return undefined;
}

/**
 * Loads and validates configuration from a file path.
 *
 * @param configPath - Path to the configuration file
 * @returns The parsed configuration object
 * @throws {ConfigurationError} If the file cannot be read, parsed or validated
 */
export function loadConfigFile(configPath: string): SdCardPlatformConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file ${configPath} does not exist`, { configPath });
  }
  const parsed = readJson(configPath);
  const config = path.basename(configPath) === 'package.json' ? packageSection(parsed) : parsed;
  if (config === undefined) {
    return {};
  }
  assertValidConfig(config);
  return config;
}

/**
 * Gets the list of default configuration file candidates.
 *
 * @param explicitPath - Optional explicit config path
 * @returns Array of config file names to search for
 */
export function getConfigCandidates(explicitPath?: string): string[] {
  const candidates: string[] = [];

  if (explicitPath !== undefined && explicitPath !== '') {
    candidates.push(explicitPath);
  }

  candidates.push('sdspi.json');
  candidates.push('.sdspi.json');

  return candidates;
}

/**
 * Merges configuration layers. Priority: overrides > file.
 * Overrides that are undefined leave the file value in place.
 */
export function mergeConfig(
  fileConfig: SdCardPlatformConfig,
  overrides: SdCardPlatformConfig
): SdCardPlatformConfig {
  const merged: SdCardPlatformConfig = { ...fileConfig };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

/**
 * Resolves the config for a run: an explicit file must exist, otherwise the
 * nearest sdspi.json (or package.json section) above startDir is used, and
 * with none found the defaults apply.
 */
export function resolveConfig(startDir: string, explicitPath?: string): LoadedConfig {
  if (explicitPath !== undefined && explicitPath !== '') {
    const configPath = path.resolve(startDir, explicitPath);
    return {
      config: loadConfigFile(configPath),
      configPath,
      baseDir: path.dirname(configPath),
    };
  }
  const found = findConfigFile(startDir, getConfigCandidates());
  if (found === undefined) {
    return { config: {}, baseDir: path.resolve(startDir) };
  }
  return { config: loadConfigFile(found), configPath: found, baseDir: path.dirname(found) };
}
