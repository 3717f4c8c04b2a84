import { join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';

import type { EnvironmentCreator, VenvboxConfig } from '../types/index.js';
import { CONFIG_FILE_NAMES } from '../constants/index.js';
import { readTextFileIfExists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration management for the venvbox CLI
 * Supports both JSON and JSONC formats. Commands only ever read it.
 */

const CREATORS: readonly EnvironmentCreator[] = ['venv', 'virtualenv'];

const STRING_KEYS = ['python', 'userBinDir', 'systemRoot', 'systemBinDir'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config document. Unknown keys are ignored.
 */
export function validateConfig(raw: unknown, source: string): VenvboxConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid config in ${source}: expected an object`);
  }

  const config: VenvboxConfig = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`Invalid config in ${source}: '${key}' must be a non-empty string`);
    }
    config[key] = value;
  }

  const creator = raw.creator;
  if (creator !== undefined) {
    const match = CREATORS.find(c => c === creator);
    if (!match) {
      throw new ConfigError(`Invalid config in ${source}: 'creator' must be one of ${CREATORS.join(', ')}`);
    }
    config.creator = match;
  }

  if (raw.upgradeInstaller !== undefined) {
    if (typeof raw.upgradeInstaller !== 'boolean') {
      throw new ConfigError(`Invalid config in ${source}: 'upgradeInstaller' must be a boolean`);
    }
    config.upgradeInstaller = raw.upgradeInstaller;
  }

  if (raw.lockStaleMs !== undefined) {
    const value = raw.lockStaleMs;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 2000) {
      throw new ConfigError(`Invalid config in ${source}: 'lockStaleMs' must be an integer of at least 2000`);
    }
    config.lockStaleMs = value;
  }

  return config;
}

export class ConfigManager {
  private config: VenvboxConfig | null = null;

  constructor(private readonly configDir: string) {}

  /**
   * Load configuration from the first config file found, or defaults when there is none
   */
  async load(): Promise<VenvboxConfig> {
    if (this.config) {
      return this.config;
    }

    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      const content = await readTextFileIfExists(path);
      if (content === null) continue;

      logger.debug(`Loading config from: ${path}`);
      const errors: ParseError[] = [];
      const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
      if (errors.length > 0) {
        const first = errors[0];
        throw new ConfigError(
          `Failed to parse ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`
        );
      }
      this.config = validateConfig(parsed, path);
      return this.config;
    }

    logger.debug(`No config file in ${this.configDir}, using defaults`);
    this.config = {};
    return this.config;
  }
}
