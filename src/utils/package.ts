import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import { logger } from './logger.js';

/**
 * Version from the package.json two levels above this module (src/ or dist/).
 */
export function getVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package.json for the version', { error });
  }
  return '0.0.0';
}
