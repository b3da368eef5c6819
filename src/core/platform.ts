import { OPERATING_SYSTEMS, type OperatingSystem } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Map a Node.js platform identifier onto the operating systems path templates
 * are declared for.
 */
export function detectOperatingSystem(platform: NodeJS.Platform = process.platform): OperatingSystem {
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'windows';
    default:
      throw new ConfigError(
        `Unsupported platform '${platform}'. Supported platforms: ${OPERATING_SYSTEMS.join(', ')}`,
        { platform }
      );
  }
}
