import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

/**
 * Package version loader.
 *
 * Both src/utils/version.ts and dist/utils/version.js sit two levels below
 * the package root; the one-level fallback covers flattened builds.
 */

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

interface PackageInfo {
  version: string;
  name?: string;
}

function isPackageInfo(value: unknown): value is PackageInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

function loadPackageInfo(): PackageInfo {
  for (const candidate of ['../../package.json', '../package.json']) {
    try {
      const loaded: unknown = require(join(__dirname, candidate));
      if (isPackageInfo(loaded)) {
        return loaded;
      }
    } catch {
      // Try next location
    }
  }
  console.error('[callflow] Warning: Could not load package.json, using fallback version');
  return { version: '0.0.0-unknown' };
}

const packageInfo = loadPackageInfo();

/**
 * Get the current package version
 */
export function getPackageVersion(): string {
  return packageInfo.version;
}
