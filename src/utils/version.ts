import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Read the package version from the package.json two levels above this module
 * (the same from src/utils and dist/utils), falling back to the initial release
 * number when it cannot be read.
 */
function getPackageVersion(): string {
  try {
    const packagePath = join(__dirname, '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson !== 'object' ||
      packageJson === null ||
      !('version' in packageJson) ||
      typeof packageJson.version !== 'string'
    ) {
      throw new Error('Version not found in package.json');
    }

    return packageJson.version;
  } catch (error) {
    console.warn(
      'Could not read version from package.json, using fallback:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    return '0.1.0';
  }
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
