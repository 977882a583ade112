/**
 * Locate files shipped with the package (package.json, templates/).
 *
 * Sources run from src/ under the test runner and from dist/src/ once built,
 * so the root is found by walking up rather than by a fixed relative path.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync, fileExistsSync } from './file-system.js';
import { ErrorCodes, SystemError } from './errors.js';

let cachedRoot: string | undefined;

/**
 * Walk up from `startDir` to the nearest directory holding a package.json.
 */
export function findPackageRoot(startDir: string = path.dirname(fileURLToPath(import.meta.url))): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fileExistsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new SystemError(ErrorCodes.PACKAGE_ROOT_NOT_FOUND, `No package.json above ${startDir}`, {
        startDir,
      });
    }
    dir = parent;
  }
}

function packageRoot(): string {
  cachedRoot ??= findPackageRoot();
  return cachedRoot;
}

/**
 * Directory holding one fragment directory per template.
 */
export function getPackagedTemplatesDir(): string {
  return path.join(packageRoot(), 'templates');
}

/**
 * Version string from the package's own package.json.
 */
export function getPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(path.join(packageRoot(), 'package.json')));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}
