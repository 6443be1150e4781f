/**
 * Package-relative paths
 *
 * @module core/utils/paths
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export function getPackageRoot(): string {
  // Navigate from src/core/utils to package root
  return join(dirname(fileURLToPath(import.meta.url)), '..', '..', '..');
}

export function getDataPath(...segments: string[]): string {
  return join(getPackageRoot(), 'data', ...segments);
}
