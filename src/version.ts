import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getPackageRoot } from './utils/paths.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    readFileSync(join(getPackageRoot(), 'package.json'), 'utf-8'),
  );
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION = readVersion();
