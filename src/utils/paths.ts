import { fileURLToPath } from 'node:url';
import { dirname, join, relative, resolve, sep } from 'node:path';
import type { PinConfig } from '../types/config.js';

/** Entry module of this tool, relative to its package root. */
export const ENTRY_MODULE = 'src/index.ts';

export function getPackageRoot(): string {
  const currentFile = fileURLToPath(import.meta.url);
  // Works from both src/utils/ and dist/utils/
  return resolve(dirname(currentFile), '..', '..');
}

export function getSchemaPath(): string {
  return resolve(getPackageRoot(), 'schema', 'pin-config.schema.json');
}

export function toPosix(path: string): string {
  return path.split(sep).join('/');
}

export interface PinContext {
  /** Directory holding the manifest; the package manager runs here. */
  workDir: string;
  repoRoot: string;
  manifestPath: string;
  lockFilePath: string;
  outputPath: string;
  /** Repository-relative paths, as written to the header and shown to the user. */
  generatorPath: string;
  manifestDisplayPath: string;
  outputDisplayPath: string;
}

export function resolvePinContext(
  workDir: string,
  config: Pick<PinConfig, 'repoRoot' | 'output'>,
  files: { manifestFile: string; lockFile: string },
): PinContext {
  const absWorkDir = resolve(workDir);
  const repoRoot = resolve(absWorkDir, config.repoRoot);
  const manifestPath = join(absWorkDir, files.manifestFile);
  const outputPath = resolve(repoRoot, config.output);

  return {
    workDir: absWorkDir,
    repoRoot,
    manifestPath,
    lockFilePath: join(absWorkDir, files.lockFile),
    outputPath,
    generatorPath: toPosix(relative(repoRoot, join(absWorkDir, ENTRY_MODULE))),
    manifestDisplayPath: toPosix(relative(repoRoot, manifestPath)),
    outputDisplayPath: toPosix(relative(repoRoot, outputPath)),
  };
}
