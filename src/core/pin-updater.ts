import { access, mkdtemp, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolNotFoundError } from './package-manager.js';
import { filterLocalPackages } from './requirements-filter.js';
import { renderHeader } from './requirements-header.js';
import {
  CleanupScope,
  type CleanupErrorHandler,
  type SignalSource,
} from '../utils/cleanup.js';
import type { CommandResult, PackageManager } from './package-manager.js';
import type { LocalPackageFilter } from './requirements-filter.js';
import type { PinContext } from '../utils/paths.js';

export type PinStep = 'check' | 'lock' | 'export' | 'filter' | 'write';

export class ManifestNotFoundError extends Error {
  constructor(public readonly manifestPath: string) {
    super(`Manifest not found: ${manifestPath}`);
    this.name = 'ManifestNotFoundError';
  }
}

export interface RegenerateOptions {
  packageManager: PackageManager;
  filter: LocalPackageFilter;
  onStep?: (step: PinStep) => void;
  onToolOutput?: (step: 'lock' | 'export', result: CommandResult) => void;
  onCleanupError?: CleanupErrorHandler;
  /** Parent directory for the temporary export. Defaults to the OS temp dir. */
  tempDir?: string;
  /** Emitter of SIGINT, SIGTERM and SIGHUP. Defaults to `process`. */
  signalSource?: SignalSource;
}

export interface RegenerateResult {
  outputPath: string;
  kept: number;
  removed: string[];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Re-resolve the manifest from scratch and rewrite the requirements file.
 *
 * The lock file and the temporary export never outlive the call. The
 * output file is replaced in one rename once filtering has succeeded.
 */
export async function regeneratePins(
  context: PinContext,
  options: RegenerateOptions,
): Promise<RegenerateResult> {
  const { packageManager: pm, onStep } = options;

  onStep?.('check');
  if (!(await pm.isAvailable())) {
    throw new ToolNotFoundError(pm.name, pm.executable);
  }
  if (!(await exists(context.manifestPath))) {
    throw new ManifestNotFoundError(context.manifestPath);
  }

  // A stale lock would make the next lock incremental
  await rm(context.lockFilePath, { force: true });

  const scope = new CleanupScope({
    onError: options.onCleanupError,
    signals: options.signalSource,
  });
  scope.track(context.lockFilePath);
  scope.listen();

  try {
    onStep?.('lock');
    const locked = await scope.run((signal) => pm.lock(context.workDir, signal));
    options.onToolOutput?.('lock', locked);

    scope.throwIfInterrupted();
    const exportDir = await mkdtemp(join(options.tempDir ?? tmpdir(), 'pin-export-'));
    scope.track(exportDir);
    const exportPath = join(exportDir, 'requirements.txt');

    onStep?.('export');
    const exported = await scope.run((signal) =>
      pm.exportRequirements(context.workDir, exportPath, signal),
    );
    options.onToolOutput?.('export', exported);

    scope.throwIfInterrupted();
    onStep?.('filter');
    const filtered = filterLocalPackages(await readFile(exportPath, 'utf-8'), options.filter);
    await writeFile(exportPath, filtered.content, 'utf-8');

    scope.throwIfInterrupted();
    onStep?.('write');
    const header = renderHeader({
      generatorPath: context.generatorPath,
      manifestPath: context.manifestDisplayPath,
    });
    // Renamed over the output once complete
    const pendingOutput = `${context.outputPath}.tmp`;
    scope.track(pendingOutput);
    await writeFile(pendingOutput, header + (await readFile(exportPath, 'utf-8')), 'utf-8');
    await rename(pendingOutput, context.outputPath);

    return {
      outputPath: context.outputPath,
      kept: filtered.kept,
      removed: filtered.removed,
    };
  } finally {
    await scope.dispose();
  }
}
