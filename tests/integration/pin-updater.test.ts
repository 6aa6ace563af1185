import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { EventEmitter } from 'node:events';
import { ManifestNotFoundError, regeneratePins } from '../../src/core/pin-updater.js';
import {
  PoetryPackageManager,
  runCommand,
  ToolCommandError,
  ToolNotFoundError,
} from '../../src/core/package-manager.js';
import { InterruptedError } from '../../src/utils/cleanup.js';
import { renderHeader } from '../../src/core/requirements-header.js';
import { resolvePinContext } from '../../src/utils/paths.js';
import type { CommandRunner } from '../../src/core/package-manager.js';
import type { PinStep } from '../../src/core/pin-updater.js';
import type { PinContext } from '../../src/utils/paths.js';
import { FakePackageManager } from '../helpers/fake-package-manager.js';

const FILTER = { exclude: ['acme', '*certbot*'], stripPathDependencies: true };

const EXPORT_WITH_LOCAL = [
  'acme @ file:///repo/acme ; python_version >= "3.9"',
  'certbot @ file:///repo/certbot ; python_version >= "3.9"',
  'certbot-dns-cloudflare @ file:///repo/certbot-dns-cloudflare ; python_version >= "3.9"',
  'certifi==2024.2.2 ; python_version >= "3.9"',
  'requests==2.31.0 ; python_version >= "3.9"',
  'urllib3==2.2.1 ; python_version >= "3.9"',
  '',
].join('\n');

const EXTERNAL_ONLY = [
  'certifi==2024.2.2 ; python_version >= "3.9"',
  'requests==2.31.0 ; python_version >= "3.9"',
  '',
].join('\n');

const HEADER = renderHeader({
  generatorPath: 'tools/pinning/src/index.ts',
  manifestPath: 'tools/pinning/pyproject.toml',
});

let repoRoot: string;
let exportParent: string;
let context: PinContext;

beforeEach(async () => {
  repoRoot = await mkdtemp(join(tmpdir(), 'pin-updater-test-'));
  const workDir = join(repoRoot, 'tools', 'pinning');
  await mkdir(workDir, { recursive: true });
  await writeFile(join(workDir, 'pyproject.toml'), '[tool.poetry]\nname = "pinning"\n');
  exportParent = join(repoRoot, 'tmp');
  await mkdir(exportParent);

  context = resolvePinContext(
    workDir,
    { repoRoot: '../..', output: 'tools/requirements.txt' },
    { manifestFile: 'pyproject.toml', lockFile: 'poetry.lock' },
  );
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(repoRoot, { recursive: true, force: true });
});

async function run(pm: FakePackageManager, steps?: PinStep[]) {
  return regeneratePins(context, {
    packageManager: pm,
    filter: FILTER,
    tempDir: exportParent,
    onStep: steps ? (step) => steps.push(step) : undefined,
  });
}

describe('regeneratePins', () => {
  it('writes the header and the export without local packages', async () => {
    const pm = new FakePackageManager({ exportContent: EXPORT_WITH_LOCAL });

    const result = await run(pm);

    expect(await readFile(context.outputPath, 'utf-8')).toBe(
      HEADER +
        'certifi==2024.2.2 ; python_version >= "3.9"\n' +
        'requests==2.31.0 ; python_version >= "3.9"\n' +
        'urllib3==2.2.1 ; python_version >= "3.9"\n',
    );
    expect(result).toEqual({
      outputPath: join(repoRoot, 'tools', 'requirements.txt'),
      kept: 3,
      removed: ['acme', 'certbot', 'certbot-dns-cloudflare'],
    });
  });

  it('copies an external-only export verbatim after the header', async () => {
    const pm = new FakePackageManager({ exportContent: EXTERNAL_ONLY });

    await run(pm);

    expect(await readFile(context.outputPath, 'utf-8')).toBe(HEADER + EXTERNAL_ONLY);
  });

  it('runs the steps in order', async () => {
    const pm = new FakePackageManager({ exportContent: EXTERNAL_ONLY });
    const steps: PinStep[] = [];

    await run(pm, steps);

    expect(steps).toEqual(['check', 'lock', 'export', 'filter', 'write']);
    expect(pm.calls).toEqual(['isAvailable', 'lock', 'export']);
  });

  it('deletes a stale lock file before locking', async () => {
    await writeFile(context.lockFilePath, '# stale\n');
    const pm = new FakePackageManager({ exportContent: EXTERNAL_ONLY });

    await run(pm);

    expect(pm.lockFilePresentBeforeLock).toBe(false);
  });

  it('leaves no lock file or export behind', async () => {
    const pm = new FakePackageManager({ exportContent: EXPORT_WITH_LOCAL });

    await run(pm);

    expect(existsSync(context.lockFilePath)).toBe(false);
    expect(existsSync(pm.exportTargets[0])).toBe(false);
    expect(await readdir(exportParent)).toEqual([]);
    expect(existsSync(`${context.outputPath}.tmp`)).toBe(false);
  });

  it('keeps the previous output when writing the new one fails', async () => {
    await writeFile(context.outputPath, 'previous\n');
    // A directory in the way of the pending output makes the write fail
    await mkdir(`${context.outputPath}.tmp`);
    const pm = new FakePackageManager({ exportContent: EXTERNAL_ONLY });

    await expect(run(pm)).rejects.toMatchObject({ code: 'EISDIR' });

    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
    expect(existsSync(`${context.outputPath}.tmp`)).toBe(false);
    expect(existsSync(context.lockFilePath)).toBe(false);
  });

  it('produces byte-identical output on repeated runs', async () => {
    await run(new FakePackageManager({ exportContent: EXPORT_WITH_LOCAL }));
    const first = await readFile(context.outputPath);

    await run(new FakePackageManager({ exportContent: EXPORT_WITH_LOCAL }));
    const second = await readFile(context.outputPath);

    expect(second.equals(first)).toBe(true);
  });

  it('uses a fresh export file on every run', async () => {
    const pm = new FakePackageManager({ exportContent: EXTERNAL_ONLY });

    await run(pm);
    await run(pm);

    expect(pm.exportTargets).toHaveLength(2);
    expect(pm.exportTargets[0]).not.toBe(pm.exportTargets[1]);
  });

  it('touches nothing when the package manager is missing', async () => {
    await writeFile(context.outputPath, 'previous\n');
    await writeFile(context.lockFilePath, '# existing\n');
    const pm = new FakePackageManager({ available: false });

    await expect(run(pm)).rejects.toThrow(ToolNotFoundError);

    expect(pm.calls).toEqual(['isAvailable']);
    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
    expect(await readFile(context.lockFilePath, 'utf-8')).toBe('# existing\n');
  });

  it('names the configured executable when it is missing', async () => {
    const pm = new FakePackageManager({ available: false, executable: '/opt/poetry/bin/poetry' });

    await expect(run(pm)).rejects.toThrow(
      'Please install poetry (/opt/poetry/bin/poetry was not found).',
    );
  });

  it('touches nothing when the manifest is missing', async () => {
    await rm(context.manifestPath);
    await writeFile(context.lockFilePath, '# existing\n');
    const pm = new FakePackageManager();

    await expect(run(pm)).rejects.toThrow(ManifestNotFoundError);

    expect(pm.calls).toEqual(['isAvailable']);
    expect(await readFile(context.lockFilePath, 'utf-8')).toBe('# existing\n');
  });

  it('propagates a lock failure and still cleans up', async () => {
    await writeFile(context.outputPath, 'previous\n');
    const pm = new FakePackageManager({
      lockFailure: { exitCode: 2, stderr: 'Because certbot depends on requests (>=3) ...' },
    });

    await expect(run(pm)).rejects.toMatchObject({ name: 'ToolCommandError', exitCode: 2 });

    expect(pm.calls).toEqual(['isAvailable', 'lock']);
    expect(existsSync(context.lockFilePath)).toBe(false);
    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
  });

  it('propagates an export failure and still cleans up', async () => {
    await writeFile(context.outputPath, 'previous\n');
    const pm = new FakePackageManager({
      exportFailure: { exitCode: 1, stderr: 'The command "export" does not exist.' },
    });

    await expect(run(pm)).rejects.toThrow(ToolCommandError);

    expect(existsSync(context.lockFilePath)).toBe(false);
    expect(await readdir(exportParent)).toEqual([]);
    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
  });

  it('releases its signal handlers whatever the outcome', async () => {
    const before = process.listenerCount('SIGINT');

    await run(new FakePackageManager({ exportContent: EXTERNAL_ONLY }));
    await run(
      new FakePackageManager({ lockFailure: { exitCode: 1, stderr: '' } }),
    ).catch(() => undefined);

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});

// Child processes standing in for Poetry. The hanging one keeps writing its
// target for a moment after SIGTERM, as a tool flushing on shutdown would.
const FINISH = "require('node:fs').writeFileSync(process.argv[1], 'written\\n');";
const HANG_UNTIL_KILLED = [
  "const fs = require('node:fs');",
  "process.on('SIGTERM', () => setTimeout(() => { fs.writeFileSync(process.argv[1], 'flushed\\n'); process.exit(0); }, 200));",
  "fs.writeFileSync(process.argv[1], 'partial\\n');",
  'setInterval(() => {}, 1000);',
].join('\n');

function childPoetry(hangOn: 'lock' | 'export'): PoetryPackageManager {
  const runner: CommandRunner = (command, args, options) => {
    const target = args[0] === 'export' ? args[2] : join(options.cwd, 'poetry.lock');
    const script = args[0] === hangOn ? HANG_UNTIL_KILLED : FINISH;
    return runCommand(command, ['-e', script, target], options);
  };
  return new PoetryPackageManager({ executable: process.execPath, env: process.env, runner });
}

describe('regeneratePins when interrupted', () => {
  async function interruptDuring(hangOn: 'lock' | 'export', started: () => Promise<boolean>) {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await writeFile(context.outputPath, 'previous\n');
    const signals = new EventEmitter();

    const outcome = regeneratePins(context, {
      packageManager: childPoetry(hangOn),
      filter: FILTER,
      tempDir: exportParent,
      signalSource: signals,
    }).catch((err: unknown) => err);

    await vi.waitFor(
      async () => {
        if (!(await started())) throw new Error(`${hangOn} not started`);
      },
      { timeout: 10_000, interval: 20 },
    );
    signals.emit('SIGINT');

    const err = await outcome;
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(130));
    return err;
  }

  it('stops the lock and leaves no lock file behind', async () => {
    const err = await interruptDuring('lock', async () => existsSync(context.lockFilePath));

    expect(err).toBeInstanceOf(InterruptedError);
    expect(err).toMatchObject({ signal: 'SIGINT', exitCode: 130 });
    expect(existsSync(context.lockFilePath)).toBe(false);
    expect(await readdir(exportParent)).toEqual([]);
    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
  });

  it('stops the export and leaves no lock file or export dir behind', async () => {
    const err = await interruptDuring('export', async () => {
      const [dir] = await readdir(exportParent);
      return dir !== undefined && existsSync(join(exportParent, dir, 'requirements.txt'));
    });

    expect(err).toBeInstanceOf(InterruptedError);
    expect(existsSync(context.lockFilePath)).toBe(false);
    expect(await readdir(exportParent)).toEqual([]);
    expect(await readFile(context.outputPath, 'utf-8')).toBe('previous\n');
  });
});
