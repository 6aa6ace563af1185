import { execFile } from 'node:child_process';
import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import { delimiter, isAbsolute, join, resolve, sep } from 'node:path';

export interface CommandResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the child; the promise settles once it has exited. */
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions,
) => Promise<CommandResult>;

/**
 * Operations the pin updater needs from an external package manager.
 * Implementations run the tool to completion before resolving.
 */
export interface PackageManager {
  /** Tool name shown to the user. */
  readonly name: string;
  /** Command used to launch the tool, as configured. */
  readonly executable: string;
  readonly manifestFile: string;
  readonly lockFile: string;
  isAvailable(): Promise<boolean>;
  lock(cwd: string, signal?: AbortSignal): Promise<CommandResult>;
  /** Render the lock file as `name==version` lines, without hashes, into `target`. */
  exportRequirements(cwd: string, target: string, signal?: AbortSignal): Promise<CommandResult>;
}

export class ToolNotFoundError extends Error {
  constructor(
    public readonly tool: string,
    public readonly executable: string = tool,
  ) {
    const missing = executable === tool ? '' : ` (${executable} was not found)`;
    super(
      `Please install ${tool}${missing}.\n` +
        "You may need to recreate the project's virtual environment and activate it.",
    );
    this.name = 'ToolNotFoundError';
  }
}

export class ToolCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(
      `\`${command}\` failed with exit code ${exitCode}` + (detail ? `:\n${detail}` : '.'),
    );
    this.name = 'ToolCommandError';
  }
}

// Lock files of large projects produce a lot of resolver output.
const MAX_BUFFER = 64 * 1024 * 1024;

export function runCommand(
  command: string,
  args: string[],
  options: RunOptions,
): Promise<CommandResult> {
  return new Promise((resolvePromise, reject) => {
    const child = execFile(
      command,
      args,
      {
        cwd: options.cwd,
        env: options.env,
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER,
        signal: options.signal,
      },
      (error, stdout, stderr) => {
        if (error?.name === 'AbortError') {
          // The callback fires as soon as the kill is sent, before the child is gone
          if (child.exitCode !== null || child.signalCode !== null) {
            reject(error);
          } else {
            child.once('exit', () => reject(error));
          }
          return;
        }
        if (!error) {
          resolvePromise({ exitCode: 0, signal: null, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolvePromise({ exitCode: error.code, signal: null, stdout, stderr });
          return;
        }
        if (error.signal) {
          resolvePromise({ exitCode: 1, signal: error.signal, stdout, stderr });
          return;
        }
        // Spawn failure (ENOENT, EACCES): the process never ran
        reject(error);
      },
    );
  });
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const s = await stat(path);
    if (!s.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve `command` the way a shell would: directly when it contains a path
 * separator, otherwise against each PATH entry in order.
 */
export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | null> {
  const extensions =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
      : [''];

  if (command.includes('/') || command.includes(sep) || isAbsolute(command)) {
    for (const ext of extensions) {
      const candidate = resolve(command + ext);
      if (await isExecutableFile(candidate)) return candidate;
    }
    return null;
  }

  const pathValue = env.PATH ?? env.Path ?? '';
  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }

  return null;
}

export interface PoetryOptions {
  executable?: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

export class PoetryPackageManager implements PackageManager {
  readonly name = 'poetry';
  readonly manifestFile = 'pyproject.toml';
  readonly lockFile = 'poetry.lock';

  readonly executable: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runner: CommandRunner;

  constructor(options: PoetryOptions = {}) {
    this.executable = options.executable ?? 'poetry';
    this.env = options.env ?? process.env;
    this.runner = options.runner ?? runCommand;
  }

  async isAvailable(): Promise<boolean> {
    return (await findExecutable(this.executable, this.env)) !== null;
  }

  lock(cwd: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.run(['lock'], cwd, signal);
  }

  exportRequirements(cwd: string, target: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.run(['export', '-o', target, '--without-hashes'], cwd, signal);
  }

  private async run(args: string[], cwd: string, signal?: AbortSignal): Promise<CommandResult> {
    const result = await this.runner(this.executable, args, { cwd, env: this.env, signal });
    if (result.exitCode !== 0) {
      throw new ToolCommandError(
        [this.name, ...args].join(' '),
        result.exitCode,
        result.stderr,
      );
    }
    return result;
  }
}
