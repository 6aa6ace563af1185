import chalk from 'chalk';
import ora from 'ora';
import { loadPinConfig } from '../core/config-loader.js';
import { PoetryPackageManager } from '../core/package-manager.js';
import { regeneratePins } from '../core/pin-updater.js';
import { getPackageRoot, resolvePinContext } from '../utils/paths.js';
import { icons, indent, label, value } from '../utils/output.js';
import type { PackageManager } from '../core/package-manager.js';
import type { PinStep, RegenerateResult } from '../core/pin-updater.js';

export interface PinOptions {
  config?: string;
  noEnv?: boolean;
  verbose?: boolean;
  /** Directory holding the manifest. Defaults to this package's root. */
  workDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Overrides the configured Poetry executable. */
  packageManager?: PackageManager;
}

function stepLabel(step: PinStep, toolName: string, output: string): string {
  switch (step) {
    case 'check':
      return `Checking for ${toolName}...`;
    case 'lock':
      return 'Locking dependencies...';
    case 'export':
      return 'Exporting lock file...';
    case 'filter':
      return 'Removing local packages...';
    case 'write':
      return `Writing ${output}...`;
  }
}

export async function pin(options: PinOptions = {}): Promise<RegenerateResult> {
  const workDir = options.workDir ?? getPackageRoot();
  const env = options.env ?? process.env;
  const { config, sources, configPath } = await loadPinConfig(workDir, {
    configPath: options.config,
    noEnv: options.noEnv,
    env,
  });

  const packageManager =
    options.packageManager ?? new PoetryPackageManager({ executable: config.tool, env });
  const context = resolvePinContext(workDir, config, packageManager);

  if (options.verbose) {
    console.log(`  ${label('Config:')}   ${configPath ? value(configPath) : label('(defaults)')}`);
    for (const [key, source] of Object.entries(sources)) {
      console.log(`  ${label(`${key}:`)} ${source}`);
    }
  }

  const toolOutput: string[] = [];
  const spinner = ora(stepLabel('check', packageManager.name, context.outputDisplayPath)).start();

  let result: RegenerateResult;
  try {
    result = await regeneratePins(context, {
      packageManager,
      filter: {
        exclude: config.exclude,
        stripPathDependencies: config.stripPathDependencies,
      },
      onStep: (step) => {
        spinner.text = stepLabel(step, packageManager.name, context.outputDisplayPath);
      },
      onToolOutput: (step, commandResult) => {
        if (options.verbose && commandResult.stdout.trim()) {
          toolOutput.push(`${label(`${packageManager.name} ${step}:`)}\n${indent(commandResult.stdout)}`);
        }
      },
    });
  } catch (err) {
    spinner.fail(`Failed to update ${context.outputDisplayPath}`);
    throw err;
  }

  spinner.succeed(`Updated ${value(context.outputDisplayPath)}`);
  for (const block of toolOutput) {
    console.log(block);
  }
  console.log(`  ${label('Pinned:')}   ${result.kept} packages`);
  if (result.removed.length > 0) {
    console.log(`  ${label('Stripped:')} ${result.removed.join(', ')}`);
  } else {
    console.log(`  ${icons.info} ${chalk.dim('No local packages found in the export.')}`);
  }

  return result;
}
