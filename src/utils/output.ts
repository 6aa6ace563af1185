import chalk from 'chalk';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function label(text: string): string {
  return chalk.dim(text);
}

export function value(text: string): string {
  return chalk.cyan(text);
}

/** Indent every line of a block of tool output under a step. */
export function indent(text: string, prefix = '    '): string {
  return text
    .trimEnd()
    .split('\n')
    .map((line) => prefix + line)
    .join('\n');
}
