import chalk from 'chalk';
import type { CommandRunner } from '../runner/command-runner.interface.ts';
import type { LineFormatter } from './formatter.interface.ts';
import { buildFormatCommand } from './format-command.ts';

export interface ClangFormatOptions {
  binary: string;
  verbose: boolean;
  runner: CommandRunner;
}

/**
 * 呼叫 clang-format 原地格式化指定行
 */
export class ClangFormatFormatter implements LineFormatter {
  private binary: string;
  private verbose: boolean;
  private runner: CommandRunner;

  constructor(options: ClangFormatOptions) {
    this.binary = options.binary;
    this.verbose = options.verbose;
    this.runner = options.runner;
  }

  formatLines(filePath: string, lines: readonly number[]): void {
    if (this.verbose) {
      const noun = lines.length === 1 ? 'line' : 'lines';
      console.log(chalk.gray(`Formatting ${filePath} (${lines.length} ${noun})`));
    }

    this.runner.run({ args: buildFormatCommand(this.binary, filePath, lines) });
  }
}
