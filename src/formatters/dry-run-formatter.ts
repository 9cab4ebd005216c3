import type { LineFormatter } from './formatter.interface.ts';
import { buildFormatCommand, quoteCommand } from './format-command.ts';

/**
 * 只印出將會執行的指令，不修改任何檔案
 */
export class DryRunFormatter implements LineFormatter {
  private binary: string;

  constructor(binary: string) {
    this.binary = binary;
  }

  formatLines(filePath: string, lines: readonly number[]): void {
    console.log(quoteCommand(buildFormatCommand(this.binary, filePath, lines)));
  }
}
