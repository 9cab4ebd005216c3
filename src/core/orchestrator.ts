import type { Readable } from 'node:stream';
import chalk from 'chalk';
import type { CliOptions, EditRequest } from './types.ts';
import { isFormatMatchesError, type FormatMatchesError } from './errors.ts';
import { isSupportedFile } from './file-type.ts';
import { readLines } from './line-reader.ts';
import { parseMatches } from './match-parser.ts';
import type { CommandRunner } from '../runner/command-runner.interface.ts';
import { SpawnCommandRunner } from '../runner/spawn-runner.ts';
import type { LineFormatter } from '../formatters/formatter.interface.ts';
import { ClangFormatFormatter } from '../formatters/clang-format-formatter.ts';
import { DryRunFormatter } from '../formatters/dry-run-formatter.ts';

/**
 * 依檔案出現順序逐一格式化
 * 不支援的副檔名直接略過；格式化失敗則立即中止
 */
export function formatEditRequest(
  request: EditRequest,
  formatter: LineFormatter,
  options: { verbose: boolean }
): void {
  for (const [filePath, lines] of request) {
    if (!isSupportedFile(filePath)) {
      if (options.verbose) {
        console.log(chalk.gray(`Skipping ${filePath}: unsupported file type`));
      }
      continue;
    }

    formatter.formatLines(filePath, lines);
  }
}

/**
 * 輸出錯誤訊息並回傳對應的 exit code
 */
export function reportError(error: FormatMatchesError): number {
  switch (error.kind) {
    case 'input-syntax':
      console.error(chalk.red(`Syntax error in input line: "${error.line}"`));
      console.error(
        chalk.yellow('Hint: input must be line-numbered search output, e.g. `grep -n`')
      );
      return 1;
    case 'execution-environment':
      console.error(chalk.red(`Error: ${error.message}`));
      return 1;
    case 'child-process':
      // 外部工具的 stderr 原樣輸出
      process.stderr.write(error.stderr);
      return error.exitCode;
  }
}

/**
 * 讀取全部輸入、解析後再開始格式化
 */
export async function run(
  input: Readable,
  options: CliOptions,
  runner: CommandRunner = new SpawnCommandRunner()
): Promise<number> {
  const lines = await readLines(input);

  try {
    const request = parseMatches(lines);

    const formatter: LineFormatter = options.dryRun
      ? new DryRunFormatter(options.binary)
      : new ClangFormatFormatter({ binary: options.binary, verbose: options.verbose, runner });

    formatEditRequest(request, formatter, { verbose: options.verbose });
    return 0;
  } catch (error) {
    if (isFormatMatchesError(error)) {
      return reportError(error);
    }
    throw error;
  }
}
