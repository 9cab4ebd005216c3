import { Command } from 'commander';
import type { CliOptions } from '../core/types.ts';

/**
 * 每次解析都建立新的 program，避免 Commander 在多次 parse 之間保留選項值
 */
function createProgram(): Command {
  return new Command()
    .name('format-matches')
    .description('Reformat only the lines reported by `grep -n` (read from stdin) with clang-format')
    .version('0.1.0')
    .allowExcessArguments(false)
    .option('-v, --verbose', 'Print a notice for every file formatted or skipped', false)
    .option('--binary <path>', 'Formatter executable name or path', 'clang-format')
    .option('-n, --dry-run', 'Print the formatter commands instead of running them', false);
}

/**
 * 解析 CLI 參數
 */
export function parseArgs(args: string[]): CliOptions {
  const program = createProgram();
  program.parse(args);

  const opts = program.opts();
  const binary: unknown = opts.binary;

  // 驗證 formatter 執行檔
  if (typeof binary !== 'string' || !binary) {
    console.error('Error: --binary requires a non-empty executable name or path.');
    process.exit(1);
  }

  return {
    verbose: opts.verbose === true,
    binary,
    dryRun: opts.dryRun === true,
  };
}
