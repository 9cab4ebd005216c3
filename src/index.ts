#!/usr/bin/env tsx
import chalk from 'chalk';
import { parseArgs } from './cli/parser.ts';
import { run } from './core/orchestrator.ts';

async function main(): Promise<void> {
  const options = parseArgs(process.argv);

  if (process.stdin.isTTY) {
    console.error(chalk.gray('Reading matches from stdin (e.g. `grep -n PATTERN *.cpp | format-matches`)...'));
  }

  const exitCode = await run(process.stdin, options);
  process.exit(exitCode);
}

main().catch((error) => {
  console.error(chalk.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
