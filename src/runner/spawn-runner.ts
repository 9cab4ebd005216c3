import { spawnSync } from 'node:child_process';
import { constants } from 'node:os';
import type { CommandInvocation, CommandResult } from '../core/types.ts';
import { ChildProcessError, ExecutionEnvironmentError } from '../core/errors.ts';
import type { CommandRunner } from './command-runner.interface.ts';

/**
 * 以 spawnSync 執行外部指令（不經過 shell）
 */
export class SpawnCommandRunner implements CommandRunner {
  run(invocation: CommandInvocation): CommandResult {
    const [command, ...args] = invocation.args;
    if (command === undefined) {
      throw new TypeError('Command invocation requires at least one argument');
    }

    const result = spawnSync(command, args, {
      input: invocation.stdin,
      cwd: invocation.cwd,
      encoding: 'utf8',
    });

    if (result.error) {
      const code = 'code' in result.error ? result.error.code : undefined;
      if (code === 'ENOENT') {
        throw new ExecutionEnvironmentError('executable-missing', command);
      }
      if (code === 'EACCES') {
        throw new ExecutionEnvironmentError('permission-denied', command);
      }
      throw result.error;
    }

    const stdout = result.stdout ?? '';
    const stderr = result.stderr ?? '';
    const exitCode = result.status ?? signalExitCode(result.signal);

    if (exitCode !== 0) {
      throw new ChildProcessError(invocation.args, exitCode, stdout, stderr);
    }

    return { stdout, stderr, exitCode };
  }
}

/**
 * 被信號終止時依 shell 慣例回傳 128 + 信號編號
 */
function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + constants.signals[signal];
}
