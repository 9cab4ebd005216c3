import type { CommandInvocation, CommandResult } from '../core/types.ts';

/**
 * 外部指令執行器介面
 */
export interface CommandRunner {
  /**
   * 同步執行指令；非 0 結束時拋出 ChildProcessError，
   * 執行檔不存在或無權限時拋出 ExecutionEnvironmentError
   */
  run(invocation: CommandInvocation): CommandResult;
}
