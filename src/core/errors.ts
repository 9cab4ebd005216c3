/**
 * 輸入格式錯誤（不是 grep -n 的輸出）
 */
export class InputSyntaxError extends Error {
  readonly kind = 'input-syntax' as const;
  readonly line: string;

  constructor(line: string) {
    super(`Invalid match line: "${line}"`);
    this.name = 'InputSyntaxError';
    this.line = line;
  }
}

export type EnvironmentFailure = 'executable-missing' | 'permission-denied';

/**
 * 外部執行檔不存在或無法執行
 */
export class ExecutionEnvironmentError extends Error {
  readonly kind = 'execution-environment' as const;
  readonly reason: EnvironmentFailure;
  readonly command: string;

  constructor(reason: EnvironmentFailure, command: string) {
    const label = reason === 'executable-missing' ? 'executable missing' : 'permission denied';
    super(`${label}: ${command}`);
    this.name = 'ExecutionEnvironmentError';
    this.reason = reason;
    this.command = command;
  }
}

/**
 * 外部指令執行了，但以非 0 狀態結束
 */
export class ChildProcessError extends Error {
  readonly kind = 'child-process' as const;
  readonly command: string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string[], exitCode: number, stdout: string, stderr: string) {
    super(`Command failed with exit code ${exitCode}: ${command.join(' ')}`);
    this.name = 'ChildProcessError';
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export type FormatMatchesError = InputSyntaxError | ExecutionEnvironmentError | ChildProcessError;

export function isFormatMatchesError(error: unknown): error is FormatMatchesError {
  return (
    error instanceof InputSyntaxError ||
    error instanceof ExecutionEnvironmentError ||
    error instanceof ChildProcessError
  );
}
