/**
 * CLI 選項
 */
export interface CliOptions {
  verbose: boolean;
  binary: string;
  dryRun: boolean;
}

/**
 * 單行 grep 匹配結果
 */
export interface MatchLine {
  filePath: string;
  /** 1-based 行號 */
  lineNumber: number;
}

/**
 * 檔案路徑 → 需要重新格式化的行號（依出現順序，保留重複）
 */
export type EditRequest = Map<string, number[]>;

/**
 * 外部指令呼叫
 */
export interface CommandInvocation {
  /** args[0] 為執行檔名稱或路徑 */
  args: string[];
  stdin?: string;
  cwd?: string;
}

/**
 * 外部指令執行結果
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
