/**
 * 行範圍格式化器介面
 */
export interface LineFormatter {
  /**
   * 只重新格式化 filePath 中指定的行（原地修改）
   */
  formatLines(filePath: string, lines: readonly number[]): void;
}
