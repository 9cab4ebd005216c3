/**
 * clang-format 支援的副檔名（小寫、不含 '.'）
 */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  'cpp',
  'cc',
  'c++',
  'cxx',
  'hpp',
  'c',
  'h',
  'inc',
  'cl',
  'm',
  'mm',
  'js',
  'ts',
  'proto',
]);

/**
 * 取得最後一個路徑片段中最後一個 '.' 之後的字串，沒有則回傳 ''
 */
export function getExtension(filePath: string): string {
  const filename = filePath.split(/[\\/]/).pop() || '';
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return '';
  return filename.slice(dot + 1);
}

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(getExtension(filePath).toLowerCase());
}
