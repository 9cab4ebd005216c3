/**
 * 建立 clang-format 指令
 * 每個行號對應一個 --lines=N:N，依出現順序、不去重
 */
export function buildFormatCommand(
  binary: string,
  filePath: string,
  lines: readonly number[]
): string[] {
  return [binary, '-i', ...lines.map((line) => `--lines=${line}:${line}`), filePath];
}

/**
 * 把參數組成可貼到 shell 的字串
 */
export function quoteCommand(args: readonly string[]): string {
  return args.map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
