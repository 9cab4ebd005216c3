import { InputSyntaxError } from './errors.ts';
import type { EditRequest, MatchLine } from './types.ts';

const DIGITS = /^\d+$/;

/**
 * 解析單行 grep -n 輸出: "<file>:<line>:<text>"
 * text 本身可能含有 ':'，所以只檢查前兩段
 */
export function parseMatchLine(rawLine: string): MatchLine {
  const line = rawLine.replace(/[\r\n]+$/, '');
  const parts = line.split(':');

  if (parts.length < 3) throw new InputSyntaxError(rawLine);

  const [filePath = '', lineField = ''] = parts;
  if (!filePath) throw new InputSyntaxError(rawLine);
  if (!DIGITS.test(lineField)) throw new InputSyntaxError(rawLine);

  const lineNumber = Number.parseInt(lineField, 10);
  // 行號從 1 開始，且必須能精確表示
  if (lineNumber < 1 || !Number.isSafeInteger(lineNumber)) throw new InputSyntaxError(rawLine);

  return { filePath, lineNumber };
}

/**
 * 把所有匹配行依檔案分組
 * 任何一行格式錯誤就整體失敗
 */
export function parseMatches(lines: Iterable<string>): EditRequest {
  const request: EditRequest = new Map();

  for (const line of lines) {
    const { filePath, lineNumber } = parseMatchLine(line);
    const existing = request.get(filePath);
    if (existing) {
      existing.push(lineNumber);
    } else {
      request.set(filePath, [lineNumber]);
    }
  }

  return request;
}
