import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

/**
 * 讀取整個串流直到結束，回傳所有行（不含換行字元）
 */
export async function readLines(input: Readable): Promise<string[]> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines: string[] = [];

  for await (const line of rl) {
    lines.push(line);
  }

  return lines;
}
