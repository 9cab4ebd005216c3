import { describe, test, expect } from 'vitest';
import { parseMatchLine, parseMatches } from '../../src/core/match-parser';
import { InputSyntaxError } from '../../src/core/errors';

function catchSyntaxError(fn: () => unknown): InputSyntaxError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InputSyntaxError) return error;
    throw error;
  }
  throw new Error('expected InputSyntaxError');
}

describe('parseMatchLine', () => {
  test('parses file and line number', () => {
    expect(parseMatchLine('f.cpp:3:anything')).toEqual({ filePath: 'f.cpp', lineNumber: 3 });
  });

  test('content may contain colons', () => {
    expect(parseMatchLine('src/a.ts:12:const x = { a: 1 }; // b:c')).toEqual({
      filePath: 'src/a.ts',
      lineNumber: 12,
    });
  });

  test('empty content is allowed', () => {
    expect(parseMatchLine('f.cpp:3:')).toEqual({ filePath: 'f.cpp', lineNumber: 3 });
  });

  test('strips trailing newline', () => {
    expect(parseMatchLine('f.cpp:42:x\r\n')).toEqual({ filePath: 'f.cpp', lineNumber: 42 });
  });

  describe('syntax errors', () => {
    test('fewer than two colons', () => {
      expect(catchSyntaxError(() => parseMatchLine('nofile')).line).toBe('nofile');
      expect(catchSyntaxError(() => parseMatchLine('f.cpp:3')).line).toBe('f.cpp:3');
    });

    test('blank line is rejected', () => {
      expect(catchSyntaxError(() => parseMatchLine('')).line).toBe('');
    });

    test('empty file name', () => {
      expect(catchSyntaxError(() => parseMatchLine(':3:x')).line).toBe(':3:x');
    });

    test('non-numeric line number', () => {
      const error = catchSyntaxError(() => parseMatchLine('f.cpp:abc:text'));
      expect(error.line).toBe('f.cpp:abc:text');
      expect(error.kind).toBe('input-syntax');
      expect(error.message).toBe('Invalid match line: "f.cpp:abc:text"');
    });

    test('signed or padded line numbers', () => {
      expect(() => parseMatchLine('f.cpp:-3:x')).toThrow(InputSyntaxError);
      expect(() => parseMatchLine('f.cpp: 3:x')).toThrow(InputSyntaxError);
      expect(() => parseMatchLine('f.cpp::x')).toThrow(InputSyntaxError);
    });

    test('line number 0', () => {
      expect(() => parseMatchLine('f.cpp:0:x')).toThrow(InputSyntaxError);
    });

    test('line number too large to represent exactly', () => {
      const error = catchSyntaxError(() => parseMatchLine('f.cpp:99999999999999999999999:x'));
      expect(error.line).toBe('f.cpp:99999999999999999999999:x');
      expect(() => parseMatchLine('f.cpp:9007199254740992:x')).toThrow(InputSyntaxError);
    });

    test('largest exact line number is accepted', () => {
      expect(parseMatchLine('f.cpp:9007199254740991:x').lineNumber).toBe(9007199254740991);
    });
  });
});

describe('parseMatches', () => {
  test('groups line numbers by file', () => {
    const request = parseMatches(['f.cpp:3:anything']);
    expect([...request]).toEqual([['f.cpp', [3]]]);
  });

  test('keeps duplicates in encounter order', () => {
    const request = parseMatches(['f.cpp:3:x', 'f.cpp:3:y', 'f.cpp:7:z']);
    expect(request.get('f.cpp')).toEqual([3, 3, 7]);
  });

  test('preserves first-seen file order', () => {
    const request = parseMatches(['b.h:9:x', 'a.cpp:1:y', 'b.h:2:z', 'c.py:5:w']);
    expect([...request.keys()]).toEqual(['b.h', 'a.cpp', 'c.py']);
    expect(request.get('b.h')).toEqual([9, 2]);
  });

  test('empty input yields empty request', () => {
    expect(parseMatches([]).size).toBe(0);
  });

  test('fails on the first malformed line', () => {
    const error = catchSyntaxError(() =>
      parseMatches(['good.c:1:x  ', 'bad.c:notanumber:y', 'worse'])
    );
    expect(error.line).toBe('bad.c:notanumber:y');
  });
});
