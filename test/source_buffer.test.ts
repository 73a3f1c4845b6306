import { describe, expect, it } from 'vitest';

import { SourceBuffer, SourceLine } from '../src/diagnostics/source_buffer.js';

describe('source buffer', () => {
  it('splits lines with offsets, lengths and 1-based numbers', () => {
    const lines = new SourceBuffer('ab\ncd\n').getLines();
    expect(lines.map((l) => [l.offset, l.len, l.line, l.source])).toEqual([
      [0, 2, 1, 'ab'],
      [3, 2, 2, 'cd'],
      [6, 0, 3, ''],
    ]);
  });

  it('finds the line containing an offset, including its end', () => {
    const buffer = new SourceBuffer('ab\ncd\n');
    expect(buffer.getLineAt(0)?.line).toBe(1);
    expect(buffer.getLineAt(2)?.line).toBe(1);
    expect(buffer.getLineAt(3)?.line).toBe(2);
    expect(buffer.getLineAt(6)?.line).toBe(3);
    expect(buffer.getLineAt(7)).toBeUndefined();
  });

  it('returns the raw text', () => {
    expect(new SourceBuffer('x = 1').get()).toBe('x = 1');
  });
});

describe('source line', () => {
  const line = new SourceLine(10, 4, '    call(x);  ');

  it('trims surrounding whitespace and reports the leading cut', () => {
    expect(line.trim()).toEqual({ text: 'call(x);', leading: 4 });
  });

  it('measures offsets relative to the line', () => {
    expect(line.offsetRelative({ start: 19, end: 20 })).toEqual({ start: 9, end: 10 });
    expect(line.offsetMax()).toBe(24);
  });

  it('counts spaces from the trimmed start', () => {
    expect(line.spacesUntil({ start: 19, end: 20 })).toBe(5);
    expect(line.spacesUntil({ start: 11, end: 12 })).toBe(0);
  });
});
