import { describe, expect, it } from 'vitest';

import { crlf, stripNul, trim, trunc } from './text';

describe('text helpers', () => {
  it('removes carriage returns', () => {
    expect(crlf('a\r\nb\r\n')).toBe('a\nb\n');
    expect(crlf('a\n\rb')).toBe('ab');
  });

  it('removes NUL bytes', () => {
    expect(stripNul('h\0i\0')).toBe('hi');
  });

  it('trims a pattern from both ends', () => {
    expect(trim('  x y  ', '\\s+')).toBe('x y');
    expect(trim('##title##', /#+/)).toBe('title');
    expect(trim('plain', '\\s+')).toBe('plain');
  });

  it('truncates with an ellipsis', () => {
    expect(trunc('short', 10)).toBe('short');
    expect(trunc('exactly-10', 10)).toBe('exactly-10');
    expect(trunc('a much longer value', 10)).toBe('a much ...');
  });
});
