import { describe, it, expect } from 'vitest';
import { displayWidth, lineCount, multilineWidth, splitLines, truncateLabel, truncateToWidth } from './utils.js';

describe('displayWidth', () => {
  it('counts ASCII as one column each', () => {
    expect(displayWidth('Alice')).toBe(5);
  });

  it('counts CJK characters as two columns', () => {
    expect(displayWidth('日本')).toBe(4);
  });

  it('ignores combining marks', () => {
    expect(displayWidth('é')).toBe(1);
  });

  it('is zero for the empty string', () => {
    expect(displayWidth('')).toBe(0);
  });
});

describe('splitLines', () => {
  it('splits on every <br> spelling, case-insensitively', () => {
    expect(splitLines('a<br>b<BR/>c<br />d')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('returns a single element for plain text', () => {
    expect(splitLines('hello')).toEqual(['hello']);
  });
});

describe('multilineWidth and lineCount', () => {
  it('measure the widest line and the number of lines', () => {
    expect(multilineWidth('ab<br>abcd<br>a')).toBe(4);
    expect(lineCount('ab<br>abcd<br>a')).toBe(3);
  });
});

describe('truncateToWidth', () => {
  it('leaves text that fits untouched', () => {
    expect(truncateToWidth('Alice', 5)).toBe('Alice');
  });

  it('cuts to width - 1 columns and appends an ellipsis', () => {
    expect(truncateToWidth('Alice', 4)).toBe('Ali…');
  });

  it('never splits a wide character', () => {
    // 日本語 is 6 columns; 4 columns leave room for one wide char plus the ellipsis
    expect(truncateToWidth('日本語', 4)).toBe('日…');
  });

  it('applies per line to multi-line labels', () => {
    expect(truncateLabel('abcdef<br>ab', 4)).toBe('abc…<br/>ab');
  });
});
