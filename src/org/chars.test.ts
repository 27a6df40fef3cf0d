import { describe, expect, it } from 'vitest';
import { codePointLength, createCharIndex, truncateWithEllipsis } from './chars.js';

describe('codePointLength', () => {
  it('counts BMP text like String#length', () => {
    expect(codePointLength('héllo')).toBe(5);
  });

  it('counts a surrogate pair as one character', () => {
    expect(codePointLength('a😀b')).toBe(3);
  });
});

describe('createCharIndex', () => {
  it('is the identity for BMP-only text', () => {
    const index = createCharIndex('plain');
    expect(index.length).toBe(5);
    expect(index.toStringIndex(3)).toBe(3);
  });

  it('maps code-point positions past astral characters', () => {
    const index = createCharIndex('a😀b🎉');
    expect(index.length).toBe(4);
    expect(index.toStringIndex(0)).toBe(0);
    expect(index.toStringIndex(1)).toBe(1);
    expect(index.toStringIndex(2)).toBe(3);
    expect(index.toStringIndex(3)).toBe(4);
    expect(index.toStringIndex(4)).toBe(6);
  });
});

describe('truncateWithEllipsis', () => {
  it('keeps text that fits', () => {
    const text = 'x'.repeat(60);
    expect(truncateWithEllipsis(text, 60)).toBe(text);
  });

  it('cuts to 57 characters plus an ellipsis', () => {
    expect(truncateWithEllipsis('x'.repeat(61), 60)).toBe(`${'x'.repeat(57)}...`);
  });

  it('never splits a surrogate pair', () => {
    expect(truncateWithEllipsis('😀😀😀😀😀', 4)).toBe('😀...');
  });
});
