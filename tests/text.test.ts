import { describe, it, expect } from 'vitest';
import { preview, truncate } from '../src/utils/text.js';

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('short', 5)).toBe('short');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
  });

  it('never splits an emoji across the cut', () => {
    expect(truncate('a😀😀b', 3)).toBe('a😀…');
  });

  it('counts an emoji as one character', () => {
    expect(truncate('😀😀😀', 3)).toBe('😀😀😀');
  });
});

describe('preview', () => {
  it('collapses whitespace before shortening', () => {
    expect(preview('one\n\n  two   three', 10)).toBe('one two t…');
  });
});
