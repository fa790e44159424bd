import { describe, it, expect } from 'vitest';
import { CharWindow } from './char-window.js';

describe('CharWindow', () => {
  it('should peek without consuming', () => {
    const window = new CharWindow('/*x');

    expect(window.peek()).toBe('/');
    expect(window.peek(2)).toBe('/*');
    expect(window.peek(1, 1)).toBe('*');
    expect(window.advance()).toBe('/');
  });

  it('should peek a whole code point', () => {
    const window = new CharWindow('\u{1F600}x');

    expect(window.peekCodePoint()).toBe('\u{1F600}');
    expect(window.peek()).toBe('\uD83D');
  });

  it('should return empty strings past the end', () => {
    const window = new CharWindow('a');

    expect(window.advance()).toBe('a');
    expect(window.advance()).toBe('');
    expect(window.peek(2)).toBe('');
  });

  it('should consume through a terminator', () => {
    const window = new CharWindow('abc*/rest');

    expect(window.consumeThrough('*/')).toEqual({ text: 'abc*/', found: true });
    expect(window.peek(4)).toBe('rest');
  });

  it('should consume the rest when the terminator is missing', () => {
    const window = new CharWindow('abc');

    expect(window.consumeThrough('*/')).toEqual({ text: 'abc', found: false });
    expect(window.advance()).toBe('');
  });
});
