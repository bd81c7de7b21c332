import { describe, test, expect } from '@jest/globals';
import { NOT_SPECIFIED, toHex } from '../src/lib/drawingComments';

describe('toHex', () => {
  test('encodes RGB channels', () => {
    expect(toHex([1.0, 0.0, 0.0])).toBe('#ff0000');
    expect(toHex([0, 0, 1])).toBe('#0000ff');
    expect(toHex([128 / 255, 0, 0])).toBe('#800000');
  });

  test('replicates a gray channel', () => {
    expect(toHex([0.0])).toBe('#000000');
    expect(toHex([1])).toBe('#ffffff');
    expect(toHex([0.5])).toBe('#808080');
  });

  test('returns the placeholder for missing colours', () => {
    expect(toHex(undefined)).toBe(NOT_SPECIFIED);
    expect(toHex(null)).toBe(NOT_SPECIFIED);
    expect(toHex([])).toBe(NOT_SPECIFIED);
    expect(NOT_SPECIFIED).not.toMatch(/^#[0-9a-f]{6}$/i);
  });

  test('clamps out-of-range channels', () => {
    expect(toHex([1.5, -0.2, 0])).toBe('#ff0000');
  });

  test('echoes unexpected channel counts', () => {
    expect(toHex([0, 0, 0, 1])).toBe('[0, 0, 0, 1]');
    expect(toHex([0.2, 0.4])).toBe('[0.2, 0.4]');
  });
});
