/**
 * CLI Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collect, parseNumber, splitList } from './shared.js';

describe('CLI helpers', () => {
  describe('parseNumber', () => {
    it('should parse numbers and pass through a missing option', () => {
      expect(parseNumber('0.25')).toBe(0.25);
      expect(parseNumber('90')).toBe(90);
      expect(parseNumber(undefined)).toBeUndefined();
    });

    it('should reject values that are not numbers', () => {
      expect(() => parseNumber('abc')).toThrow(InvalidArgumentError);
      expect(() => parseNumber(' ')).toThrow("' ' is not a number");
    });
  });

  it('should split comma lists and collect repeated options', () => {
    expect(splitList(' macd, ,volume ')).toEqual(['macd', 'volume']);
    expect(splitList(undefined)).toEqual([]);
    expect(collect('trunk,roots', collect('leaves'))).toEqual(['leaves', 'trunk', 'roots']);
  });
});
