import { describe, it, expect } from 'vitest';
import { parseNumber, splitFields, splitLines, splitSections } from '../../src/utils/text';

describe('Text Utilities', () => {
  describe('splitLines', () => {
    it('should drop blank lines and trailing whitespace', () => {
      expect(splitLines('a  \r\n\n  b\n   \n')).toEqual(['a', '  b']);
    });
  });

  describe('splitFields', () => {
    it('should split on runs of whitespace', () => {
      expect(splitFields('  cpu0  10\t20 ')).toEqual(['cpu0', '10', '20']);
    });

    it('should return nothing for a blank line', () => {
      expect(splitFields('   ')).toEqual([]);
    });
  });

  describe('parseNumber', () => {
    it('should parse integers, decimals and exponents', () => {
      expect(parseNumber('42')).toBe(42);
      expect(parseNumber('-92')).toBe(-92);
      expect(parseNumber('0.08')).toBe(0.08);
      expect(parseNumber('.5')).toBe(0.5);
      expect(parseNumber('1e3')).toBe(1000);
    });

    it('should reject partial and empty numbers', () => {
      expect(parseNumber('12kB')).toBeUndefined();
      expect(parseNumber('')).toBeUndefined();
      expect(parseNumber('0x10')).toBeUndefined();
      expect(parseNumber(undefined)).toBeUndefined();
    });
  });

  describe('splitSections', () => {
    it('should split on a separator line', () => {
      expect(splitSections('a\nb\n---df---\nc\n', '---df---')).toEqual(['a\nb', 'c\n']);
    });

    it('should return the whole text when the separator is absent', () => {
      expect(splitSections('a\nb', '---df---')).toEqual(['a\nb']);
    });
  });
});
