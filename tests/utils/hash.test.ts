import { describe, it, expect } from 'vitest';
import { sha256, hashForLogging } from '../../src/utils/hash';

describe('Hash Utilities', () => {
  describe('sha256', () => {
    it('should generate consistent hash for same input', () => {
      expect(sha256('TID0123abcd')).toBe(sha256('TID0123abcd'));
    });

    it('should match the known digest of a fixed input', () => {
      expect(sha256('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });

    it('should return 64 character hex string', () => {
      expect(sha256('test')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('hashForLogging', () => {
    it('should mask a token with a short hash prefix', () => {
      expect(hashForLogging('abc')).toBe('***ba7816bf');
    });

    it('should never contain the original value', () => {
      expect(hashForLogging('TID0123abcd')).not.toContain('TID0123abcd');
    });

    it('should mark empty input', () => {
      expect(hashForLogging('')).toBe('[empty]');
    });
  });
});
