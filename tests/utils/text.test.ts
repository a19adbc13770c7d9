import { describe, it, expect } from 'vitest';
import { countOccurrences, detectLanguage, isBlank, toText } from '../../src/utils/text.js';

describe('text', () => {
  describe('toText', () => {
    it('should pass strings through', () => {
      expect(toText('  keep spacing ')).toBe('  keep spacing ');
    });

    it('should join lists with single spaces, dropping empty fragments', () => {
      expect(toText(['first ', '', '  second', null])).toBe('first second');
    });

    it('should turn null and undefined into empty strings', () => {
      expect(toText(null)).toBe('');
      expect(toText(undefined)).toBe('');
    });

    it('should stringify numbers and ignore objects', () => {
      expect(toText(42)).toBe('42');
      expect(toText({ text: 'nested' })).toBe('');
    });
  });

  it('should detect blank text', () => {
    expect(isBlank('  \n\t')).toBe(true);
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });

  describe('detectLanguage', () => {
    it('should classify mostly Chinese text as zh', () => {
      expect(detectLanguage('这是一个测试')).toBe('zh');
    });

    it('should classify Latin text as en', () => {
      expect(detectLanguage('A plain English sentence.')).toBe('en');
    });

    it('should use a strict threshold', () => {
      // 3 of 10 characters are CJK: exactly 0.3 is not above the threshold
      expect(detectLanguage('中文字abcdefg')).toBe('en');
      expect(detectLanguage('中文字abcdefg', 0.29)).toBe('zh');
    });

    it('should treat empty text as en', () => {
      expect(detectLanguage('')).toBe('en');
    });
  });

  it('should count non-overlapping occurrences', () => {
    expect(countOccurrences('<tr><tr></tr>', '<tr>')).toBe(2);
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});
