import { describe, it, expect } from 'vitest';
import { abstractSectionLanguage, extractAbstract } from '../../src/extractors/abstract.js';
import { textElement, titleElement } from '../helpers/fixtures.js';

describe('abstract', () => {
  describe('abstractSectionLanguage', () => {
    it('should detect Chinese and English abstract headings', () => {
      expect(abstractSectionLanguage('摘 要')).toBeNull();
      expect(abstractSectionLanguage('中文摘要')).toBe('zh');
      expect(abstractSectionLanguage('  Abstract')).toBe('en');
      expect(abstractSectionLanguage('ABSTRACT AND KEYWORDS')).toBe('en');
    });

    it('should ignore other headings', () => {
      expect(abstractSectionLanguage('On abstracts')).toBeNull();
      expect(abstractSectionLanguage(undefined)).toBeNull();
      expect(abstractSectionLanguage('   ')).toBeNull();
    });
  });

  describe('extractAbstract', () => {
    it('should join paragraphs of a single language into a string', () => {
      const elements = [
        titleElement(1, 'Abstract'),
        textElement(2, ' First part. ', { sectionTitle: 'Abstract' }),
        textElement(3, 'Second part.', { sectionTitle: 'Abstract' }),
        textElement(4, 'Not abstract.', { sectionTitle: '1 Introduction' }),
      ];
      expect(extractAbstract(elements)).toBe('First part.\nSecond part.');
    });

    it('should return a language-sorted list for several languages', () => {
      const elements = [
        textElement(1, '本文研究。', { sectionTitle: '摘要' }),
        textElement(2, 'We study.', { sectionTitle: 'Abstract' }),
      ];
      expect(extractAbstract(elements)).toEqual([
        { language: 'en', text: 'We study.' },
        { language: 'zh', text: '本文研究。' },
      ]);
    });

    it('should skip non-paragraph elements', () => {
      const elements = [textElement(1, 'Listed.', { sectionTitle: 'Abstract', type: 'list' })];
      expect(extractAbstract(elements)).toBeUndefined();
    });

    it('should return undefined without an abstract section', () => {
      expect(extractAbstract([textElement(1, 'Plain.')])).toBeUndefined();
    });
  });
});
