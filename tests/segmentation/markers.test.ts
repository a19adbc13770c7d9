import { describe, it, expect } from 'vitest';
import {
  classifyLeadingLabel,
  isFrontMatterHeading,
  isMajorBodyStart,
  isMinorBodyStart,
  isReferencesHeading,
  isTailStartHeading,
  isTocHeading,
  isTocSectionHeader,
  leadingSectionLabel,
  looksLikeTocRow,
} from '../../src/segmentation/markers.js';

describe('markers', () => {
  describe('looksLikeTocRow', () => {
    it('should need an ellipsis, a trailing page number and a short line', () => {
      expect(looksLikeTocRow('References ……… 22')).toBe(true);
      expect(looksLikeTocRow('2 Methods ... 14')).toBe(true);
      expect(looksLikeTocRow('References')).toBe(false);
      expect(looksLikeTocRow('References ……… end')).toBe(false);
      expect(looksLikeTocRow(`A very long entry in a table of contents line ……… 22`)).toBe(false);
    });
  });

  describe('isReferencesHeading', () => {
    it('should accept reference headings in both languages', () => {
      expect(isReferencesHeading('References')).toBe(true);
      expect(isReferencesHeading('BIBLIOGRAPHY')).toBe(true);
      expect(isReferencesHeading('Works Cited')).toBe(true);
      expect(isReferencesHeading('参 考 文 献')).toBe(true);
    });

    it('should reject TOC rows and unrelated headings', () => {
      expect(isReferencesHeading('References ……… 22')).toBe(false);
      expect(isReferencesHeading('Cross references')).toBe(false);
      expect(isReferencesHeading('   ')).toBe(false);
    });
  });

  describe('table of contents', () => {
    it('should match loosely on titles', () => {
      expect(isTocHeading('Table of Contents')).toBe(true);
      expect(isTocHeading('目 录')).toBe(true);
      expect(isTocHeading('Introduction')).toBe(false);
    });

    it('should match strictly on leading labels', () => {
      expect(isTocSectionHeader('Contents')).toBe(true);
      expect(isTocSectionHeader('目录')).toBe(true);
      expect(isTocSectionHeader('Content analysis of interviews')).toBe(false);
      expect(isTocSectionHeader('目录与索引说明的很长的一段文字')).toBe(false);
    });
  });

  describe('isTailStartHeading', () => {
    it('should accept appendix and acknowledgement headings', () => {
      expect(isTailStartHeading('Appendix A')).toBe(true);
      expect(isTailStartHeading('Acknowledgements')).toBe(true);
      expect(isTailStartHeading('致 谢')).toBe(true);
    });

    it('should reject TOC rows and sentences', () => {
      expect(isTailStartHeading('Appendix ……… 40')).toBe(false);
      expect(isTailStartHeading('The appendix discussion continues here')).toBe(false);
    });
  });

  it('should recognise front matter', () => {
    expect(isFrontMatterHeading('Abstract')).toBe(true);
    expect(isFrontMatterHeading('ABSTRACT: We study')).toBe(true);
    expect(isFrontMatterHeading('摘 要')).toBe(true);
    expect(isFrontMatterHeading('Keywords')).toBe(true);
    expect(isFrontMatterHeading('Summary')).toBe(false);
  });

  describe('isMajorBodyStart', () => {
    it('should accept first-chapter headings', () => {
      expect(isMajorBodyStart('1 Introduction')).toBe(true);
      expect(isMajorBodyStart('1. Introduction')).toBe(true);
      expect(isMajorBodyStart('Introduction')).toBe(true);
      expect(isMajorBodyStart('Chapter 1')).toBe(true);
      expect(isMajorBodyStart('Part I')).toBe(true);
      expect(isMajorBodyStart('1 绪论')).toBe(true);
      expect(isMajorBodyStart('1 引言')).toBe(true);
    });

    it('should reject TOC rows and later chapters', () => {
      expect(isMajorBodyStart('1 Introduction ……… 3')).toBe(false);
      expect(isMajorBodyStart('2 Methods')).toBe(false);
      expect(isMajorBodyStart('1. Background')).toBe(false);
    });
  });

  describe('isMinorBodyStart', () => {
    it('should accept chapter-like headings', () => {
      expect(isMinorBodyStart('1. Background')).toBe(true);
      expect(isMinorBodyStart('第一章 总论')).toBe(true);
      expect(isMinorBodyStart('二、研究方法')).toBe(true);
    });

    it('should reject other headings', () => {
      expect(isMinorBodyStart('Results')).toBe(false);
      expect(isMinorBodyStart('References')).toBe(false);
      expect(isMinorBodyStart('1. Overview:')).toBe(false);
    });
  });

  describe('leadingSectionLabel', () => {
    it('should take the first line without trailing colons', () => {
      expect(leadingSectionLabel('References:\nSmith 2020')).toBe('References');
      expect(leadingSectionLabel('  摘要：本文  ')).toBe('摘要：本文');
    });

    it('should cut long lines', () => {
      expect(leadingSectionLabel('x'.repeat(150))).toBe('x'.repeat(100));
    });

    it('should return an empty label for blank text', () => {
      expect(leadingSectionLabel(' \n ')).toBe('');
    });
  });

  describe('classifyLeadingLabel', () => {
    it('should assign the first matching role', () => {
      expect(classifyLeadingLabel('References')).toBe('references');
      expect(classifyLeadingLabel('Contents')).toBe('table_of_contents');
      expect(classifyLeadingLabel('Appendix')).toBe('tail_start');
      expect(classifyLeadingLabel('Abstract')).toBe('front_matter');
      expect(classifyLeadingLabel('1 Introduction')).toBe('body_start');
      expect(classifyLeadingLabel('参考文献与附录')).toBe('references');
    });

    it('should return null for ordinary labels', () => {
      expect(classifyLeadingLabel('Results')).toBeNull();
      expect(classifyLeadingLabel('')).toBeNull();
    });
  });
});
