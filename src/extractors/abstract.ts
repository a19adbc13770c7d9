import type { Abstract, DocumentElement } from '../schemas/document.js';
import type { DocumentLanguage } from '../utils/text.js';

/**
 * Language of an abstract section, judged from its section title.
 *
 * @returns 'zh' for titles containing 摘要, 'en' for titles starting with "abstract", else null
 */
export function abstractSectionLanguage(sectionTitle: string | undefined): DocumentLanguage | null {
  const title = sectionTitle?.trim() ?? '';
  if (title === '') {
    return null;
  }
  if (title.includes('摘要')) {
    return 'zh';
  }
  if (title.toLowerCase().startsWith('abstract')) {
    return 'en';
  }
  return null;
}

/**
 * Collect the abstract from paragraphs that sit under an abstract heading.
 * Paragraphs of one language are joined with newlines. A single language
 * yields a plain string; several yield a list sorted by language code.
 *
 * @returns The abstract, or undefined when no abstract section exists
 */
export function extractAbstract(elements: readonly DocumentElement[]): Abstract | undefined {
  const byLanguage = new Map<string, string[]>();

  for (const element of elements) {
    if (element.type !== 'paragraph') {
      continue;
    }
    const language = abstractSectionLanguage(element.source.section_title);
    if (language === null) {
      continue;
    }
    const text = element.content.text.trim();
    if (text === '') {
      continue;
    }
    const parts = byLanguage.get(language) ?? [];
    parts.push(text);
    byLanguage.set(language, parts);
  }

  if (byLanguage.size === 0) {
    return undefined;
  }

  const joined = [...byLanguage.entries()]
    .map(([language, parts]) => ({ language, text: parts.join('\n').trim() }))
    .sort((a, b) => a.language.localeCompare(b.language));

  const [only] = joined;
  if (joined.length === 1 && only !== undefined) {
    return only.text;
  }
  return joined;
}
