import type { TargetLanguage } from './types';

const CJK_CHAR = /[\u3400-\u9fff\uf900-\ufaff]/g;
const LATIN_WORD = /[A-Za-z]+/g;

// Share of CJK characters among CJK characters plus Latin words at or above
// which text counts as Chinese. One CJK character weighs about one English word.
const CJK_RATIO = 0.3;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Chinese text may quote English terms and abbreviations; English text has
 * no CJK at all. Text without letters (numbers, punctuation) counts as
 * already localized.
 */
export function isInLanguage(text: string, lang: TargetLanguage): boolean {
  const cjk = countMatches(text, CJK_CHAR);
  const words = countMatches(text, LATIN_WORD);
  if (cjk + words === 0) return true;

  if (lang === 'en') return cjk === 0;
  return cjk / (cjk + words) >= CJK_RATIO;
}
