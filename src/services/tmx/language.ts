/**
 * Language pair detection for TMX documents.
 */

import { type LanguagePair } from '@/types/alignment';
import { ParseError } from '@/services/utils/errors';

export interface LanguageFrequency {
  code: string;
  count: number;
}

/** Language codes compare case-insensitively. */
export const normalizeLanguageCode = (code: string): string => code.trim().toLowerCase();

/**
 * Count codes and order them by frequency, most frequent first. Ties keep
 * the order in which the codes were first encountered.
 */
export function rankLanguages(codes: Iterable<string>): LanguageFrequency[] {
  const counts = new Map<string, number>();
  for (const raw of codes) {
    const code = normalizeLanguageCode(raw);
    if (!code) continue;
    counts.set(code, (counts.get(code) || 0) + 1);
  }
  // Array.prototype.sort is stable, and Map iteration follows insertion order
  return Array.from(counts, ([code, count]) => ({ code, count })).sort((a, b) => b.count - a.count);
}

/**
 * Choose the two most frequent languages. The header's srclang decides which
 * of them is the source when it names one of the two; otherwise the more
 * frequent language is the source.
 */
export function selectLanguagePair(ranked: LanguageFrequency[], headerSrcLang?: string): LanguagePair {
  if (ranked.length < 2) {
    throw new ParseError('INSUFFICIENT_LANGUAGES', { count: ranked.length });
  }
  const [first, second] = ranked;
  const declared = headerSrcLang ? normalizeLanguageCode(headerSrcLang) : '';

  // "*all*" (TMX for "unspecified") never matches a tuv language
  if (declared === second.code) {
    return { source: second.code, target: first.code };
  }
  return { source: first.code, target: second.code };
}
