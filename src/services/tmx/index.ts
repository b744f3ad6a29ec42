export { parseTmx, readTranslationUnits, unitsToRows, type ParseTmxOptions, type TranslationUnit } from './parser';
export { serializeTmx, serializeTmxToString } from './serializer';
export { decodeTmxBytes } from './encoding';
export { decodeSegment, encodeSegment, escapeXml, hasInlineMarkup, unescapeXml } from './inline';
export { normalizeLanguageCode, rankLanguages, selectLanguagePair, type LanguageFrequency } from './language';
