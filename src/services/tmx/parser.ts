/**
 * TMX Parser
 *
 * TMX 1.4b → AlignmentDocument. fast-xml-parser checks well-formedness and
 * walks the tmx/header/body/tu/tuv structure; `<seg>` is a stop node so its
 * inner XML arrives untouched and inline markup survives verbatim.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { type LanguagePair, type RowContent } from '@/types/alignment';
import { type AlignmentDocument, createDocument } from '@/services/alignment/document';
import { ParseError, describeCause } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { decodeTmxBytes } from './encoding';
import { decodeSegment } from './inline';
import { normalizeLanguageCode, rankLanguages, selectLanguagePair } from './language';

type XmlNode = Record<string, unknown>;

/** One `<tu>`: raw seg content per language, first variant wins. */
export type TranslationUnit = Map<string, string>;

export interface ParseTmxOptions {
  /** Recorded as the document's origin path */
  originPath?: string | null;
}

const ATTRIBUTE_PREFIX = '@_';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  stopNodes: ['*.seg'],
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) =>
    !isAttribute && (tagName === 'tu' || tagName === 'tuv'),
});

const isNode = (value: unknown): value is XmlNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] =>
  Array.isArray(value) ? value : value === undefined ? [] : [value];

const first = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

function attribute(node: unknown, name: string): string | undefined {
  if (!isNode(node)) return undefined;
  const value = node[ATTRIBUTE_PREFIX + name];
  return typeof value === 'string' ? value : undefined;
}

function segContent(tuv: unknown): string {
  if (!isNode(tuv)) return '';
  const seg = first(tuv.seg);
  if (typeof seg === 'string') return seg;
  if (isNode(seg) && typeof seg['#text'] === 'string') return seg['#text'];
  return '';
}

const localName = (tagName: string) => tagName.slice(tagName.indexOf(':') + 1);

function parseXml(text: string): XmlNode {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError('MALFORMED_XML', { line, col, detail: msg });
  }
  try {
    const parsed: unknown = xmlParser.parse(text);
    if (!isNode(parsed)) {
      throw new Error('Parser returned no document');
    }
    return parsed;
  } catch (error) {
    throw new ParseError('MALFORMED_XML', { line: 1, col: 1, detail: describeCause(error) }, { cause: error });
  }
}

/**
 * Read the translation units of a TMX document without choosing languages.
 */
export function readTranslationUnits(input: Uint8Array | string): {
  units: TranslationUnit[];
  languageCodes: string[];
  headerSrcLang?: string;
} {
  const document = parseXml(decodeTmxBytes(input));

  const rootName = Object.keys(document).find((key) => !key.startsWith('?') && !key.startsWith('#'));
  if (rootName === undefined) {
    throw new ParseError('MALFORMED_XML', { line: 1, col: 1, detail: 'no root element' });
  }
  if (localName(rootName).toLowerCase() !== 'tmx') {
    throw new ParseError('NOT_TMX', { detail: rootName });
  }

  const tmx = document[rootName];
  if (!isNode(tmx) || !('header' in tmx)) {
    throw new ParseError('MISSING_HEADER');
  }
  if (!('body' in tmx)) {
    throw new ParseError('MISSING_BODY');
  }

  const header = first(tmx.header);
  const body = first(tmx.body);
  const units: TranslationUnit[] = [];
  const languageCodes: string[] = [];

  for (const tu of isNode(body) ? asArray(body.tu) : []) {
    const unit: TranslationUnit = new Map();
    for (const tuv of isNode(tu) ? asArray(tu.tuv) : []) {
      const lang = normalizeLanguageCode(attribute(tuv, 'xml:lang') ?? attribute(tuv, 'lang') ?? '');
      if (!lang) continue;
      languageCodes.push(lang);
      if (!unit.has(lang)) {
        unit.set(lang, segContent(tuv));
      }
    }
    units.push(unit);
  }

  return { units, languageCodes, headerSrcLang: attribute(header, 'srclang') };
}

/**
 * Reduce translation units to rows for the chosen language pair. Units with
 * neither language are dropped; a missing side becomes empty text.
 */
export function unitsToRows(units: TranslationUnit[], languages: LanguagePair): RowContent[] {
  const rows: RowContent[] = [];
  let discarded = 0;

  for (const unit of units) {
    const source = unit.get(languages.source);
    const target = unit.get(languages.target);
    if (source === undefined && target === undefined) {
      discarded++;
      continue;
    }
    rows.push({
      source: decodeSegment(source ?? ''),
      target: decodeSegment(target ?? ''),
    });
  }

  if (discarded > 0) {
    logger.warn(`[TMX] Ignored ${discarded} translation unit(s) without ${languages.source} or ${languages.target}`);
  }
  return rows;
}

/**
 * Parse TMX bytes into an alignment document.
 */
export function parseTmx(input: Uint8Array | string, options: ParseTmxOptions = {}): AlignmentDocument {
  const { units, languageCodes, headerSrcLang } = readTranslationUnits(input);

  const ranked = rankLanguages(languageCodes);
  const languages = selectLanguagePair(ranked, headerSrcLang);
  if (ranked.length > 2) {
    logger.warn('[TMX] Document has more than two languages; extra languages are dropped', {
      kept: [languages.source, languages.target],
      dropped: ranked.slice(2).map((entry) => entry.code),
    });
  }

  const rows = unitsToRows(units, languages);
  logger.info(`[TMX] Parsed ${rows.length} row(s) (${languages.source} → ${languages.target})`, {
    units: units.length,
    path: options.originPath ?? undefined,
  });

  return createDocument({ rows, languages, originPath: options.originPath ?? null });
}
