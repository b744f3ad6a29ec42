/**
 * Segment content codec.
 *
 * Segment text keeps TMX inline elements (bpt, ept, it, ph, hi, ut, sub) as
 * verbatim markup; everything between them is plain text, entity-decoded on
 * read and escaped on write. decodeSegment(encodeSegment(text)) === text.
 */

const INLINE_OPEN_PATTERN = /<(bpt|ept|it|ph|hi|ut|sub)\b[^>]*>/y;
const CDATA_OPEN = '<![CDATA[';
const CDATA_CLOSE = ']]>';
const ENTITY_PATTERN = /&(#x[0-9a-fA-F]+|#[0-9]+|lt|gt|amp|quot|apos);/g;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

export interface SegmentToken {
  kind: 'text' | 'markup' | 'cdata';
  value: string;
}

/**
 * Escape special XML characters for attribute values
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Escape text content; quotes may stay literal outside attributes
 */
export function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Decode predefined and numeric character references in one pass
 */
export function unescapeXml(text: string): string {
  return text.replace(ENTITY_PATTERN, (entity, body: string) => {
    if (body.startsWith('#')) {
      const codePoint = body[1] === 'x' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[body] ?? entity;
  });
}

/**
 * End index of the inline element starting at `start`, or null when the
 * markup there is not a complete inline element. Nested elements of the same
 * name are balanced.
 */
function inlineElementEnd(text: string, start: number): number | null {
  INLINE_OPEN_PATTERN.lastIndex = start;
  const open = INLINE_OPEN_PATTERN.exec(text);
  if (!open) return null;

  const afterOpen = start + open[0].length;
  if (open[0].endsWith('/>')) return afterOpen;

  const tagPattern = new RegExp(`<(/?)${open[1]}\\b[^>]*>`, 'g');
  tagPattern.lastIndex = afterOpen;
  let depth = 1;
  let match: RegExpExecArray | null;

  // eslint-disable-next-line no-cond-assign
  while ((match = tagPattern.exec(text)) !== null) {
    if (match[1]) depth--;
    else if (!match[0].endsWith('/>')) depth++;
    if (depth === 0) return match.index + match[0].length;
  }
  return null;
}

/**
 * Split segment content into text runs, inline markup and (when reading raw
 * XML) CDATA sections.
 */
export function tokenizeSegment(text: string, options: { cdata: boolean }): SegmentToken[] {
  const tokens: SegmentToken[] = [];
  let textStart = 0;
  let cursor = text.indexOf('<');

  while (cursor !== -1) {
    let end: number | null = null;
    let token: SegmentToken | null = null;

    if (options.cdata && text.startsWith(CDATA_OPEN, cursor)) {
      const close = text.indexOf(CDATA_CLOSE, cursor + CDATA_OPEN.length);
      if (close !== -1) {
        end = close + CDATA_CLOSE.length;
        token = { kind: 'cdata', value: text.slice(cursor + CDATA_OPEN.length, close) };
      }
    } else {
      end = inlineElementEnd(text, cursor);
      if (end !== null) token = { kind: 'markup', value: text.slice(cursor, end) };
    }

    if (end === null || token === null) {
      cursor = text.indexOf('<', cursor + 1);
      continue;
    }
    if (cursor > textStart) {
      tokens.push({ kind: 'text', value: text.slice(textStart, cursor) });
    }
    tokens.push(token);
    textStart = end;
    cursor = text.indexOf('<', end);
  }

  if (textStart < text.length) {
    tokens.push({ kind: 'text', value: text.slice(textStart) });
  }
  return tokens;
}

/**
 * Raw `<seg>` inner XML → segment text.
 */
export function decodeSegment(raw: string): string {
  return tokenizeSegment(raw, { cdata: true })
    .map((token) => (token.kind === 'text' ? unescapeXml(token.value) : token.value))
    .join('');
}

/**
 * Segment text → `<seg>` inner XML.
 */
export function encodeSegment(text: string): string {
  return tokenizeSegment(text, { cdata: false })
    .map((token) => (token.kind === 'markup' ? token.value : escapeText(token.value)))
    .join('');
}

/** True when the text carries inline markup. */
export const hasInlineMarkup = (text: string): boolean =>
  tokenizeSegment(text, { cdata: false }).some((token) => token.kind === 'markup');
