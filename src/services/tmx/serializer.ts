/**
 * TMX Serializer
 *
 * AlignmentDocument → TMX 1.4b. Only unit order and the two segments' text
 * are written; metadata read on load is not carried over.
 */

import { TextEncoder } from 'util';
import { type AlignmentDocument } from '@/services/alignment/document';
import { APP_NAME, APP_VERSION } from '@/config';
import { encodeSegment, escapeXml } from './inline';

const INDENT = '  ';

function headerElement(doc: AlignmentDocument): string {
  const attributes: [string, string][] = [
    ['creationtool', APP_NAME],
    ['creationtoolversion', APP_VERSION],
    ['datatype', 'plaintext'],
    ['segtype', 'sentence'],
    ['adminlang', 'en'],
    ['srclang', doc.sourceLang],
    ['o-tmf', APP_NAME],
  ];
  const rendered = attributes.map(([name, value]) => `${name}="${escapeXml(value)}"`).join(' ');
  return `<header ${rendered}/>`;
}

function tuvLines(lang: string, text: string, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  return [
    `${pad}<tuv xml:lang="${escapeXml(lang)}">`,
    `${pad}${INDENT}<seg>${encodeSegment(text)}</seg>`,
    `${pad}</tuv>`,
  ];
}

/**
 * Serialize to TMX markup. One `<tu>` per row, source variant first; empty
 * text still produces an empty `<seg>`.
 */
export function serializeTmxToString(doc: AlignmentDocument): string {
  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<tmx version="1.4">',
    `${INDENT}${headerElement(doc)}`,
    `${INDENT}<body>`,
  ];

  for (const row of doc.rows()) {
    lines.push(`${INDENT.repeat(2)}<tu>`);
    lines.push(...tuvLines(doc.sourceLang, row.source, 3));
    lines.push(...tuvLines(doc.targetLang, row.target, 3));
    lines.push(`${INDENT.repeat(2)}</tu>`);
  }

  lines.push(`${INDENT}</body>`, '</tmx>');
  return lines.join('\n') + '\n';
}

/**
 * Serialize to UTF-8 bytes.
 */
export function serializeTmx(doc: AlignmentDocument): Uint8Array {
  return new TextEncoder().encode(serializeTmxToString(doc));
}
