/**
 * Byte decoding for TMX input.
 *
 * TMX files are UTF-8 or UTF-16 in practice; a BOM decides, then the XML
 * declaration, then UTF-8 is assumed.
 */

import { TextDecoder } from 'util';
import { ParseError } from '@/services/utils/errors';

const DECLARED_ENCODING = /^<\?xml[^>]*\bencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

function sniffEncoding(bytes: Uint8Array): { encoding: string; offset: number } {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { encoding: 'utf-8', offset: 3 };
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { encoding: 'utf-16le', offset: 2 };
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { encoding: 'utf-16be', offset: 2 };
  }

  // The declaration itself is ASCII in every encoding we accept without a BOM
  const head = String.fromCharCode(...bytes.subarray(0, 100));
  const declared = head.match(DECLARED_ENCODING)?.[1]?.toLowerCase();
  if (declared && declared !== 'utf-8' && declared !== 'utf8') {
    return { encoding: declared, offset: 0 };
  }
  return { encoding: 'utf-8', offset: 0 };
}

/**
 * Decode TMX bytes to a string with normalized line endings.
 */
export function decodeTmxBytes(input: Uint8Array | string): string {
  let text: string;
  if (typeof input === 'string') {
    text = input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  } else {
    const { encoding, offset } = sniffEncoding(input);
    try {
      text = new TextDecoder(encoding, { fatal: true }).decode(input.subarray(offset));
    } catch (error) {
      throw new ParseError('UNSUPPORTED_ENCODING', { detail: encoding }, { cause: error });
    }
  }
  return text.replace(/\r\n?/g, '\n');
}
