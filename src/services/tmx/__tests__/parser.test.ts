import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { parseTmx, readTranslationUnits } from '../parser';
import { ParseError } from '@/services/utils/errors';
import { thrown } from '@/__tests__/helpers';

const fixture = fs.readFileSync(new URL('./fixtures/small.tmx', import.meta.url));

const tmx = (units: string, header = '<header srclang="en" datatype="plaintext"/>') =>
  `<?xml version="1.0" encoding="UTF-8"?>\n<tmx version="1.4">${header}<body>${units}</body></tmx>`;

const unit = (...variants: [string, string][]) =>
  `<tu>${variants.map(([lang, seg]) => `<tuv xml:lang="${lang}"><seg>${seg}</seg></tuv>`).join('')}</tu>`;

const parseError = (input: string) => {
  const error = thrown(() => parseTmx(input));
  expect(error).toBeInstanceOf(ParseError);
  return error;
};

describe('parseTmx', () => {
  it('reads the fixture into rows for the two most frequent languages', () => {
    const doc = parseTmx(fixture, { originPath: '/data/small.tmx' });

    expect(doc.languages).toEqual({ source: 'en-us', target: 'ja-jp' });
    expect(doc.originPath).toBe('/data/small.tmx');
    expect(doc.dirty).toBe(false);
    expect(doc.rows()).toEqual([
      { id: 0, source: 'Hello world.', target: 'こんにちは世界。' },
      { id: 1, source: 'Fish & chips', target: 'フィッシュ&チップス' },
      { id: 2, source: 'Press <ph x="1">&lt;b&gt;</ph>OK', target: '' },
    ]);
  });

  it('reports every language code found', () => {
    const { units, languageCodes, headerSrcLang } = readTranslationUnits(fixture);
    expect(units).toHaveLength(4);
    expect(languageCodes).toEqual(['en-us', 'ja-jp', 'en-us', 'ja-jp', 'en-us', 'fr-fr']);
    expect(headerSrcLang).toBe('en-US');
  });

  it('lets the header srclang pick the source side', () => {
    const input = tmx(unit(['en', 'One'], ['de', 'Eins']) + unit(['en', 'Two'], ['de', 'Zwei']), '<header srclang="de"/>');
    const doc = parseTmx(input);
    expect(doc.languages).toEqual({ source: 'de', target: 'en' });
    expect(doc.rowAt(1)).toEqual({ id: 1, source: 'Zwei', target: 'Two' });
  });

  it('keeps the first variant when a language repeats inside a unit', () => {
    const doc = parseTmx(tmx(unit(['en', 'first'], ['en', 'second'], ['fr', 'premier'])));
    expect(doc.rows()).toEqual([{ id: 0, source: 'first', target: 'premier' }]);
  });

  it('reads empty and self-closing segments as empty text', () => {
    const input = tmx('<tu><tuv xml:lang="en"><seg/></tuv><tuv xml:lang="fr"><seg></seg></tuv></tu>' + unit(['en', 'a'], ['fr', 'b']));
    expect(parseTmx(input).rowAt(0)).toEqual({ id: 0, source: '', target: '' });
  });

  it('normalizes line endings and replaces tabs', () => {
    const doc = parseTmx(tmx(unit(['en', 'line one\r\nline two'], ['fr', 'a\tb'])));
    expect(doc.rowAt(0)).toEqual({ id: 0, source: 'line one\nline two', target: 'a b' });
  });

  it('unwraps CDATA segments', () => {
    const doc = parseTmx(tmx(unit(['en', '<![CDATA[x < y]]>'], ['fr', 'ok'])));
    expect(doc.textOf(0, 'source')).toBe('x < y');
  });

  it('decodes UTF-16 input with a byte order mark', () => {
    const bytes = Buffer.from('\ufeff' + tmx(unit(['en', 'Tea'], ['ja', 'お茶'])), 'utf16le');
    expect(parseTmx(bytes).rows()).toEqual([{ id: 0, source: 'Tea', target: 'お茶' }]);
  });

  describe('errors', () => {
    it('rejects malformed XML', () => {
      const error = parseError('<tmx version="1.4"><header/><body></tmx>');
      expect(error).toMatchObject({ code: 'MALFORMED_XML' });
    });

    it('rejects documents whose root is not tmx', () => {
      const error = parseError('<xliff version="1.2"><file/></xliff>');
      expect(error).toMatchObject({ code: 'NOT_TMX', context: { detail: 'xliff' } });
    });

    it('requires a header', () => {
      expect(parseError('<tmx version="1.4"><body/></tmx>')).toMatchObject({ code: 'MISSING_HEADER' });
    });

    it('requires a body', () => {
      expect(parseError('<tmx version="1.4"><header srclang="en"/></tmx>')).toMatchObject({
        code: 'MISSING_BODY',
      });
    });

    it('requires at least two languages', () => {
      const error = parseError(tmx(unit(['en', 'alone'])));
      expect(error).toMatchObject({ code: 'INSUFFICIENT_LANGUAGES', context: { count: 1 } });
    });

    it('rejects an encoding the runtime cannot decode', () => {
      const bytes = new TextEncoder().encode('<?xml version="1.0" encoding="x-no-such-charset"?><tmx/>');
      const error = thrown(() => parseTmx(bytes));
      expect(error).toMatchObject({ code: 'UNSUPPORTED_ENCODING', context: { detail: 'x-no-such-charset' } });
    });
  });
});
