import { describe, it, expect } from 'vitest';
import fs from 'fs';
import { serializeTmx, serializeTmxToString } from '../serializer';
import { parseTmx } from '../parser';
import { createDocument } from '@/services/alignment/document';

describe('serializeTmx', () => {
  it('writes one unit per row with the source variant first', () => {
    const doc = createDocument({
      languages: { source: 'en', target: 'fr' },
      rows: [{ source: 'A & B', target: '<ph x="1"/>C' }],
    });

    expect(serializeTmxToString(doc)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<tmx version="1.4">',
        '  <header creationtool="tmx-aligner" creationtoolversion="0.1.0" datatype="plaintext" segtype="sentence" adminlang="en" srclang="en" o-tmf="tmx-aligner"/>',
        '  <body>',
        '    <tu>',
        '      <tuv xml:lang="en">',
        '        <seg>A &amp; B</seg>',
        '      </tuv>',
        '      <tuv xml:lang="fr">',
        '        <seg><ph x="1"/>C</seg>',
        '      </tuv>',
        '    </tu>',
        '  </body>',
        '</tmx>',
        '',
      ].join('\n')
    );
  });

  it('writes empty segments for empty text', () => {
    const doc = createDocument({ languages: { source: 'en', target: 'fr' }, rows: [{ source: 'only', target: '' }] });
    expect(serializeTmxToString(doc)).toContain('        <seg></seg>\n');
  });

  it('encodes UTF-8', () => {
    const doc = createDocument({ languages: { source: 'en', target: 'ja' }, rows: [{ source: 'tea', target: '茶' }] });
    const bytes = serializeTmx(doc);
    expect(new TextDecoder('utf-8').decode(bytes)).toBe(serializeTmxToString(doc));
  });

  it('round-trips the fixture through parse and serialize', () => {
    const original = parseTmx(fs.readFileSync(new URL('./fixtures/small.tmx', import.meta.url)));
    const reparsed = parseTmx(serializeTmx(original));

    expect(reparsed.languages).toEqual(original.languages);
    expect(reparsed.rows()).toEqual(original.rows());
  });

  it('round-trips text that looks like markup or entities', () => {
    const rows = [
      { source: 'x < y && y > z', target: '&lt; stays literal' },
      { source: 'line one\nline two', target: '"quoted" \'text\'' },
      { source: '<bpt i="1">&lt;i&gt;</bpt>it<ept i="1">&lt;/i&gt;</ept>', target: '' },
    ];
    const doc = createDocument({ languages: { source: 'en', target: 'de' }, rows });
    expect(parseTmx(serializeTmx(doc)).rows().map(({ source, target }) => ({ source, target }))).toEqual(rows);
  });
});
