import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { Encoder, compareLabels } from '../../src/core/encoder';
import { EncodeError } from '../../src/core/errors';
import { XmlNode, element, leaf } from '../../src/core/node';
import { OutputSink, StringSink } from '../../src/core/sink';

function encode(root: XmlNode | null, configure: (enc: Encoder) => Encoder = (enc) => enc): string {
  const sink = new StringSink();
  configure(new Encoder(sink)).encode(root);
  return sink.toString();
}

function caught(fn: () => void): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

class FailingSink implements OutputSink {
  attempts = 0;
  readonly written: string[] = [];

  constructor(private readonly failOnAttempt: number) {}

  write(chunk: string): void {
    this.attempts++;
    if (this.attempts === this.failOnAttempt) {
      throw new Error('disk full');
    }
    this.written.push(chunk);
  }
}

const osm = () =>
  element({
    '-version': leaf('0.6'),
    '-generator': leaf('CGImap 0.0.2'),
    bounds: element({ '-minlat': leaf('1') }),
    foo: leaf('bar'),
  });

describe('Encoder', () => {
  describe('compact output', () => {
    it('encodes a bare leaf as a string', () => {
      expect(encode(leaf('world'))).toBe('"world"\n');
    });

    it('breaks the line before the closing brace', () => {
      expect(encode(element({ hello: leaf('world') }))).toBe('{"hello": "world"\n}\n');
    });

    it('keeps the whole object on one line in single-line mode', () => {
      expect(encode(element({ hello: leaf('world') }), (enc) => enc.setSingleLine(true))).toBe(
        '{"hello": "world"}\n',
      );
    });

    it('sorts keys regardless of insertion order', () => {
      expect(encode(osm())).toBe(
        '{"-generator": "CGImap 0.0.2", "-version": "0.6", "bounds": {"-minlat": "1"\n}, "foo": "bar"\n}\n',
      );
    });

    it('encodes repeated labels as arrays and single ones as bare values', () => {
      const root = element({ item: [leaf('a'), leaf('b')], only: leaf('c') });
      expect(encode(root, (enc) => enc.setSingleLine(true))).toBe('{"item": ["a", "b"], "only": "c"}\n');
    });

    it('writes mixed content first under the content key', () => {
      const root = element({ a: leaf('1') }, 'text');
      expect(encode(root, (enc) => enc.setSingleLine(true))).toBe('{"content": "text", "a": "1"}\n');
    });

    it('applies the content prefix to the content key', () => {
      const root = element({ x: leaf('y') }, 'text');
      expect(encode(root, (enc) => enc.setContentPrefix('#'))).toBe('{"#content": "text", "x": "y"\n}\n');
    });

    it('escapes values and labels', () => {
      const root = element({ 'a"b': leaf('<script>') });
      expect(encode(root, (enc) => enc.setSingleLine(true))).toBe('{"a\\"b": "\\u003cscript\\u003e"}\n');
    });

    it('encodes an empty container as an empty string', () => {
      expect(encode(element({}))).toBe('""\n');
    });
  });

  describe('indented output', () => {
    it('puts every entry on its own line', () => {
      expect(encode(element({ hello: leaf('world') }), (enc) => enc.setIndent('  '))).toBe(
        '{\n  "hello": "world"\n}\n',
      );
    });

    it('indents nested objects by depth', () => {
      expect(encode(element({ a: element({ b: leaf('x') }) }), (enc) => enc.setIndent('  '))).toBe(
        '{\n  "a": {\n    "b": "x"\n  }\n}\n',
      );
    });

    it('indents objects inside arrays two levels deeper', () => {
      const root = element({ a: [element({ b: leaf('1') }), element({ b: leaf('2') })] });
      expect(encode(root, (enc) => enc.setIndent('  '))).toBe(
        '{\n  "a": [{\n      "b": "1"\n    }, {\n      "b": "2"\n    }]\n}\n',
      );
    });

    it('separates the content key with a line break', () => {
      const root = element({ x: leaf('y') }, 'text');
      expect(encode(root, (enc) => enc.setIndent('\t'))).toBe('{\n\t"content": "text",\n\t"x": "y"\n}\n');
    });

    it('ignores single-line mode', () => {
      const root = element({ hello: leaf('world') });
      expect(encode(root, (enc) => enc.setIndent(' ').setSingleLine(true))).toBe('{\n "hello": "world"\n}\n');
    });
  });

  describe('encode', () => {
    it('writes nothing for a missing root', () => {
      expect(encode(null)).toBe('');
    });

    it('can be called repeatedly, one value per line', () => {
      const sink = new StringSink();
      const enc = new Encoder(sink);
      enc.encode(leaf('a'));
      enc.encode(leaf('b'));
      expect(sink.toString()).toBe('"a"\n"b"\n');
    });

    it('stops writing after the first failed write and keeps failing', () => {
      const sink = new FailingSink(2);
      const enc = new Encoder(sink);
      const root = element({ hello: leaf('world') });

      const first = caught(() => enc.encode(root));
      expect(first).toBeInstanceOf(EncodeError);
      expect(first).toBe(enc.error);
      expect(enc.error?.cause).toEqual(new Error('disk full'));
      expect(sink.attempts).toBe(2);
      expect(sink.written).toEqual(['{']);

      expect(caught(() => enc.encode(leaf('again')))).toBe(first);
      expect(caught(() => enc.encode(null))).toBe(first);
      expect(sink.attempts).toBe(2);
    });

    it('overrides both prefixes for a single encodeWithPrefixes call', () => {
      const sink = new StringSink();
      const enc = new Encoder(sink).setContentPrefix('_');
      enc.encodeWithPrefixes(element({ x: leaf('y') }, 'text'), '#', '@');
      enc.encode(element({ x: leaf('z') }, 'more'));
      expect(sink.toString()).toBe('{"#content": "text", "x": "y"\n}\n{"_content": "more", "x": "z"\n}\n');
      expect(enc.settings()).toEqual({
        contentPrefix: '_',
        attributePrefix: '-',
        indent: false,
        indentText: '',
        singleLine: false,
      });
    });
  });

  describe('compareLabels', () => {
    it('orders by byte value', () => {
      expect(['b', 'B', 'a', '-x'].sort(compareLabels)).toEqual(['-x', 'B', 'a', 'b']);
    });

    it('orders supplementary characters after the rest of the BMP', () => {
      expect(compareLabels(String.fromCodePoint(0x1f600), String.fromCharCode(0xfffd))).toBeGreaterThan(0);
    });
  });

  describe('properties', () => {
    const labelArb = fc.string({ minLength: 1, maxLength: 8 }).map((s) => 'k' + s);

    it('emits keys in sorted order whatever the insertion order', () => {
      fc.assert(
        fc.property(fc.uniqueArray(labelArb, { minLength: 1, maxLength: 10 }), (labels) => {
          const children: Record<string, XmlNode> = {};
          for (const label of labels) {
            children[label] = leaf('v');
          }
          const parsed: Record<string, unknown> = JSON.parse(encode(element(children)));
          expect(Object.keys(parsed)).toEqual([...labels].sort(compareLabels));
        }),
      );
    });

    it('uses an array exactly when a label repeats', () => {
      fc.assert(
        fc.property(fc.array(fc.string(), { minLength: 1, maxLength: 6 }), (values) => {
          const parsed: unknown = JSON.parse(encode(element({ item: values.map(leaf) })));
          const expected = values.length === 1 ? values[0] : values;
          expect(parsed).toEqual({ item: expected });
        }),
      );
    });

    it('ends every encoding with exactly one newline', () => {
      fc.assert(
        fc.property(fc.array(fc.string(), { maxLength: 4 }), fc.boolean(), (values, indent) => {
          const out = encode(element({ item: values.map(leaf) }), (enc) => (indent ? enc.setIndent('  ') : enc));
          expect(out.endsWith('\n')).toBe(true);
          expect(out.endsWith('\n\n')).toBe(false);
        }),
      );
    });
  });
});
