import { EncodeError } from './errors';
import { XmlNode, hasChildren } from './node';
import { sanitizeString } from './sanitize';
import { OutputSink } from './sink';

export const DEFAULT_CONTENT_PREFIX = '';
export const DEFAULT_ATTRIBUTE_PREFIX = '-';

export interface EncoderSettings {
  contentPrefix: string;
  attributePrefix: string;
  indent: boolean;
  indentText: string;
  singleLine: boolean;
}

/**
 * Writes a tree as JSON text to a sink.
 *
 * Containers become objects with their labels in byte order; a label with
 * several children becomes an array, a label with one child its bare value.
 * A container's own text goes under `<contentPrefix>content` ahead of the
 * labels. The first failed write poisons the encoder: every later `encode`
 * throws the same error without touching the sink.
 *
 * Not safe for concurrent use; the input tree is only read.
 */
export class Encoder {
  private err: EncodeError | undefined;
  private contentPrefix = DEFAULT_CONTENT_PREFIX;
  private attributePrefix = DEFAULT_ATTRIBUTE_PREFIX;
  private indent = false;
  private indentText = '';
  private singleLine = false;

  constructor(private readonly sink: OutputSink) {}

  /**
   * Labels coming from attributes carry this prefix. The encoder writes labels
   * as they are; the prefix is kept so that decoding can be configured from
   * the same encoder (see `settings()`).
   */
  setAttributePrefix(prefix: string): this {
    this.attributePrefix = prefix;
    return this;
  }

  setContentPrefix(prefix: string): this {
    this.contentPrefix = prefix;
    return this;
  }

  /** Turns on multi-line output, repeating `text` once per nesting level. */
  setIndent(text: string): this {
    this.indent = true;
    this.indentText = text;
    return this;
  }

  /**
   * Compact output normally still breaks the line before each closing brace.
   * Single-line mode drops that newline. No effect once indentation is on.
   */
  setSingleLine(singleLine: boolean): this {
    this.singleLine = singleLine;
    return this;
  }

  settings(): EncoderSettings {
    return {
      contentPrefix: this.contentPrefix,
      attributePrefix: this.attributePrefix,
      indent: this.indent,
      indentText: this.indentText,
      singleLine: this.singleLine,
    };
  }

  get error(): EncodeError | undefined {
    return this.err;
  }

  /** Encodes with the given prefixes in place of the configured ones for this call only. */
  encodeWithPrefixes(root: XmlNode | null | undefined, contentPrefix: string, attributePrefix: string): void {
    const savedContent = this.contentPrefix;
    const savedAttribute = this.attributePrefix;
    this.contentPrefix = contentPrefix;
    this.attributePrefix = attributePrefix;
    try {
      this.encode(root);
    } finally {
      this.contentPrefix = savedContent;
      this.attributePrefix = savedAttribute;
    }
  }

  /** Writes one JSON value and a newline. A missing root writes nothing. */
  encode(root: XmlNode | null | undefined): void {
    if (this.err) {
      throw this.err;
    }
    if (!root) {
      return;
    }

    this.format(root, 0);
    this.write('\n');

    if (this.err) {
      throw this.err;
    }
  }

  private format(node: XmlNode, depth: number): void {
    if (!hasChildren(node)) {
      this.write(sanitizeString(node.data));
      return;
    }

    const separator = this.indent ? ',\n' : ', ';

    this.write('{');
    if (this.indent) {
      this.write('\n');
    }

    // Mixed content: the element's own text goes first, under a synthetic key.
    if (node.data.length > 0) {
      this.writeIndent(depth + 1);
      this.write(sanitizeString(this.contentPrefix + 'content'), ': ', sanitizeString(node.data), separator);
    }

    const labels = [...node.children.keys()];
    if (labels.length > 1) {
      labels.sort(compareLabels);
    }

    for (let i = 0; i < labels.length; i++) {
      const label = labels[i];
      const children = node.children.get(label) ?? [];
      if (i > 0) {
        this.write(separator);
      }
      this.writeIndent(depth + 1);
      this.write(sanitizeString(label), ': ');

      if (children.length === 1) {
        this.format(children[0], depth + 1);
      } else {
        this.write('[');
        for (let j = 0; j < children.length; j++) {
          if (j > 0) {
            this.write(', ');
          }
          this.format(children[j], depth + 2);
        }
        this.write(']');
      }
    }

    if (this.indent || !this.singleLine) {
      this.write('\n');
    }
    this.writeIndent(depth);
    this.write('}');
  }

  private writeIndent(n: number): void {
    if (!this.indent) return;
    for (let i = 0; i < n; i++) {
      this.write(this.indentText);
    }
  }

  private write(...chunks: string[]): void {
    for (const chunk of chunks) {
      if (this.err) return;
      try {
        this.sink.write(chunk);
      } catch (e) {
        this.err = new EncodeError(e);
      }
    }
  }
}

/** Orders labels by their UTF-8 bytes. */
export function compareLabels(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}
