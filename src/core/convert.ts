import { decodeXml } from './decoder';
import { Encoder } from './encoder';
import { ConversionOptions, ConversionOptionsInput, parseConversionOptions } from './settings';
import { OutputSink, StringSink } from './sink';

export function createEncoder(sink: OutputSink, options: ConversionOptions): Encoder {
  const encoder = new Encoder(sink)
    .setContentPrefix(options.contentPrefix)
    .setAttributePrefix(options.attributePrefix)
    .setSingleLine(options.singleLine);
  if (options.indent) {
    encoder.setIndent(options.indent);
  }
  return encoder;
}

/**
 * Decodes `xml` and writes its JSON form to `sink`. Throws `XmlSyntaxError`
 * before anything is written if the document does not parse.
 */
export function convertTo(xml: string, sink: OutputSink, options: ConversionOptionsInput = {}): void {
  const encoder = createEncoder(sink, parseConversionOptions(options, 'conversion options'));
  const root = decodeXml(xml, { attributePrefix: encoder.settings().attributePrefix });
  encoder.encode(root);
}

export function convert(xml: string, options: ConversionOptionsInput = {}): string {
  const sink = new StringSink();
  convertTo(xml, sink, options);
  return sink.toString();
}
