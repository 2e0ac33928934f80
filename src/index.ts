export type { XmlNode } from './core/node';
export { addChild, createNode, element, hasChildren, leaf } from './core/node';
export { sanitizeString } from './core/sanitize';
export type { EncoderSettings } from './core/encoder';
export { Encoder, compareLabels, DEFAULT_ATTRIBUTE_PREFIX, DEFAULT_CONTENT_PREFIX } from './core/encoder';
export type { OutputSink } from './core/sink';
export { StringSink, FileDescriptorSink } from './core/sink';
export type { DecodeOptions } from './core/decoder';
export { decodeXml } from './core/decoder';
export { convert, convertTo, createEncoder } from './core/convert';
export type { ConversionOptions, ConversionOptionsInput } from './core/settings';
export { conversionOptionsSchema, parseConversionOptions, DEFAULT_OPTIONS } from './core/settings';
export { ConversionError, EncodeError, SettingsError, XmlSyntaxError } from './core/errors';
