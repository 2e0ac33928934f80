import { RequestType } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { convert } from '../core/convert';
import { XmlSyntaxError } from '../core/errors';
import { ConversionOptions } from '../core/settings';

export interface ConvertParams {
  uri: string;
}

export type ConvertResult = { json: string } | { error: string; line?: number; column?: number };

export const ConvertRequest = new RequestType<ConvertParams, ConvertResult, void>('xml2json/convert');

export function convertDocument(doc: TextDocument, options: ConversionOptions): ConvertResult {
  try {
    return { json: convert(doc.getText(), options) };
  } catch (e) {
    if (e instanceof XmlSyntaxError) {
      return { error: e.message, line: e.line, column: e.column };
    }
    throw e;
  }
}
