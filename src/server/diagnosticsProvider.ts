import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { decodeXml } from '../core/decoder';
import { XmlSyntaxError } from '../core/errors';

/**
 * Reports the first XML syntax error in the document, if any. Conversion stops
 * at that error, so later ones are not reported.
 */
export function validateDocument(doc: TextDocument): Diagnostic[] {
  try {
    decodeXml(doc.getText());
    return [];
  } catch (e) {
    if (!(e instanceof XmlSyntaxError)) {
      throw e;
    }
    return [
      {
        severity: DiagnosticSeverity.Error,
        range: errorRange(e.line, e.column),
        message: e.message,
        source: 'xml2json',
      },
    ];
  }
}

// sax points just past the offending character
function errorRange(line: number, column: number): Range {
  const start = Math.max(0, column - 1);
  return {
    start: { line, character: start },
    end: { line, character: Math.max(start, column) },
  };
}
