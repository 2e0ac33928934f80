import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeParams,
  InitializeResult,
  TextDocumentSyncKind,
  TextDocumentChangeEvent,
  DidChangeConfigurationNotification,
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { SettingsError } from '../core/errors';
import { ConversionOptions, DEFAULT_OPTIONS, parseConversionOptions } from '../core/settings';
import { validateDocument } from './diagnosticsProvider';
import { ConvertParams, ConvertRequest, ConvertResult, convertDocument } from './conversionProvider';

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let globalSettings: ConversionOptions = DEFAULT_OPTIONS;

connection.onInitialize((_params: InitializeParams): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Full,
    },
  };
});

connection.onInitialized(() => {
  connection.client.register(DidChangeConfigurationNotification.type).catch((e: unknown) => {
    connection.console.warn(`Could not register for configuration changes: ${e}`);
  });
});

connection.onDidChangeConfiguration((change) => {
  try {
    globalSettings = parseConversionOptions(settingsSection(change.settings), 'workspace settings');
  } catch (e) {
    if (!(e instanceof SettingsError)) throw e;
    connection.console.warn(`${e.message}; using defaults`);
    globalSettings = DEFAULT_OPTIONS;
  }
  // Re-validate all open documents
  documents.all().forEach(validateOpenDocument);
});

function settingsSection(settings: unknown): unknown {
  if (settings && typeof settings === 'object' && 'xml2json' in settings) {
    return settings.xml2json;
  }
  return undefined;
}

function validateOpenDocument(doc: TextDocument): void {
  const diagnostics = validateDocument(doc);
  connection.sendDiagnostics({ uri: doc.uri, diagnostics }).catch((e: unknown) => {
    connection.console.error(`Error publishing diagnostics for ${doc.uri}: ${e}`);
  });
}

documents.onDidChangeContent((change: TextDocumentChangeEvent<TextDocument>) => {
  validateOpenDocument(change.document);
});

documents.onDidClose((event) => {
  connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] }).catch((e: unknown) => {
    connection.console.error(`Error clearing diagnostics for ${event.document.uri}: ${e}`);
  });
});

connection.onRequest(ConvertRequest, (params: ConvertParams): ConvertResult => {
  const doc = documents.get(params.uri);
  if (!doc) {
    return { error: `Document not open: ${params.uri}` };
  }
  const result = convertDocument(doc, globalSettings);
  if ('error' in result) {
    connection.console.log(`Conversion of ${params.uri} failed: ${result.error}`);
  }
  return result;
});

documents.listen(connection);
connection.listen();
