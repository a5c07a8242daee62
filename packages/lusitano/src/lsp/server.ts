import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeResult,
  TextDocumentSyncKind,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';
import { compile } from '../compiler';
import { completionItems, hoverAt, toLspDiagnostics } from './features';

// Create a connection for the server, using Node's IPC as a transport.
// Also include all preview / proposed LSP features.
const connection = createConnection(ProposedFeatures.all);

// Create a simple text document manager.
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

connection.onInitialize((): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: false
      },
      hoverProvider: true
    }
  };
});

// The content of a text document has changed. This event is emitted
// when the text document first opened or when its content has changed.
documents.onDidChangeContent(change => {
  validateTextDocument(change.document);
});

documents.onDidClose(event => {
  connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] });
});

function validateTextDocument(textDocument: TextDocument) {
  const text = textDocument.getText();
  try {
    const result = compile(text);
    const diagnostics = toLspDiagnostics([...result.diagnostics, ...result.warnings], text);
    connection.sendDiagnostics({ uri: textDocument.uri, diagnostics });
  } catch (e: unknown) {
    connection.console.error(`lusitano: failed to check ${textDocument.uri}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

connection.onCompletion(() => completionItems());

connection.onHover(params => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return null;
  const result = compile(doc.getText());
  return hoverAt(result.program, params.position.line, params.position.character);
});

// Make the text document manager listen on the connection
// for open, change and close text document events
documents.listen(connection);

// Listen on the connection
connection.listen();
