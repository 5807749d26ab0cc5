import {
    createConnection,
    TextDocuments,
    TextDocumentSyncKind,
    ProposedFeatures,
    InitializeParams,
    InitializeResult
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import * as url from 'node:url';
import { registerAllHandlers } from './lsp/registerAll';
import { revalidateOpenFiles, WorkspaceState } from './lsp/handlers/workspace';
import { Analyzer } from './analysis/project/graph';
import { defaultConfig, getConfiguration } from './util/config';


// Create LSP connection (stdio or Node IPC autodetect).
const connection = createConnection(ProposedFeatures.all);

// Track open documents — in-memory mirror of the client.
export const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const state: WorkspaceState = { roots: [], config: defaultConfig };

connection.onInitialize((params: InitializeParams): InitializeResult => {
    const folders = params.workspaceFolders ?? [];
    if (folders.length > 0) {
        state.roots = folders.map(f => url.fileURLToPath(f.uri));
    } else if (params.rootUri) {
        state.roots = [url.fileURLToPath(params.rootUri)];
    }

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Incremental
        }
    };
});

async function loadConfiguration(): Promise<void> {
    state.config = await getConfiguration(connection);
    Analyzer.instance().setMaxNestingDepth(state.config.maxNestingDepth);
    console.log(
        `Pylite settings: maxNestingDepth=${state.config.maxNestingDepth}, ` +
        `fileExtensions=${state.config.fileExtensions.join(', ')}`
    );
}

connection.onInitialized(async () => {
    await loadConfiguration();
    console.log(`Workspace roots: ${state.roots.join(', ') || '(none)'}`);
});

connection.onDidChangeConfiguration(async () => {
    await loadConfiguration();
    revalidateOpenFiles(connection, documents);
});

// Wire all feature handlers.
registerAllHandlers(connection, documents, () => state);

documents.listen(connection);

// Start listening after the handlers were registered.
connection.listen();
