import {
    Connection,
    TextDocumentChangeEvent,
    TextDocuments
} from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Analyzer } from '../../analysis/project/graph';

export const DEBOUNCE_MS = 300;

export function registerDocuments(conn: Connection, docs: TextDocuments<TextDocument>): void {
    const analyser = Analyzer.instance();

    const publish = (doc: TextDocument) => {
        const diagnostics = analyser.runDiagnostics(doc);
        void conn.sendDiagnostics({ uri: doc.uri, diagnostics });
    };

    const validate = (change: TextDocumentChangeEvent<TextDocument>) => publish(change.document);

    // Debounce timers per-URI so each file gets its own delay
    const debounceTimers = new Map<string, ReturnType<typeof setTimeout>>();

    const cancelPending = (uri: string) => {
        const pending = debounceTimers.get(uri);
        if (pending) {
            clearTimeout(pending);
            debounceTimers.delete(uri);
        }
    };

    docs.onDidOpen(validate);
    docs.onDidSave((change) => {
        // On save: cancel any pending debounce and run immediately
        cancelPending(change.document.uri);
        validate(change);
    });
    docs.onDidChangeContent((change) => {
        const uri = change.document.uri;
        cancelPending(uri);
        debounceTimers.set(uri, setTimeout(() => {
            debounceTimers.delete(uri);
            // Re-fetch the latest document — the user may have typed more
            const latestDoc = docs.get(uri);
            if (latestDoc) publish(latestDoc);
        }, DEBOUNCE_MS));
    });

    docs.onDidClose((change) => {
        const uri = change.document.uri;
        cancelPending(uri);
        analyser.forget(uri);
        void conn.sendDiagnostics({ uri, diagnostics: [] });
    });
}
