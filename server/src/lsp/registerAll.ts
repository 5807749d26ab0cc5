import { Connection, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { registerDocuments } from './handlers/documents';
import { registerAnalyze } from './handlers/analyze';
import { registerWorkspace, WorkspaceState } from './handlers/workspace';

export function registerAllHandlers(
    conn: Connection,
    docs: TextDocuments<TextDocument>,
    state: () => WorkspaceState
): void {
    registerDocuments(conn, docs);
    registerAnalyze(conn, docs);
    registerWorkspace(conn, docs, state);
}
