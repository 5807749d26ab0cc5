import { Connection, Diagnostic, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import * as url from 'node:url';
import { Analyzer, DiagnosticStage } from '../../analysis/project/graph';
import { findAllFiles, readFileUtf8 } from '../../util/fs';
import { ServerConfig } from '../../util/config';

export const CHECK_WORKSPACE_REQUEST = 'pylite/checkWorkspace';
export const REVALIDATE_NOTIFICATION = 'pylite/revalidateOpenFiles';

export interface WorkspaceState {
    roots: string[];
    config: ServerConfig;
}

export interface WorkspaceCheckResult {
    filesChecked: number;
    filesWithIssues: number;
    totalIssues: number;
}

/** Count diagnostics per pipeline stage, e.g. "2 syntax, 1 semantic". */
export function summarizeStages(diagnostics: readonly Diagnostic[]): string {
    const counts: Record<DiagnosticStage, number> = { lexical: 0, syntax: 0, semantic: 0 };
    for (const d of diagnostics) {
        if (d.code === 'lexical' || d.code === 'syntax' || d.code === 'semantic') counts[d.code]++;
    }
    const parts: string[] = [];
    if (counts.lexical) parts.push(`${counts.lexical} lexical`);
    if (counts.syntax) parts.push(`${counts.syntax} syntax`);
    if (counts.semantic) parts.push(`${counts.semantic} semantic`);
    return parts.join(', ');
}

export function registerWorkspace(
    conn: Connection,
    docs: TextDocuments<TextDocument>,
    state: () => WorkspaceState
): void {
    // Handle request to check all workspace files
    conn.onRequest(CHECK_WORKSPACE_REQUEST, async (): Promise<WorkspaceCheckResult> => {
        const { roots, config } = state();
        console.log(`Checking all workspace files in ${roots.join(', ')}...`);

        const files: string[] = [];
        for (const root of roots) {
            try {
                files.push(...await findAllFiles(root, config.fileExtensions));
            } catch (err) {
                console.warn(`Failed to scan path: ${root} – ${String(err)}`);
            }
        }

        return checkFiles(files, (uri, diagnostics) => {
            // Publish so they show in the Problems panel
            void conn.sendDiagnostics({ uri, diagnostics });
        });
    });

    conn.onNotification(REVALIDATE_NOTIFICATION, () => revalidateOpenFiles(conn, docs));
}

/**
 * Analyse files straight from disk and hand every file with issues to
 * `publish`. A file that cannot be read is logged and skipped.
 */
export async function checkFiles(
    files: readonly string[],
    publish: (uri: string, diagnostics: Diagnostic[]) => void,
    analyser: Analyzer = Analyzer.instance()
): Promise<WorkspaceCheckResult> {
    const all: Diagnostic[] = [];
    let filesChecked = 0;
    let filesWithIssues = 0;

    for (const filePath of files) {
        let text: string;
        try {
            text = await readFileUtf8(filePath);
        } catch (err) {
            console.warn(`Failed to read file: ${filePath} – ${String(err)}`);
            continue;
        }
        filesChecked++;

        const uri = url.pathToFileURL(filePath).toString();
        const diagnostics = analyser.diagnoseText(uri, text);
        if (diagnostics.length > 0) {
            filesWithIssues++;
            all.push(...diagnostics);
            publish(uri, diagnostics);
        }
    }

    console.log(`Checked ${filesChecked} files, found issues in ${filesWithIssues} files`);
    if (all.length > 0) {
        console.log(`  Breakdown: ${summarizeStages(all)}`);
    }

    return { filesChecked, filesWithIssues, totalIssues: all.length };
}

/** Re-publish diagnostics for every open document. */
export function revalidateOpenFiles(conn: Connection, docs: TextDocuments<TextDocument>): void {
    const analyser = Analyzer.instance();
    for (const doc of docs.all()) {
        void conn.sendDiagnostics({ uri: doc.uri, diagnostics: analyser.runDiagnostics(doc) });
    }
}
