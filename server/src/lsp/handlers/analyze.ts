/**
 * `pylite/analyze` request
 *
 * Returns the full analysis report for an open document (`{ uri }`) or for
 * raw source text (`{ text }`): tokens, tree, diagnostics and the variable
 * table in one record.
 */

import { Connection, ResponseError, ErrorCodes, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { z } from 'zod';
import { Analyzer } from '../../analysis/project/graph';
import { Report } from '../../analysis/report';

export const ANALYZE_REQUEST = 'pylite/analyze';

export const analyzeParamsSchema = z.union([
    z.object({ text: z.string() }),
    z.object({ uri: z.string() })
]);

export type AnalyzeParams = z.infer<typeof analyzeParamsSchema>;

/** Resolve the request against the open documents; null for an unknown URI. */
export function handleAnalyze(params: AnalyzeParams, docs: TextDocuments<TextDocument>): Report | null {
    const analyser = Analyzer.instance();
    if ('text' in params) {
        return analyser.analyzeText(params.text);
    }
    const doc = docs.get(params.uri);
    return doc ? analyser.analyzeDocument(doc) : null;
}

export function registerAnalyze(conn: Connection, docs: TextDocuments<TextDocument>): void {
    conn.onRequest(ANALYZE_REQUEST, (raw: unknown): Report | ResponseError => {
        const parsed = analyzeParamsSchema.safeParse(raw);
        if (!parsed.success) {
            return new ResponseError(ErrorCodes.InvalidParams, `expected { text } or { uri }: ${parsed.error.message}`);
        }
        return handleAnalyze(parsed.data, docs)
            ?? new ResponseError(ErrorCodes.InvalidParams, 'document is not open');
    });
}
