/**
 * Analyzer façade
 * ===============
 *
 * Lazily analyses documents and turns reports into LSP diagnostics.
 *
 * Reports for editor documents are cached per normalised URI and dropped
 * when the document version changes. Each report comes from its own
 * `analyze()` call, so the cache only saves re-running the pipeline on
 * unchanged text. Files read from disk carry no version and are never cached.
 */

import { TextDocument } from 'vscode-languageserver-textdocument';
import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver';
import { Report, analyze, emptyReport } from '../report';
import { DEFAULT_MAX_NESTING_DEPTH } from '../ast/parser';
import { normalizeUri } from '../../util/uri';

export const DIAGNOSTIC_SOURCE = 'pylite';

export type DiagnosticStage = 'lexical' | 'syntax' | 'semantic';

interface CachedReport {
    version: number;
    report: Report;
}

const LEXICAL_POSITION = /at line (\d+), column (\d+)$/;
const SYNTAX_LINE = /^error at line (\d+):/;
const SEMANTIC_LINE = /^semantic error at line (\d+):/;

/** Singleton façade that analyses files and answers LSP queries. */
export class Analyzer {
    private static _instance: Analyzer;
    static instance(): Analyzer {
        if (!Analyzer._instance) Analyzer._instance = new Analyzer();
        return Analyzer._instance;
    }

    private docCache = new Map<string, CachedReport>();
    private maxNestingDepth = DEFAULT_MAX_NESTING_DEPTH;
    private failureCount = 0;

    setMaxNestingDepth(depth: number): void {
        if (depth !== this.maxNestingDepth) {
            this.maxNestingDepth = depth;
            // reports built under the old ceiling are stale
            this.docCache.clear();
        }
    }

    /** Run the pipeline on raw text. Never throws. */
    analyzeText(text: string): Report {
        try {
            return analyze(text, { maxNestingDepth: this.maxNestingDepth });
        } catch (err) {
            // unexpected failure: log it and hand back an empty report
            this.failureCount++;
            console.error(`Analysis failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
            return emptyReport();
        }
    }

    analyzeDocument(doc: TextDocument): Report {
        const key = normalizeUri(doc.uri);
        const cached = this.docCache.get(key);
        if (cached && cached.version === doc.version) {
            return cached.report;
        }

        const report = this.analyzeText(doc.getText());
        this.docCache.set(key, { version: doc.version, report });
        return report;
    }

    forget(uri: string): void {
        this.docCache.delete(normalizeUri(uri));
    }

    getStats() {
        return { documents: this.docCache.size, failures: this.failureCount };
    }

    runDiagnostics(doc: TextDocument): Diagnostic[] {
        return Analyzer.toDiagnostics(this.analyzeDocument(doc), doc);
    }

    /** Diagnostics for text that is not open in the editor. Leaves the cache alone. */
    diagnoseText(uri: string, text: string): Diagnostic[] {
        return Analyzer.toDiagnostics(this.analyzeText(text), TextDocument.create(uri, 'pylite', 0, text));
    }

    private static toDiagnostics(report: Report, doc: TextDocument): Diagnostic[] {
        const diags: Diagnostic[] = [];

        for (const message of report.lexical.errors) {
            const m = LEXICAL_POSITION.exec(message);
            if (!m) continue;
            const line = parseInt(m[1], 10) - 1;
            const character = parseInt(m[2], 10) - 1;
            diags.push(Analyzer.makeDiagnostic(
                { start: { line, character }, end: { line, character: character + 1 } },
                message,
                'lexical'
            ));
        }

        for (const message of report.syntax.errors) {
            diags.push(Analyzer.makeDiagnostic(Analyzer.lineRange(doc, SYNTAX_LINE, message), message, 'syntax'));
        }

        for (const message of report.semantic.errors) {
            diags.push(Analyzer.makeDiagnostic(Analyzer.lineRange(doc, SEMANTIC_LINE, message), message, 'semantic'));
        }

        return diags;
    }

    private static makeDiagnostic(range: Range, message: string, stage: DiagnosticStage): Diagnostic {
        return {
            range,
            message,
            severity: DiagnosticSeverity.Error,
            source: DIAGNOSTIC_SOURCE,
            code: stage
        };
    }

    /* whole-line range for a message that carries only a line number */
    private static lineRange(doc: TextDocument, pattern: RegExp, message: string): Range {
        const m = pattern.exec(message);
        const line = Math.max(0, Math.min((m ? parseInt(m[1], 10) : 1) - 1, doc.lineCount - 1));
        const text = doc.getText({ start: { line, character: 0 }, end: { line: line + 1, character: 0 } });
        return {
            start: { line, character: 0 },
            end: { line, character: text.replace(/\r?\n$/, '').length }
        };
    }
}
