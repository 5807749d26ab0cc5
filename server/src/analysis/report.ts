/**
 * Analysis pipeline: text → tokens → tree → diagnostics + variable table.
 *
 * Every stage runs on whatever the previous one produced, however broken.
 * The result is a plain JSON-serialisable record; nothing is kept between
 * calls.
 */

import { Token, TokenKind } from './lexer/token';
import { CategoryTable, TokenStatistics, lex } from './lexer/lexer';
import { parse, firstErrorLine } from './ast/parser';
import { SerializedNode, serializeNode } from './ast/printer';
import { check } from './semantic/checker';
import { Variable } from './semantic/types';

export interface AnalyzeOptions {
    maxNestingDepth?: number;
}

export interface TokenRecord {
    type: string;
    value: string;
    line: number;
    column: number;
}

export interface LexicalSection {
    tokens: TokenRecord[];
    table: CategoryTable;
    statistics: TokenStatistics;
    errors: string[];
    reserved_words: number;
}

export interface SyntaxSection {
    ast: SerializedNode;
    errors: string[];
    success: boolean;
    error_line: number;
}

export interface SemanticSection {
    errors: string[];
    variables: Record<string, Variable>;
    type_mismatches: string[];
    success: boolean;
}

export interface Report {
    lexical: LexicalSection;
    syntax: SyntaxSection;
    semantic: SemanticSection;
    /** syntax and semantic both clean; lexical errors do not count */
    success: boolean;
    error?: string;
}

function tokenRecord(t: Token): TokenRecord {
    return { type: TokenKind[t.kind], value: t.text, line: t.line, column: t.column };
}

export function analyze(source: string, options: AnalyzeOptions = {}): Report {
    const lexical = lex(source);
    const syntax = parse(lexical.tokens, options);
    const semantic = check(lexical.tokens, syntax.root, options);

    const report: Report = {
        lexical: {
            tokens: lexical.tokens.map(tokenRecord),
            table: lexical.table,
            statistics: lexical.statistics,
            errors: lexical.errors,
            reserved_words: lexical.reservedWords
        },
        syntax: {
            ast: serializeNode(syntax.root),
            errors: syntax.errors,
            success: syntax.errors.length === 0,
            error_line: firstErrorLine(syntax.errors)
        },
        semantic: {
            errors: semantic.errors,
            variables: Object.fromEntries(semantic.variables),
            type_mismatches: semantic.typeMismatches,
            success: semantic.success
        },
        success: syntax.errors.length === 0 && semantic.success
    };

    if (syntax.errors.length > 0) {
        report.error = `syntax errors: ${syntax.errors.join('; ')}`;
    } else if (!semantic.success) {
        report.error = `semantic errors: ${semantic.errors.join('; ')}`;
    }

    return report;
}

/** A report for empty input, used when the pipeline could not run at all. */
export function emptyReport(): Report {
    return analyze('');
}
