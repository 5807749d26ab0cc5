/**
 * Lexer Module - Pylite Analyzer
 * ==============================
 *
 * Scans Pylite source code into a stream of tokens for the parser, and keeps
 * the per-category tables and counters that the report exposes.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → [parser.ts] → SyntaxTree
 *
 * SCANNING ORDER (per character, first match wins):
 *   1. whitespace        skipped, never emitted
 *   2. '#'               rest of the line is a comment
 *   3. quote ' or "      string literal, '\' escapes the next character
 *   4. digit             number: digits plus at most one '.'
 *   5. letter or '_'     identifier or reserved word
 *   6. anything else     two-character symbol, then one-character symbol,
 *                        otherwise an Error token plus a diagnostic
 *
 * KNOWN GAPS (kept as-is):
 *
 * 1. UNTERMINATED STRINGS ARE SILENT
 *    A string that reaches the end of its line becomes an Error token that
 *    covers the rest of the line. It is counted as an error in the table but
 *    produces no diagnostic message; only unrecognized characters do.
 *
 * 2. STRINGS ARE NOT TABULATED
 *    String tokens bump the 'strings' counter but never land in the
 *    category table.
 *
 * @module pylite/server/src/analysis/lexer/lexer
 */

import { Token, TokenKind } from './token';
import { keywords, symbols } from './rules';

/** Raw lexemes grouped by category. Keys are part of the report format. */
export interface CategoryTable {
    PR: string[];
    ID: string[];
    Numeros: string[];
    Simbolos: string[];
    Error: string[];
}

export interface TokenStatistics {
    keywords: number;
    identifiers: number;
    numbers: number;
    strings: number;
    symbols: number;
    errors: number;
}

export interface LexicalReport {
    tokens: Token[];
    table: CategoryTable;
    statistics: TokenStatistics;
    /** Unrecognized-character messages only */
    errors: string[];
    /** Same as statistics.keywords */
    reservedWords: number;
}

const isDigit = (ch: string) => /[0-9]/.test(ch);
const isIdStart = (ch: string) => /[\p{L}_]/u.test(ch);
const isIdPart = (ch: string) => /[\p{L}0-9_]/u.test(ch);

export function lex(text: string): LexicalReport {
    const report: LexicalReport = {
        tokens: [],
        table: { PR: [], ID: [], Numeros: [], Simbolos: [], Error: [] },
        statistics: { keywords: 0, identifiers: 0, numbers: 0, strings: 0, symbols: 0, errors: 0 },
        errors: [],
        reservedWords: 0
    };

    const lines = text.split('\n');
    for (let n = 0; n < lines.length; n++) {
        scanLine(report, lines[n], n + 1);
    }

    report.reservedWords = report.statistics.keywords;
    return report;
}

function scanLine(report: LexicalReport, line: string, lineNum: number): void {
    let i = 0;

    // columns advance one per consumed character, so column is always i + 1
    const push = (kind: TokenKind, text: string) => {
        addToken(report, { kind, text, line: lineNum, column: i + 1 });
        i += text.length;
    };

    while (i < line.length) {
        const ch = line[i];

        // whitespace
        if (/\s/.test(ch)) {
            i++;
            continue;
        }

        // line comment
        if (ch === '#') {
            break;
        }

        // string literal '...' or "..."
        if (ch === '"' || ch === "'") {
            let j = i + 1;
            while (j < line.length && line[j] !== ch) {
                if (line[j] === '\\' && j + 1 < line.length) j += 2;
                else j++;
            }
            if (j >= line.length) {
                // unterminated: swallow the rest of the line, no message
                push(TokenKind.Error, line.slice(i));
                continue;
            }
            push(TokenKind.String, line.slice(i, j + 1));
            continue;
        }

        // number - a second '.' ends it without complaint
        if (isDigit(ch)) {
            let j = i;
            let seenDot = false;
            while (j < line.length && (isDigit(line[j]) || line[j] === '.')) {
                if (line[j] === '.') {
                    if (seenDot) break;
                    seenDot = true;
                }
                j++;
            }
            push(TokenKind.Number, line.slice(i, j));
            continue;
        }

        // identifier / keyword
        if (isIdStart(ch)) {
            let j = i;
            while (j < line.length && isIdPart(line[j])) j++;
            const value = line.slice(i, j);
            push(keywords.has(value) ? TokenKind.Keyword : TokenKind.Identifier, value);
            continue;
        }

        // two-character symbols first, otherwise '==' would become '=' '='
        const twoChar = line.slice(i, i + 2);
        if (twoChar.length === 2 && symbols.includes(twoChar)) {
            push(TokenKind.Symbol, twoChar);
            continue;
        }

        if (symbols.includes(ch)) {
            push(TokenKind.Symbol, ch);
            continue;
        }

        // unknown char → error token + diagnostic
        report.errors.push(`unrecognized character '${ch}' at line ${lineNum}, column ${i + 1}`);
        push(TokenKind.Error, ch);
    }
}

function addToken(report: LexicalReport, token: Token): void {
    report.tokens.push(token);

    const { table, statistics } = report;
    switch (token.kind) {
        case TokenKind.Keyword:
            table.PR.push(token.text);
            statistics.keywords++;
            break;
        case TokenKind.Identifier:
            table.ID.push(token.text);
            statistics.identifiers++;
            break;
        case TokenKind.Number:
            table.Numeros.push(token.text);
            statistics.numbers++;
            break;
        case TokenKind.String:
            statistics.strings++;
            break;
        case TokenKind.Symbol:
            table.Simbolos.push(token.text);
            statistics.symbols++;
            break;
        case TokenKind.Error:
            table.Error.push(token.text);
            statistics.errors++;
            break;
        default:
            break;
    }
}
