/**
 * Token Module - Pylite Analyzer
 * ==============================
 *
 * Defines the token types produced by the scanner. Tokens are the atomic units
 * that the parser consumes to build the syntax tree.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → [parser.ts] → SyntaxTree → [checker.ts]
 *
 * @module pylite/server/src/analysis/lexer/token
 */

/**
 * Token kinds for the Pylite scanner
 *
 * Each token produced by the scanner has one of these kinds:
 *   - Keyword: Reserved words like 'def', 'if', 'print'
 *   - Identifier: Variable, function and method names
 *   - Number: Digit runs with at most one '.'
 *   - String: Quoted literals '...' or "..." (quotes included)
 *   - Symbol: Operators and punctuation from the symbol list
 *   - Whitespace / Newline: never emitted by the scanner, filtered by the parser
 *   - Error: Unrecognized characters and unterminated strings
 */
export enum TokenKind {
  Keyword,
  Identifier,
  Number,
  String,
  Symbol,
  Whitespace,
  Newline,
  Error
}

/**
 * Token interface - represents a single lexical token
 *
 * @property kind - The type of token (from TokenKind enum)
 * @property text - The lexeme exactly as it appears in source
 * @property line - 1-based line number
 * @property column - 1-based column, counted per consumed character
 */
export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly column: number;
}

/**
 * Tokens the parser never sees. Error tokens are already reported (or
 * deliberately silent) at scan time, so the grammar works on the rest.
 */
export function skippedByParser(t: Token): boolean {
  return t.kind === TokenKind.Whitespace || t.kind === TokenKind.Newline || t.kind === TokenKind.Error;
}
