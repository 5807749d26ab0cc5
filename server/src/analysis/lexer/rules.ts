/**
 * Rules Module - Pylite Scanner Rules
 * ===================================
 *
 * Reserved words and the symbol list for the Python-like subset.
 * Both tables are frozen at load time and only ever read, so any number of
 * concurrent analyses can share them.
 *
 * @module pylite/server/src/analysis/lexer/rules
 */

// Reserved words - identifier-shaped lexemes classified as Keyword
export const keywords: ReadonlySet<string> = new Set([
  // Definitions and control flow
  'def', 'if', 'else', 'elif', 'while', 'for', 'in',
  'try', 'except', 'finally', 'with', 'as', 'pass',
  'break', 'continue', 'return', 'yield',
  'import', 'from', 'class',
  // Operators/values
  'and', 'or', 'not', 'is', 'lambda',
  'None', 'True', 'False',
  // Builtins
  'print'
]);

/**
 * Symbol list
 *
 * CRITICAL: The scanner tries every two-character symbol before any
 * one-character symbol, so '==' never becomes two '=' tokens.
 *
 * '#' is listed but never reached: the scanner treats it as a comment start
 * before symbol matching runs.
 */
export const symbols: readonly string[] = Object.freeze([
  '==', '!=', '<=', '>=', '>>', '<<', '**', '//', '+=', '-=', '*=', '/=',
  '=', '+', '-', '*', '/', '%', '<', '>', '(', ')', '[', ']', '{', '}',
  ':', ';', ',', '.', '&', '|', '^', '~', '!', '@', '#', '$', '?'
]);
