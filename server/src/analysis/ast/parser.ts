/**********************************************************************
 *  Recursive-descent parser for Pylite
 *  ===================================
 *
 *  Walks the token list once (whitespace, newline and error tokens
 *  removed) and builds the syntax tree:
 *
 *      program      := statement*
 *      statement    := functionDef | ifStatement | printStatement
 *                    | IDENT '=' expression        (assignment)
 *                    | expression                  (expression statement)
 *      functionDef  := 'def' IDENT '(' (IDENT (',' IDENT)*)? ')' ':' block
 *      ifStatement  := 'if' expression ':' block
 *      expression   := term (('>'|'<'|'>='|'<='|'=='|'!=') term)*
 *      term         := factor (('+'|'-') factor)*
 *      factor       := '(' expression ')' | NUMBER | STRING
 *                    | IDENT ( '(' args? ')' | '.' IDENT '(' args? ')' )?
 *
 *  There is deliberately no '*' / '/' level.
 *
 *  BLOCKS
 *  Layout is ignored. A block collects statements until the current or the
 *  next token is 'def' or 'if', or until at most one token is left. Blocks
 *  therefore never nest.
 *
 *  ERROR RECOVERY
 *  A production that does not match records "error at line L: expected X"
 *  and returns null. Whoever receives a null statement skips exactly one
 *  token and tries again, so parsing always terminates with a tree.
 *
 *  NESTING CEILING
 *  Parenthesised expressions and call arguments recurse. Past
 *  `maxNestingDepth` a NestingDepthError unwinds to the statement loop,
 *  which reports it and resumes on the next source line.
 *
 *********************************************************************/

import { Token, TokenKind, skippedByParser } from '../lexer/token';
import {
    BinaryOperator,
    BlockNode,
    ExpressionNode,
    ParameterNode,
    ProgramNode,
    StatementNode,
    additiveOperators,
    comparisonOperators
} from './nodes';

export const DEFAULT_MAX_NESTING_DEPTH = 200;

export interface ParseOptions {
    maxNestingDepth?: number;
}

export interface ParseResult {
    root: ProgramNode;
    errors: string[];
}

export class NestingDepthError extends Error {
    constructor(
        public readonly line: number,
        public readonly limit: number
    ) {
        super(`maximum nesting depth of ${limit} exceeded`);
        this.name = 'NestingDepthError';
    }
}

// parse entry point
export function parse(tokens: readonly Token[], options: ParseOptions = {}): ParseResult {
    const toks = tokens.filter(t => !skippedByParser(t));
    const maxDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    const errors: string[] = [];
    let pos = 0;
    let depth = 0;

    function isAtEnd(): boolean {
        return pos >= toks.length;
    }

    function peek(): Token | undefined {
        return toks[pos];
    }

    function previous(): Token | undefined {
        return pos > 0 ? toks[pos - 1] : undefined;
    }

    function advance(): Token | undefined {
        if (!isAtEnd()) pos++;
        return previous();
    }

    /* current token has exactly this text */
    function check(text: string): boolean {
        return peek()?.text === text;
    }

    function checkKind(kind: TokenKind): boolean {
        return peek()?.kind === kind;
    }

    function checkNext(text: string): boolean {
        return toks[pos + 1]?.text === text;
    }

    function match(...texts: readonly string[]): boolean {
        for (const t of texts) {
            if (check(t)) {
                pos++;
                return true;
            }
        }
        return false;
    }

    /* line of the current token; at end of input, the last token's */
    function currentLine(): number {
        return (peek() ?? toks[toks.length - 1])?.line ?? 1;
    }

    function error(message: string): null {
        errors.push(`error at line ${currentLine()}: expected ${message}`);
        return null;
    }

    // ast root
    const root: ProgramNode = { kind: 'Program', line: 1, body: [] };

    // main loop
    while (!isAtEnd()) {
        const start = pos;
        try {
            const stmt = parseStatement();
            if (stmt) root.body.push(stmt);
            else advance();
        } catch (err) {
            if (!(err instanceof NestingDepthError)) throw err;
            errors.push(`error at line ${err.line}: ${err.message}`);
            depth = 0;
            skipPastLine(err.line, start);
        }
    }

    return { root, errors };

    /* resume at the first token after `line`, always moving past `start` */
    function skipPastLine(line: number, start: number): void {
        if (pos <= start) pos = start + 1;
        while (!isAtEnd() && (peek()?.line ?? 0) <= line) pos++;
    }

    function parseStatement(): StatementNode | null {
        if (match('def')) return parseFunctionDef();
        if (match('if')) return parseIfStatement();
        if (check('print')) return parseExpressionStatement();
        if (checkKind(TokenKind.Identifier) && checkNext('=')) return parseAssignment();
        return parseExpressionStatement();
    }

    function parseFunctionDef(): StatementNode | null {
        const line = previous()?.line ?? currentLine();

        const nameTok = peek();
        if (!nameTok || nameTok.kind !== TokenKind.Identifier) return error('function name');
        advance();

        if (!match('(')) return error(`'(' after function name`);

        const params: ParameterNode[] = [];
        if (!check(')')) {
            for (;;) {
                const paramTok = peek();
                if (!paramTok || paramTok.kind !== TokenKind.Identifier) {
                    error('parameter name');
                    break;
                }
                advance();
                params.push({ kind: 'Parameter', name: paramTok.text, line: paramTok.line });
                if (!match(',')) break;
            }
        }

        if (!match(')')) return error(`')' after parameters`);
        if (!match(':')) return error(`':' after function definition`);

        const body = parseBlock();
        return { kind: 'FunctionDef', name: nameTok.text, line, params, body };
    }

    function parseIfStatement(): StatementNode | null {
        const line = previous()?.line ?? currentLine();

        const condition = parseExpression();
        if (!condition) return null;

        if (!match(':')) return error(`':' after if condition`);

        const body = parseBlock();
        return { kind: 'IfStatement', line, condition, body };
    }

    function parseBlock(): BlockNode {
        const block: BlockNode = { kind: 'Block', line: currentLine(), body: [] };

        while (
            !isAtEnd() &&
            !check('def') && !check('if') &&
            !checkNext('def') && !checkNext('if')
        ) {
            const stmt = parseStatement();
            if (stmt) block.body.push(stmt);
            else advance(); // resynchronise
            if (pos >= toks.length - 1) break;
        }

        return block;
    }

    function parseAssignment(): StatementNode | null {
        const nameTok = peek();
        if (!nameTok || nameTok.kind !== TokenKind.Identifier) return error('identifier in assignment');
        advance();

        if (!match('=')) return error(`'=' in assignment`);

        const value = parseExpression();
        if (!value) return null;

        return { kind: 'Assignment', name: nameTok.text, line: nameTok.line, value };
    }

    function parseExpressionStatement(): StatementNode | null {
        const expression = parseExpression();
        if (!expression) return null;
        return { kind: 'ExpressionStatement', line: expression.line, expression };
    }

    function parseExpression(): ExpressionNode | null {
        if (++depth > maxDepth) throw new NestingDepthError(currentLine(), maxDepth);
        try {
            return parseBinary(comparisonOperators, () => parseBinary(additiveOperators, parseFactor));
        } finally {
            depth--;
        }
    }

    /* one left-associative precedence level */
    function parseBinary(
        operators: readonly BinaryOperator[],
        operand: () => ExpressionNode | null
    ): ExpressionNode | null {
        let expr = operand();
        if (!expr) return null;

        for (;;) {
            const opTok = peek();
            const operator = operators.find(op => op === opTok?.text);
            if (!operator) break;
            advance();
            const right = operand() ?? undefined;
            expr = { kind: 'BinaryOp', operator, line: expr.line, left: expr, right };
        }

        return expr;
    }

    function parseArgs(): ExpressionNode[] {
        const args: ExpressionNode[] = [];
        if (!check(')')) {
            for (;;) {
                const arg = parseExpression();
                if (arg) args.push(arg);
                if (!match(',')) break;
            }
        }
        return args;
    }

    function parseFactor(): ExpressionNode | null {
        if (match('(')) {
            const expr = parseExpression();
            if (!match(')')) error(`')' after expression`);
            return expr;
        }

        const t = peek();
        if (!t) return error('expression');

        if (t.kind === TokenKind.Number) {
            advance();
            return { kind: 'Number', text: t.text, line: t.line };
        }

        if (t.kind === TokenKind.String) {
            advance();
            return { kind: 'String', text: t.text, line: t.line };
        }

        // 'print' is reserved but called like any function
        if (t.kind === TokenKind.Identifier || (t.kind === TokenKind.Keyword && t.text === 'print')) {
            advance();

            // function call
            if (match('(')) {
                const args = parseArgs();
                if (!match(')')) error(`')' after arguments`);
                return { kind: 'FunctionCall', name: t.text, line: t.line, args };
            }

            // method call
            if (match('.')) {
                const methodTok = peek();
                if (!methodTok || methodTok.kind !== TokenKind.Identifier) return error(`method name after '.'`);
                advance();
                if (!match('(')) return error(`'(' after method name`);
                const args = parseArgs();
                if (!match(')')) error(`')' after method arguments`);
                return { kind: 'MethodCall', object: t.text, method: methodTok.text, line: t.line, args };
            }

            return { kind: 'Identifier', name: t.text, line: t.line };
        }

        return error('expression');
    }
}

/** Line number of the first syntax error, 0 when there is none. */
export function firstErrorLine(errors: readonly string[]): number {
    const m = /^error at line (\d+):/.exec(errors[0] ?? '');
    return m ? parseInt(m[1], 10) : 0;
}
