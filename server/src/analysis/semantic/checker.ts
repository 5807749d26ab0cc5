/**
 * Semantic checker for Pylite.
 *
 * One top-down walk over the syntax tree with a single flat variable table.
 * Checks operand types of binary operators, `.lower()` calls and whether the
 * receiver of a method call was ever assigned. Analysis never stops early:
 * every node that can be diagnosed is.
 *
 * Parameters are parsed but never registered, so a parameter used inside its
 * function body resolves as Unknown (or as undefined for a method receiver).
 *
 * Depth follows source nesting: each expression statement, call argument and
 * parenthesised right operand opens a level. A left-associated chain such as
 * `a + b + c` is one level however long it is, and its left spine is walked
 * with a loop.
 */

import { Token } from '../lexer/token';
import {
    BinaryOperator,
    BinaryOpNode,
    FunctionCallNode,
    IfStatementNode,
    AssignmentNode,
    MethodCallNode,
    SyntaxNode,
    ExpressionNode,
    childrenOf,
    isComparison,
    qualifiedName
} from '../ast/nodes';
import { DEFAULT_MAX_NESTING_DEPTH } from '../ast/parser';
import { VariableTable, VariableType } from './types';

export interface CheckOptions {
    maxNestingDepth?: number;
}

export interface SemanticReport {
    errors: string[];
    variables: VariableTable;
    /** errors about comparing incompatible types, picked out by wording */
    typeMismatches: string[];
    success: boolean;
}

const typeWord = (t: VariableType) => (t === VariableType.Int ? 'number' : 'string');

/* only a parenthesised operation can sit on the right of another */
const operandDepth = (operand: ExpressionNode, depth: number) => (operand.kind === 'BinaryOp' ? depth + 1 : depth);

/* `node` and its left operands, outermost first; ends at an incomplete operation */
function leftSpine(node: BinaryOpNode): BinaryOpNode[] {
    const spine = [node];
    let cur = node;
    while (cur.right && cur.left.kind === 'BinaryOp') {
        cur = cur.left;
        spine.push(cur);
    }
    return spine;
}

function resultType(operator: BinaryOperator, left: VariableType, right: VariableType | undefined): VariableType {
    if (isComparison(operator)) return VariableType.Bool;
    if (right === undefined) return VariableType.Unknown;
    if (left === VariableType.Int && right === VariableType.Int) return VariableType.Int;
    if (left === VariableType.String || right === VariableType.String) return VariableType.String;
    return VariableType.Unknown;
}

export class SemanticChecker {
    private readonly variables: VariableTable = new Map();
    private readonly errors: string[] = [];
    private readonly maxDepth: number;

    constructor(options: CheckOptions = {}) {
        this.maxDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    }

    run(root: SyntaxNode | null | undefined): SemanticReport {
        if (root) this.visit(root, 0);
        return {
            errors: this.errors,
            variables: this.variables,
            typeMismatches: this.errors.filter(e => /compar(e|ison)/.test(e)),
            success: this.errors.length === 0
        };
    }

    private addError(line: number, message: string): void {
        this.errors.push(`semantic error at line ${line}: ${message}`);
    }

    private visit(node: SyntaxNode, depth: number): void {
        if (depth > this.maxDepth) {
            this.addError(node.line, `maximum nesting depth of ${this.maxDepth} exceeded`);
            return;
        }

        switch (node.kind) {
            case 'Assignment':
                this.checkAssignment(node, depth);
                break;
            case 'IfStatement':
                this.checkIf(node, depth);
                break;
            case 'BinaryOp':
                this.checkBinary(node, depth);
                break;
            case 'FunctionCall':
            case 'MethodCall':
                this.checkCall(node, depth);
                break;
            case 'ExpressionStatement':
                this.visit(node.expression, depth + 1);
                break;
            default:
                // Program, FunctionDef, Block and leaves; blocks never nest
                for (const child of childrenOf(node)) this.visit(child, depth);
        }
    }

    private checkAssignment(node: AssignmentNode, depth: number): void {
        if (!node.value) {
            this.addError(node.line, 'assignment without value');
            return;
        }

        // registered before the value is walked: `x = x.lower()` sees x
        const type = this.inferType(node.value, depth + 1);
        this.variables.set(node.name, { name: node.name, type, line: node.line });

        this.visit(node.value, depth + 1);
    }

    private checkIf(node: IfStatementNode, depth: number): void {
        if (!node.condition) {
            this.addError(node.line, 'if statement without condition');
            return;
        }

        this.visit(node.condition, depth + 1);
        this.visit(node.body, depth);
    }

    private checkBinary(top: BinaryOpNode, depth: number): void {
        const spine = leftSpine(top);
        const bottom = spine[spine.length - 1];

        // operand types, innermost operation first
        const operandTypes: Array<[VariableType, VariableType]> = [];
        let leftType = bottom.right ? this.inferType(bottom.left, depth) : VariableType.Unknown;
        for (let i = spine.length - 1; i >= 0; i--) {
            const { operator, right } = spine[i];
            const rightType = right ? this.inferType(right, operandDepth(right, depth)) : undefined;
            operandTypes.push([leftType, rightType ?? VariableType.Unknown]);
            leftType = resultType(operator, leftType, rightType);
        }
        operandTypes.reverse();

        // same order as a recursive walk: every operation, then the operands inside out
        spine.forEach((node, i) => {
            if (node.right) this.checkOperands(node, operandTypes[i][0], operandTypes[i][1]);
            else this.addError(node.line, 'incomplete binary operation');
        });

        if (bottom.right) this.visit(bottom.left, depth);
        for (let i = spine.length - 1; i >= 0; i--) {
            const right = spine[i].right;
            if (right) this.visit(right, operandDepth(right, depth));
        }
    }

    private checkOperands(node: BinaryOpNode, leftType: VariableType, rightType: VariableType): void {
        const { operator } = node;
        const mixed =
            (leftType === VariableType.String && rightType === VariableType.Int) ||
            (leftType === VariableType.Int && rightType === VariableType.String);

        switch (operator) {
            case '>':
            case '<':
            case '>=':
            case '<=':
                if (mixed) {
                    this.addError(node.line,
                        `cannot compare ${typeWord(leftType)} with ${typeWord(rightType)} using '${operator}'`);
                }
                break;
            case '==':
            case '!=':
                if (mixed) {
                    this.addError(node.line,
                        `comparison between incompatible types: ${typeWord(leftType)} and ${typeWord(rightType)}`);
                }
                break;
            case '+':
            case '-':
            case '*':
            case '/':
                // '+' on strings is concatenation
                if ((leftType === VariableType.String || rightType === VariableType.String) && operator !== '+') {
                    this.addError(node.line, `operator '${operator}' is not valid for strings`);
                }
                break;
        }
    }

    private checkCall(node: FunctionCallNode | MethodCallNode, depth: number): void {
        if (node.kind === 'MethodCall') {
            const receiver = this.variables.get(node.object);
            if (!receiver) {
                this.addError(node.line, `variable '${node.object}' is not defined`);
            } else if (node.method === 'lower' && receiver.type !== VariableType.String) {
                this.addError(node.line, `method 'lower()' is not available for the type of '${node.object}'`);
            }
            // other methods are not validated
        }

        // print and every other call: arguments only, no arity or type checks
        for (const arg of node.args) this.visit(arg, depth + 1);
    }

    inferType(node: ExpressionNode, depth = 0): VariableType {
        if (depth > this.maxDepth) return VariableType.Unknown;

        switch (node.kind) {
            case 'Number':
                return VariableType.Int;
            case 'String':
                return VariableType.String;
            case 'Identifier':
                return this.variables.get(node.name)?.type ?? VariableType.Unknown;
            case 'BinaryOp': {
                const spine = leftSpine(node);
                const bottom = spine[spine.length - 1];
                let type = bottom.right ? this.inferType(bottom.left, depth) : VariableType.Unknown;
                for (let i = spine.length - 1; i >= 0; i--) {
                    const { operator, right } = spine[i];
                    type = resultType(operator, type, right && this.inferType(right, operandDepth(right, depth)));
                }
                return type;
            }
            case 'MethodCall':
                return qualifiedName(node).includes('.lower') ? VariableType.String : VariableType.Unknown;
            case 'FunctionCall':
                return VariableType.Unknown;
        }
    }
}

/**
 * Check a (possibly partial) tree. A missing tree yields an empty, successful
 * report. The token list is accepted for parity with the other stages.
 */
export function check(
    _tokens: readonly Token[],
    root: SyntaxNode | null | undefined,
    options: CheckOptions = {}
): SemanticReport {
    return new SemanticChecker(options).run(root);
}
