/**
 * Syntax tree node types.
 *
 * Every node owns its children outright: no parent links, no sharing.
 * `line` is the line of the leftmost token that contributed to the node.
 */

export type NodeKind =
    | 'Program'
    | 'FunctionDef'
    | 'IfStatement'
    | 'Block'
    | 'Assignment'
    | 'ExpressionStatement'
    | 'BinaryOp'
    | 'FunctionCall'
    | 'MethodCall'
    | 'Identifier'
    | 'Number'
    | 'String'
    | 'Parameter';

export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '==' | '!=';
// '*' and '/' are never produced by the grammar; the checker still handles them
export type ArithmeticOperator = '+' | '-' | '*' | '/';
export type BinaryOperator = ComparisonOperator | ArithmeticOperator;

export const comparisonOperators: readonly ComparisonOperator[] = ['>', '<', '>=', '<=', '==', '!='];
export const additiveOperators: readonly ArithmeticOperator[] = ['+', '-'];

export interface NodeBase {
    kind: NodeKind;
    line: number;
}

export interface ProgramNode extends NodeBase {
    kind: 'Program';
    body: StatementNode[];
}

export interface ParameterNode extends NodeBase {
    kind: 'Parameter';
    name: string;
}

export interface BlockNode extends NodeBase {
    kind: 'Block';
    body: StatementNode[];
}

export interface FunctionDefNode extends NodeBase {
    kind: 'FunctionDef';
    name: string;
    params: ParameterNode[];
    body: BlockNode;
}

export interface IfStatementNode extends NodeBase {
    kind: 'IfStatement';
    condition?: ExpressionNode; // missing only in hand-built or truncated trees
    body: BlockNode;
}

export interface AssignmentNode extends NodeBase {
    kind: 'Assignment';
    name: string;
    value?: ExpressionNode;
}

export interface ExpressionStatementNode extends NodeBase {
    kind: 'ExpressionStatement';
    expression: ExpressionNode;
}

export interface BinaryOpNode extends NodeBase {
    kind: 'BinaryOp';
    operator: BinaryOperator;
    left: ExpressionNode;
    right?: ExpressionNode; // undefined when the right operand failed to parse
}

export interface FunctionCallNode extends NodeBase {
    kind: 'FunctionCall';
    name: string;
    args: ExpressionNode[];
}

export interface MethodCallNode extends NodeBase {
    kind: 'MethodCall';
    object: string;
    method: string;
    args: ExpressionNode[];
}

export interface IdentifierNode extends NodeBase {
    kind: 'Identifier';
    name: string;
}

export interface NumberNode extends NodeBase {
    kind: 'Number';
    text: string;
}

export interface StringNode extends NodeBase {
    kind: 'String';
    text: string; // quotes included
}

export type ExpressionNode =
    | BinaryOpNode
    | FunctionCallNode
    | MethodCallNode
    | IdentifierNode
    | NumberNode
    | StringNode;

export type StatementNode =
    | FunctionDefNode
    | IfStatementNode
    | AssignmentNode
    | ExpressionStatementNode;

export type SyntaxNode =
    | ProgramNode
    | ParameterNode
    | BlockNode
    | StatementNode
    | ExpressionNode;

export function isComparison(op: BinaryOperator): op is ComparisonOperator {
    return comparisonOperators.some(c => c === op);
}

/** `object.method`, the name a method call is reported under. */
export function qualifiedName(node: MethodCallNode): string {
    return `${node.object}.${node.method}`;
}

/** Owned children in source order. */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
    switch (node.kind) {
        case 'Program':
        case 'Block':
            return node.body;
        case 'FunctionDef':
            return [...node.params, node.body];
        case 'IfStatement':
            return node.condition ? [node.condition, node.body] : [node.body];
        case 'Assignment':
            return node.value ? [node.value] : [];
        case 'ExpressionStatement':
            return [node.expression];
        case 'BinaryOp':
            return node.right ? [node.left, node.right] : [node.left];
        case 'FunctionCall':
        case 'MethodCall':
            return node.args;
        case 'Identifier':
        case 'Number':
        case 'String':
        case 'Parameter':
            return [];
    }
}
