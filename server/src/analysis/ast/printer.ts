import { SyntaxNode, childrenOf, qualifiedName } from './nodes';

/** Generic tree shape used in reports: `{ type, value?, line, children? }`. */
export interface SerializedNode {
    type: string;
    value?: string;
    line: number;
    children?: SerializedNode[];
}

function valueOf(node: SyntaxNode): string | undefined {
    switch (node.kind) {
        case 'FunctionDef':
        case 'Assignment':
        case 'FunctionCall':
        case 'Identifier':
        case 'Parameter':
            return node.name;
        case 'MethodCall':
            return qualifiedName(node);
        case 'BinaryOp':
            return node.operator;
        case 'Number':
        case 'String':
            return node.text;
        default:
            return undefined;
    }
}

function shallow(node: SyntaxNode): SerializedNode {
    const out: SerializedNode = { type: node.kind, line: node.line };
    const value = valueOf(node);
    if (value !== undefined) out.value = value;
    return out;
}

/*
 * Both walks keep their own stack: a flat `a + b + c ...` chain is as deep
 * as it is long.
 */

export function serializeNode(root: SyntaxNode): SerializedNode {
    const top = shallow(root);
    const pending: Array<[SyntaxNode, SerializedNode]> = [[root, top]];
    for (let item = pending.pop(); item; item = pending.pop()) {
        const [node, out] = item;
        const children = childrenOf(node);
        if (children.length === 0) continue;
        const serialized = children.map(shallow);
        out.children = serialized;
        children.forEach((child, i) => pending.push([child, serialized[i]]));
    }
    return top;
}

/** Indented one-node-per-line dump, handy in logs and test failures. */
export function prettyPrint(root: SyntaxNode): string {
    const lines: string[] = [];
    const pending: Array<[SyntaxNode, number]> = [[root, 0]];
    for (let item = pending.pop(); item; item = pending.pop()) {
        const [node, indent] = item;
        const value = valueOf(node);
        lines.push(`${'  '.repeat(indent)}${node.kind}${value !== undefined ? ` ${value}` : ''} @${node.line}`);
        const children = childrenOf(node);
        for (let i = children.length - 1; i >= 0; i--) pending.push([children[i], indent + 1]);
    }
    return lines.join('\n');
}
