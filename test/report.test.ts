import { analyze, emptyReport } from '../server/src/analysis/report';

test('a lexical error alone does not fail the analysis', () => {
    const report = analyze('x = 1 `');
    expect(report.lexical.errors).toEqual(["unrecognized character '`' at line 1, column 7"]);
    expect(report.lexical.tokens[3]).toEqual({ type: 'Error', value: '`', line: 1, column: 7 });
    expect(report.syntax.errors).toEqual([]);
    expect(report.semantic.errors).toEqual([]);
    expect(report.success).toBe(true);
    expect(report.error).toBeUndefined();
});

test('lexical section', () => {
    const { lexical } = analyze("x = 'a'");
    expect(lexical.tokens).toEqual([
        { type: 'Identifier', value: 'x', line: 1, column: 1 },
        { type: 'Symbol', value: '=', line: 1, column: 3 },
        { type: 'String', value: "'a'", line: 1, column: 5 }
    ]);
    expect(lexical.statistics).toEqual({ keywords: 0, identifiers: 1, numbers: 0, strings: 1, symbols: 1, errors: 0 });
    expect(lexical.table).toEqual({ PR: [], ID: ['x'], Numeros: [], Simbolos: ['='], Error: [] });
    expect(lexical.reserved_words).toBe(0);
});

test('syntax section carries the serialised tree', () => {
    const { syntax } = analyze('x = 1');
    expect(syntax).toEqual({
        ast: {
            type: 'Program',
            line: 1,
            children: [{
                type: 'Assignment',
                value: 'x',
                line: 1,
                children: [{ type: 'Number', value: '1', line: 1 }]
            }]
        },
        errors: [],
        success: true,
        error_line: 0
    });
});

test('syntax errors are summarised first', () => {
    const report = analyze("x = 5\nx.lower()\n)");
    expect(report.syntax.errors).toEqual(['error at line 3: expected expression']);
    expect(report.syntax.error_line).toBe(3);
    expect(report.semantic.success).toBe(false);
    expect(report.success).toBe(false);
    expect(report.error).toBe('syntax errors: error at line 3: expected expression');
});

test('semantic section and summary', () => {
    const report = analyze('x = 5\nx.lower()');
    expect(report.semantic).toEqual({
        errors: ["semantic error at line 2: method 'lower()' is not available for the type of 'x'"],
        variables: { x: { name: 'x', type: 'int', line: 1 } },
        type_mismatches: [],
        success: false
    });
    expect(report.syntax.success).toBe(true);
    expect(report.success).toBe(false);
    expect(report.error).toBe("semantic errors: semantic error at line 2: method 'lower()' is not available for the type of 'x'");
});

test('type mismatches are reported separately', () => {
    const report = analyze("x = 1\nif x > 'a':\n  print(x)");
    expect(report.semantic.type_mismatches).toEqual(["semantic error at line 2: cannot compare number with string using '>'"]);
});

test('empty source', () => {
    const report = analyze('');
    expect(report.syntax.ast).toEqual({ type: 'Program', line: 1 });
    expect(report.lexical.tokens).toEqual([]);
    expect(report.semantic.variables).toEqual({});
    expect(report.success).toBe(true);
    expect(report).not.toHaveProperty('error');
    expect(emptyReport()).toEqual(report);
});

test('repeated analysis is identical', () => {
    const code = "def f(a):\n  b = a.lower()\nif b > 1:\n  print(b + 'x', `)\nc = 'open";
    expect(JSON.stringify(analyze(code))).toBe(JSON.stringify(analyze(code)));
});

test('each call has its own variable table', () => {
    analyze("x = 'a'");
    expect(analyze('x.lower()').semantic.errors).toEqual(["semantic error at line 1: variable 'x' is not defined"]);
});

test('a very long flat sum is analysed in full', () => {
    const report = analyze('x = ' + '1 + '.repeat(20000) + '1');
    expect(report.syntax.errors).toEqual([]);
    expect(report.semantic.errors).toEqual([]);
    expect(report.semantic.variables).toEqual({ x: { name: 'x', type: 'int', line: 1 } });
    expect(report.success).toBe(true);

    // walk the left spine instead of comparing the whole tree
    let operations = 0;
    let node = report.syntax.ast.children?.[0]?.children?.[0];
    while (node?.type === 'BinaryOp') {
        operations++;
        node = node.children?.[0];
    }
    expect(operations).toBe(20000);
    expect(node).toEqual({ type: 'Number', value: '1', line: 1 });
});
