/**
 * Tests for the Analyzer façade and the language-server plumbing around it.
 */
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'path';
import * as url from 'node:url';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { DiagnosticSeverity, TextDocuments } from 'vscode-languageserver';
import { Analyzer } from '../server/src/analysis/project/graph';
import * as reportModule from '../server/src/analysis/report';
import { handleAnalyze, analyzeParamsSchema } from '../server/src/lsp/handlers/analyze';
import { checkFiles, summarizeStages } from '../server/src/lsp/handlers/workspace';
import { parseConfiguration } from '../server/src/util/config';
import { findAllFiles } from '../server/src/util/fs';
import { normalizeUri } from '../server/src/util/uri';

function makeDoc(code: string, version = 1, uri = 'file:///test.py') {
    return TextDocument.create(uri, 'pylite', version, code);
}

describe('Analyzer.runDiagnostics', () => {
    let analyzer: Analyzer;
    beforeEach(() => { analyzer = new Analyzer(); });

    test('maps each stage to an LSP diagnostic', () => {
        const diags = analyzer.runDiagnostics(makeDoc("x = 1 `\ny = 'a' - 1"));
        expect(diags).toEqual([
            {
                range: { start: { line: 0, character: 6 }, end: { line: 0, character: 7 } },
                message: "unrecognized character '`' at line 1, column 7",
                severity: DiagnosticSeverity.Error,
                source: 'pylite',
                code: 'lexical'
            },
            {
                range: { start: { line: 1, character: 0 }, end: { line: 1, character: 11 } },
                message: "semantic error at line 2: operator '-' is not valid for strings",
                severity: DiagnosticSeverity.Error,
                source: 'pylite',
                code: 'semantic'
            }
        ]);
    });

    test('syntax errors span their line', () => {
        const diags = analyzer.runDiagnostics(makeDoc('x = 1\r\n  )  \r\n'));
        expect(diags).toHaveLength(1);
        expect(diags[0].code).toBe('syntax');
        expect(diags[0].range).toEqual({ start: { line: 1, character: 0 }, end: { line: 1, character: 5 } });
    });

    test('clean source has no diagnostics', () => {
        expect(analyzer.runDiagnostics(makeDoc("s = 'Hi'\nt = s.lower()"))).toEqual([]);
    });
});

describe('Analyzer cache', () => {
    test('reuses the report while the version is unchanged', () => {
        const analyzer = new Analyzer();
        const first = analyzer.analyzeDocument(makeDoc('x = 1'));
        expect(analyzer.analyzeDocument(makeDoc('x = 1'))).toBe(first);
        expect(analyzer.analyzeDocument(makeDoc('x = 2', 2))).not.toBe(first);
    });

    test('drive letter casing does not split the cache', () => {
        const analyzer = new Analyzer();
        const first = analyzer.analyzeDocument(makeDoc('x = 1', 1, 'file:///C%3A/proj/a.py'));
        expect(analyzer.analyzeDocument(makeDoc('x = 1', 1, 'file:///c%3A/proj/a.py'))).toBe(first);
        expect(analyzer.getStats().documents).toBe(1);
    });

    test('changing the nesting ceiling drops cached reports', () => {
        const analyzer = new Analyzer();
        const doc = makeDoc('x = ((1))');
        const first = analyzer.analyzeDocument(doc);
        expect(first.syntax.errors).toEqual([]);
        analyzer.setMaxNestingDepth(2);
        expect(analyzer.analyzeDocument(doc).syntax.errors).toEqual(['error at line 1: maximum nesting depth of 2 exceeded']);
    });

    test('text from disk is analysed afresh every time', () => {
        const analyzer = new Analyzer();
        expect(analyzer.diagnoseText('file:///disk.py', 'x = 1')).toEqual([]);
        const diags = analyzer.diagnoseText('file:///disk.py', "y = 'a' - 1");
        expect(diags.map(d => d.message)).toEqual(["semantic error at line 1: operator '-' is not valid for strings"]);
        expect(diags[0].range).toEqual({ start: { line: 0, character: 0 }, end: { line: 0, character: 11 } });
        expect(analyzer.getStats().documents).toBe(0);
    });

    test('forget removes a document', () => {
        const analyzer = new Analyzer();
        analyzer.analyzeDocument(makeDoc('x = 1'));
        analyzer.forget('file:///test.py');
        expect(analyzer.getStats().documents).toBe(0);
    });
});

test('an unexpected failure yields an empty report', () => {
    const analyzer = new Analyzer();
    const failing = jest.spyOn(reportModule, 'analyze').mockImplementationOnce(() => {
        throw new Error('boom');
    });
    const logged = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
        const report = analyzer.analyzeText('x = 1');
        expect(report).toEqual(reportModule.emptyReport());
        expect(analyzer.getStats().failures).toBe(1);
        expect(logged).toHaveBeenCalledTimes(1);
    } finally {
        failing.mockRestore();
        logged.mockRestore();
    }
});

describe('pylite/analyze request', () => {
    const docs = new TextDocuments(TextDocument);

    test('accepts raw text', () => {
        const report = handleAnalyze({ text: 'x = 5\nx.lower()' }, docs);
        expect(report?.semantic.errors).toEqual(["semantic error at line 2: method 'lower()' is not available for the type of 'x'"]);
    });

    test('unknown documents give null', () => {
        expect(handleAnalyze({ uri: 'file:///missing.py' }, docs)).toBeNull();
    });

    test('params are validated', () => {
        expect(analyzeParamsSchema.safeParse({}).success).toBe(false);
        expect(analyzeParamsSchema.safeParse({ text: 42 }).success).toBe(false);
        expect(analyzeParamsSchema.safeParse({ uri: 'file:///a.py' }).success).toBe(true);
    });
});

describe('configuration', () => {
    test('defaults', () => {
        expect(parseConfiguration(undefined)).toEqual({ maxNestingDepth: 200, fileExtensions: ['.py'] });
    });

    test('partial settings keep the other defaults', () => {
        expect(parseConfiguration({ maxNestingDepth: 50 })).toEqual({ maxNestingDepth: 50, fileExtensions: ['.py'] });
    });

    test('invalid settings fall back to defaults', () => {
        const warned = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        try {
            expect(parseConfiguration({ maxNestingDepth: -1 })).toEqual({ maxNestingDepth: 200, fileExtensions: ['.py'] });
            expect(warned).toHaveBeenCalledTimes(1);
        } finally {
            warned.mockRestore();
        }
    });
});

test('summarizeStages counts per stage', () => {
    const diags = new Analyzer().runDiagnostics(makeDoc("`\n)\ns = 'a' - 1\nt = s - 2"));
    expect(summarizeStages(diags)).toBe('1 lexical, 1 syntax, 2 semantic');
});

test('normalizeUri leaves non-drive URIs alone', () => {
    expect(normalizeUri('file:///home/User/a.py')).toBe('file:///home/User/a.py');
    expect(normalizeUri('file:///C%3A/Proj/a.py')).toBe('file:///c%3A/proj/a.py');
});

test('findAllFiles walks folders and skips vendored ones', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'pylite-'));
    try {
        await fs.mkdir(path.join(root, 'sub'));
        await fs.mkdir(path.join(root, 'node_modules'));
        await fs.writeFile(path.join(root, 'a.py'), 'x = 1');
        await fs.writeFile(path.join(root, 'notes.txt'), '');
        await fs.writeFile(path.join(root, 'sub', 'b.py'), 'y = 2');
        await fs.writeFile(path.join(root, 'node_modules', 'c.py'), 'z = 3');

        const files = await findAllFiles(root, ['.py']);
        expect(files.map(f => path.relative(root, f)).sort()).toEqual(['a.py', path.join('sub', 'b.py')]);
    } finally {
        await fs.rm(root, { recursive: true, force: true });
    }
});

describe('checkFiles', () => {
    let root: string;
    let logged: jest.SpyInstance;
    let warned: jest.SpyInstance;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'pylite-check-'));
        logged = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        warned = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        logged.mockRestore();
        warned.mockRestore();
        await fs.rm(root, { recursive: true, force: true });
    });

    test('publishes files with issues and skips unreadable ones', async () => {
        const clean = path.join(root, 'clean.py');
        const broken = path.join(root, 'broken.py');
        const missing = path.join(root, 'missing.py');
        await fs.writeFile(clean, 'x = 1');
        await fs.writeFile(broken, "y = 'a' - 1");

        const published: string[] = [];
        const result = await checkFiles([clean, missing, broken], uri => published.push(uri), new Analyzer());

        expect(result).toEqual({ filesChecked: 2, filesWithIssues: 1, totalIssues: 1 });
        expect(published).toEqual([url.pathToFileURL(broken).toString()]);
        expect(warned).toHaveBeenCalledTimes(1);
    });

    test('a file edited on disk is re-read', async () => {
        const file = path.join(root, 'a.py');
        const analyzer = new Analyzer();
        await fs.writeFile(file, 'x = 1');
        expect((await checkFiles([file], () => undefined, analyzer)).totalIssues).toBe(0);

        await fs.writeFile(file, "x = 'a' - 1");
        expect((await checkFiles([file], () => undefined, analyzer)).totalIssues).toBe(1);
    });
});
