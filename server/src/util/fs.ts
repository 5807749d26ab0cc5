import * as fs from 'node:fs/promises';
import * as path from 'path';

// dependency, VCS and interpreter folders never hold sources worth checking
const SKIPPED_DIRS = new Set(['node_modules', '.git', '.svn', '__pycache__', '.venv']);

/** Whole file as UTF-8 text; rejects when the file is gone or unreadable. */
export async function readFileUtf8(p: string): Promise<string> {
    return fs.readFile(p, 'utf8');
}

/**
 * Depth-first walk collecting every file whose name ends in one of
 * `extensions`. Results are appended to `files`, which is also returned.
 */
export async function findAllFiles(dir: string, extensions: readonly string[], files: string[] = []): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (SKIPPED_DIRS.has(entry.name)) {
                continue;
            }
            await findAllFiles(fullPath, extensions, files);
        } else if (extensions.some(ext => entry.name.endsWith(ext))) {
            files.push(fullPath);
        }
    }

    return files;
}
