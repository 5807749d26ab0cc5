import { URI } from 'vscode-uri';

/**
 * Cache key for a document URI. Drive letters are case-insensitive, so
 * file:///C%3A/x.py and file:///c%3A/x.py collapse to one key.
 */
export function normalizeUri(uri: string): string {
    const parsed = URI.parse(uri);
    const key = parsed.toString();
    return parsed.scheme === 'file' && /^\/[a-z]:/i.test(parsed.path) ? key.toLowerCase() : key;
}
