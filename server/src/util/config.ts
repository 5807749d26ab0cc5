import { Connection } from 'vscode-languageserver';
import { z } from 'zod';
import { DEFAULT_MAX_NESTING_DEPTH } from '../analysis/ast/parser';

export const CONFIG_SECTION = 'pylite';

export const serverConfigSchema = z.object({
    maxNestingDepth: z.number().int().positive().default(DEFAULT_MAX_NESTING_DEPTH),
    fileExtensions: z.array(z.string().min(1)).default(['.py'])
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export const defaultConfig: ServerConfig = serverConfigSchema.parse({});

/** Validate a raw settings object; anything invalid falls back to defaults. */
export function parseConfiguration(raw: unknown): ServerConfig {
    const result = serverConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        console.warn(`Invalid ${CONFIG_SECTION} settings, using defaults: ${result.error.message}`);
        return defaultConfig;
    }
    return result.data;
}

export async function getConfiguration(conn: Connection): Promise<ServerConfig> {
    try {
        const raw: unknown = await conn.workspace.getConfiguration({ section: CONFIG_SECTION });
        return parseConfiguration(raw);
    } catch (err) {
        console.warn(`Could not read ${CONFIG_SECTION} settings: ${String(err)}`);
        return defaultConfig;
    }
}
