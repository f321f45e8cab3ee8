import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import type { ZodError } from 'zod';
import {
    SettingsSchema,
    KeywordTableSchema,
    type KeywordTable,
    type Settings,
} from '@dompet/shared';
import type { Workspace } from '../types.js';

/**
 * Environment variables that override config/settings.yaml.
 */
const ENV_OVERRIDES = {
    DOMPET_LEDGER_FILE: { key: 'ledger_file', numeric: false },
    DOMPET_CACHE_TTL_SECONDS: { key: 'cache_ttl_seconds', numeric: true },
    DOMPET_UTC_OFFSET_MINUTES: { key: 'utc_offset_minutes', numeric: true },
} as const;

/**
 * Loads workspace settings. A missing settings file means all defaults.
 */
export function loadSettings(workspace: Workspace, env: NodeJS.ProcessEnv = process.env): Settings {
    const path = workspace.config.settingsPath;
    const fileSettings = existsSync(path) ? readYamlMapping(path) : {};

    const overrides: Record<string, string | number> = {};
    for (const [name, { key, numeric }] of Object.entries(ENV_OVERRIDES)) {
        const value = env[name];
        if (value === undefined || value === '') continue;
        overrides[key] = numeric ? Number(value) : value;
    }

    const result = SettingsSchema.safeParse({ ...fileSettings, ...overrides });
    if (!result.success) {
        throw new Error(`Invalid settings in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Loads the keyword table: the workspace's config/keywords.yaml when present,
 * otherwise the bundled table.
 */
export function loadKeywordTable(workspace: Workspace): KeywordTable {
    const { keywordsPath, bundledKeywordsPath } = workspace.config;
    const path = existsSync(keywordsPath) ? keywordsPath : bundledKeywordsPath;
    if (!existsSync(path)) {
        throw new Error(`Keyword file not found: ${path}`);
    }

    const result = KeywordTableSchema.safeParse(readYamlMapping(path));
    if (!result.success) {
        throw new Error(`Invalid keyword table in ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function readYamlMapping(path: string): object {
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) {
        return {};
    }
    if (typeof data !== 'object' || Array.isArray(data)) {
        throw new Error(`Invalid YAML structure in ${path}: expected a mapping.`);
    }
    return data;
}

export function formatIssues(error: ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}
