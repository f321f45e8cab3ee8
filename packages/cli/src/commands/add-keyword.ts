import { readFile } from 'node:fs/promises';
import {
    validateKeywordFragment,
    normalizeDescription,
    EXPENSE_CATEGORY_PRIORITY,
    type KeywordGroup,
} from '@dompet/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadKeywordTable } from '../workspace/config.js';
import { appendKeywordToYaml } from '../yaml/keywords.js';
import { success, log, arrow, warn } from '../utils/console.js';
import type { GlobalOptions } from '../types.js';

const GROUPS: readonly KeywordGroup[] = ['income', ...EXPENSE_CATEGORY_PRIORITY];

export function parseKeywordGroup(value: string): KeywordGroup {
    const group = GROUPS.find((g) => g.toLowerCase() === value.trim().toLowerCase());
    if (!group) {
        throw new Error(`Unknown category "${value}". Use one of: ${GROUPS.join(', ')}.`);
    }
    return group;
}

/**
 * Add a keyword fragment to the workspace keyword table.
 * The first addition copies the bundled table into config/keywords.yaml.
 */
export async function addKeyword(category: string, fragment: string, options: GlobalOptions): Promise<void> {
    const group = parseKeywordGroup(category);

    const root = options.workspace ?? detectWorkspaceRoot();
    if (!root) {
        throw new Error('Workspace not found. Create config/settings.yaml or pass --workspace.');
    }
    const workspace = resolveWorkspace(root);
    const table = loadKeywordTable(workspace);

    const validation = validateKeywordFragment(fragment, group, table);
    if (!validation.valid) {
        throw new Error(validation.errors.join(', '));
    }

    // Overlaps are allowed; priority order decides between categories
    for (const message of validation.warnings) {
        warn(message);
    }

    const keywordsPath = workspace.config.keywordsPath;
    log(`Adding keyword to: ${keywordsPath}`);

    const template = await readFile(workspace.config.bundledKeywordsPath, 'utf8');
    const normalized = normalizeDescription(fragment);
    await appendKeywordToYaml(keywordsPath, group, normalized, template);

    success('Keyword added!');
    arrow(`Keyword:  "${normalized}"`);
    arrow(`Category: ${group}`);
}
