import { join, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Settings } from '@dompet/shared';
import type { Workspace } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        config: {
            settingsPath: join(root, 'config', 'settings.yaml'),
            keywordsPath: join(root, 'config', 'keywords.yaml'),
            bundledKeywordsPath: resolveBundledKeywordsPath(),
        },
    };
}

function resolveBundledKeywordsPath(): string {
    // In dev: packages/cli/src/workspace/paths.ts -> __dirname = packages/cli/src/workspace
    // In dist: packages/cli/dist/workspace/paths.js -> __dirname = packages/cli/dist/workspace
    const pkgRoot = join(__dirname, '..', '..');
    return join(pkgRoot, 'assets', 'keywords.yaml');
}

/**
 * Ledger workbook location. Relative paths are taken from the workspace root.
 */
export function getLedgerPath(workspace: Workspace, settings: Settings): string {
    return resolve(workspace.root, settings.ledger_file);
}
