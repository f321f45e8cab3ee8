/**
 * Wires settings, keywords, store, cache and ledger for one workspace.
 */

import { resolve } from 'node:path';
import {
    Ledger,
    MemoryStore,
    ReadThroughCache,
    findDuplicateKeywords,
    toLocalDate,
    type KeywordTable,
    type Transaction,
    type TransactionStore,
} from '@dompet/core';
import type { Settings } from '@dompet/shared';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { resolveWorkspace, getLedgerPath } from './workspace/paths.js';
import { loadSettings, loadKeywordTable } from './workspace/config.js';
import { WorkbookStore } from './store/workbook-store.js';
import { warn, errorMessage } from './utils/console.js';
import type { GlobalOptions, Workspace } from './types.js';

export interface App {
    workspace: Workspace;
    settings: Settings;
    keywords: KeywordTable;
    store: TransactionStore;
    cache: ReadThroughCache<Transaction[]>;
    ledger: Ledger;
}

export interface AppOptions extends GlobalOptions {
    env?: NodeJS.ProcessEnv;
}

/**
 * Build the application. Without --workspace the nearest directory holding
 * config/settings.yaml is used, falling back to the current directory.
 */
export function createApp(options: AppOptions = {}): App {
    const root = resolve(options.workspace ?? detectWorkspaceRoot() ?? process.cwd());
    const workspace = resolveWorkspace(root);
    const settings = loadSettings(workspace, options.env);
    const keywords = loadKeywordTable(workspace);
    for (const message of findDuplicateKeywords(keywords)) {
        warn(message);
    }

    const store: TransactionStore = options.memory
        ? new MemoryStore()
        : new WorkbookStore({
            filePath: getLedgerPath(workspace, settings),
            utcOffsetMinutes: settings.utc_offset_minutes,
            retry: {
                attempts: settings.store_retry_attempts,
                delayMs: settings.store_retry_delay_ms,
                onRetry: (attempt, err) => {
                    warn(`Write attempt ${attempt} failed, retrying: ${errorMessage(err)}`);
                },
            },
        });

    const cache = new ReadThroughCache<Transaction[]>({
        ttlMs: settings.cache_ttl_seconds * 1000,
        loadTimeoutMs: settings.store_timeout_ms,
        logger: { warn },
    });

    return { workspace, settings, keywords, store, cache, ledger: new Ledger(store, cache) };
}

/**
 * Today's date at the workspace's UTC offset.
 */
export function today(settings: Settings, now: Date = new Date()): string {
    return toLocalDate(now, settings.utc_offset_minutes);
}

export { handleMessage } from './bot/handler.js';
export type { HandlerContext } from './bot/handler.js';
export { formatAcknowledgement, formatRupiah } from './bot/reply.js';
export { WorkbookStore } from './store/workbook-store.js';
