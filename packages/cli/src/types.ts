/**
 * Dompet CLI - Core Types
 */

export interface GlobalOptions {
    workspace?: string;
    memory?: boolean;
}

export interface RecordOptions extends GlobalOptions {
    source?: string;
}

export interface ListOptions extends GlobalOptions {
    limit: number;
    month?: string;
}

export interface MonthOptions extends GlobalOptions {
    month?: string;
}

export interface TrendOptions extends GlobalOptions {
    days: number;
}

export interface MonthsOptions extends GlobalOptions {
    count: number;
}

export interface WorkspaceConfig {
    settingsPath: string;
    keywordsPath: string;
    bundledKeywordsPath: string;
}

export interface Workspace {
    root: string;
    config: WorkspaceConfig;
}
