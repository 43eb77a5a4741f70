/**
 * payee-match CLI - Core Types
 */

export interface CategorizeOptions {
    dryRun: boolean;
    yes: boolean;
    workspace?: string;
}

export interface SuggestOptions {
    limit?: number;
    workspace?: string;
}

export interface CheckOptions {
    workspace?: string;
}

export interface AddPatternOptions {
    flags?: string;
    workspace?: string;
}

export interface AssignOptions {
    group?: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    rulesPath: string;
    categoriesPath: string;
    groupsPath: string;
    settingsPath: string;
}

export interface Workspace {
    root: string;
    data: string;
    outputs: string;
    config: WorkspaceConfig;
}
