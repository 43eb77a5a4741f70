import type {
    ResolutionOutcome,
    ReviewEntry,
    Settings,
    StoreChange,
    TransactionRow,
} from '@payee-match/shared';
import type { ResolutionStats, RuleStore } from '@payee-match/core';
import type { Workspace, CategorizeOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * State passed through the categorize pipeline.
 */
export interface PipelineState {
    activityPath: string;
    workspace: Workspace;
    options: CategorizeOptions;

    // Accumulated during pipeline execution
    settings?: Settings;
    store?: RuleStore;
    fingerprintBefore?: string;
    fingerprintAfter?: string;
    activityHash?: string;
    rows: TransactionRow[];
    outcomes: ResolutionOutcome[];
    changes: StoreChange[];
    stats?: ResolutionStats;
    review: ReviewEntry[];
    /** Rule changes persisted to disk. */
    saved: boolean;
    /** Report files written by the export step. */
    outputs: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
