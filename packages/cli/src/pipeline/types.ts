import type {
    AccountPrefixes,
    IdentifierMapping,
    LedgerScanResult,
} from '@budget-ledger/shared';
import type { ImportResult } from '@budget-ledger/core';
import type { FetchedBudget } from '../ynab/fetch.js';
import type { BudgetSource } from '../ynab/source.js';
import type { RunSettings } from '../types.js';

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
 * Central state object passed through the pipeline steps.
 */
export interface PipelineState {
    /** Beancount file with ynab-id overrides; absent means default naming only. */
    ledgerPath?: string;
    settings: RunSettings;
    source: BudgetSource;

    // Accumulated during pipeline execution
    scan?: LedgerScanResult;
    mapping: IdentifierMapping;
    prefixes?: AccountPrefixes;
    fetched?: FetchedBudget;
    result?: ImportResult;
    /** Text for stdout, set by the last step. */
    output?: string;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;

export interface NamedStep {
    name: string;
    fn: PipelineStep;
}
