/**
 * Budget Ledger CLI - Core Types
 */

import type { ImportConfig } from '@budget-ledger/shared';

/**
 * Flags shared by every command, as commander hands them over.
 */
export interface CommandOptions {
    ynabToken?: string;
    budget?: string;
    since?: string;
    skipStartingBalances?: boolean;
    includeCleared?: boolean;
    balanceAdjustmentAccount?: string;
    listYnabIds?: boolean;
    config?: string;
    verbose?: boolean;
    debug?: boolean;
}

/**
 * Settings a run actually uses, after config file and flags are merged.
 */
export interface RunSettings {
    token: string;
    config: ImportConfig;
    /** Config file that was loaded, if any. */
    configPath: string | null;
}
