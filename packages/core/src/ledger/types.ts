import type { LedgerTransaction, RunStats } from '@budget-ledger/shared';
import type { ResolutionContext } from '../accounts/types.js';
import type { LedgerImportError } from '../errors.js';

/**
 * Everything a translation needs, built once per run.
 */
export interface TranslationContext {
    resolution: ResolutionContext;
    skipStartingBalances: boolean;
    balanceAdjustmentAccount?: string;
}

/**
 * Terminal state of one remote transaction.
 */
export type TranslationOutcome =
    | { status: 'skipped'; transactionId: string; reason: string }
    | { status: 'balanced'; transaction: LedgerTransaction }
    | { status: 'unbalanced'; transaction: LedgerTransaction; warning: string }
    | { status: 'error'; transactionId: string; error: LedgerImportError };

/**
 * A per-transaction failure, kept for the end-of-run summary.
 */
export interface TranslationFailure {
    transactionId: string;
    code: string;
    message: string;
}

/**
 * Result of translating a whole stream.
 * Pure function pattern: returns data, the caller decides what to print.
 */
export interface ImportResult {
    transactions: LedgerTransaction[];
    warnings: string[];
    failures: TranslationFailure[];
    skipped: { transactionId: string; reason: string }[];
    stats: RunStats;
}
