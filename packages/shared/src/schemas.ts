/**
 * Zod schemas for Budget Ledger data structures.
 *
 * IMPORTANT: Money is stored as decimal strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { FLAGS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
export const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * ISO 4217-style commodity code. Beancount commodities are upper case,
 * so that is all we accept from the remote side too.
 */
export const currencyCode = z.string().regex(/^[A-Z][A-Z0-9'._-]{0,22}[A-Z0-9]$/, 'Must be an upper-case commodity code');

/**
 * Colon-delimited ledger account, e.g. `Expenses:Immediate-Obligations:Rent`.
 * No empty components, no whitespace.
 */
export const ledgerAccountPath = z.string().regex(/^[^\s:]+(:[^\s:]+)*$/, 'Must be a colon-delimited account path without whitespace');

const remoteId = z.string().min(1);

// ============================================================================
// Remote (budgeting service) Schemas
// ============================================================================

/**
 * Pseudo-categories the service maintains itself.
 * Only `inflows` carries import semantics; see RESERVED_CATEGORY_NAMES.
 */
export const ReservedCategorySchema = z.enum([
    'inflows',
    'uncategorized',
    'deferred_income',
    'credit_card_payment',
]);

export type ReservedCategory = z.infer<typeof ReservedCategorySchema>;

/**
 * Catalog entry for anything a posting can point at: a budget account
 * (checking, credit card, tracking) or a budget category.
 */
export const RemoteAccountSchema = z.object({
    id: remoteId,
    name: z.string(),
    kind: z.enum(['account', 'category']),
    group_name: z.string().optional(),
    on_budget: z.boolean(),
    reserved: ReservedCategorySchema.optional(),
});

export type RemoteAccount = z.infer<typeof RemoteAccountSchema>;

/**
 * One split of a remote transaction. Amount uses the service's sign.
 */
export const RemoteLegSchema = z.object({
    id: remoteId,
    amount: decimalString,
    memo: z.string().optional(),
    payee_name: z.string().optional(),
    category_id: remoteId.optional(),
    transfer_account_id: remoteId.optional(),
    transfer_transaction_id: remoteId.optional(),
});

export type RemoteLeg = z.infer<typeof RemoteLegSchema>;

export const ClearedStateSchema = z.enum(['uncleared', 'cleared', 'reconciled']);

export type ClearedState = z.infer<typeof ClearedStateSchema>;

export const RemoteTransactionSchema = z.object({
    id: remoteId,
    date: isoDateString,
    payee_name: z.string(),
    memo: z.string().optional(),
    cleared: ClearedStateSchema,
    amount: decimalString,
    currency: currencyCode,
    account_id: remoteId,
    category_id: remoteId.optional(),
    transfer_account_id: remoteId.optional(),
    transfer_transaction_id: remoteId.optional(),
    legs: z.array(RemoteLegSchema),
});

export type RemoteTransaction = z.infer<typeof RemoteTransactionSchema>;

// ============================================================================
// Ledger Schemas
// ============================================================================

export const PostingSchema = z.object({
    account: ledgerAccountPath,
    amount: decimalString,
    currency: currencyCode,
    comment: z.string().optional(),
});

export type Posting = z.infer<typeof PostingSchema>;

export const LedgerFlagSchema = z.enum([FLAGS.reconciled, FLAGS.cleared]);

export type LedgerFlag = z.infer<typeof LedgerFlagSchema>;

export const LedgerTransactionSchema = z.object({
    date: isoDateString,
    flag: LedgerFlagSchema,
    payee: z.string(),
    memo: z.string().optional(),
    metadata: z.record(z.string(), z.string()),
    postings: z.array(PostingSchema).min(1),
});

export type LedgerTransaction = z.infer<typeof LedgerTransactionSchema>;

/**
 * Remote identifier -> ledger account, from `open` directives.
 */
export type IdentifierMapping = ReadonlyMap<string, string>;

/**
 * Top-level account names used by the default naming rule.
 */
export const AccountPrefixesSchema = z.object({
    assets: z.string().min(1),
    expenses: z.string().min(1),
    income: z.string().min(1),
});

export type AccountPrefixes = z.infer<typeof AccountPrefixesSchema>;

// ============================================================================
// Ledger File Scan Schemas
// ============================================================================

/**
 * An `open` directive found in the existing ledger, with its metadata.
 */
export const AccountDeclarationSchema = z.object({
    account: ledgerAccountPath,
    date: isoDateString,
    line: z.number().int().min(1),
    metadata: z.record(z.string(), z.string()),
});

export type AccountDeclaration = z.infer<typeof AccountDeclarationSchema>;

/**
 * Result of scanning ledger text.
 * Scanner returns data, not side effects. Warnings are returned as data.
 */
export const LedgerScanResultSchema = z.object({
    declarations: z.array(AccountDeclarationSchema),
    options: z.record(z.string(), z.string()),
    warnings: z.array(z.string()),
});

export type LedgerScanResult = z.infer<typeof LedgerScanResultSchema>;

// ============================================================================
// Import Configuration
// ============================================================================

export const ImportConfigSchema = z.object({
    budget: z.string().min(1).optional(),
    since: isoDateString.optional(),
    skip_starting_balances: z.boolean().default(false),
    include_cleared: z.boolean().default(false),
    balance_adjustment_account: ledgerAccountPath.optional(),
});

export type ImportConfig = z.infer<typeof ImportConfigSchema>;

// ============================================================================
// Run Summary
// ============================================================================

/**
 * Per-run counters, one per terminal state of a transaction.
 */
export const RunStatsSchema = z.object({
    fetched: z.number().int().min(0),
    skipped: z.number().int().min(0),
    balanced: z.number().int().min(0),
    unbalanced: z.number().int().min(0),
    failed: z.number().int().min(0),
});

export type RunStats = z.infer<typeof RunStatsSchema>;
