/**
 * Constants for Budget Ledger.
 */

/**
 * Metadata key binding a ledger account or transaction to a remote identifier.
 * Used both on `open` directives (explicit overrides) and on every
 * imported transaction.
 */
export const METADATA_KEY = 'ynab-id';

/**
 * Default top-level account names. Beancount lets a ledger rename these via
 * `option "name_assets" "..."` and friends; the scanner picks those up.
 */
export const DEFAULT_PREFIXES = {
    assets: 'Assets',
    expenses: 'Expenses',
    income: 'Income',
} as const;

/**
 * Beancount option names mapping to the prefixes above.
 */
export const PREFIX_OPTIONS = {
    name_assets: 'assets',
    name_expenses: 'expenses',
    name_income: 'income',
} as const;

/**
 * Payee the budgeting service writes on opening-balance transactions.
 */
export const STARTING_BALANCE_PAYEE = 'Starting Balance';

/**
 * Automatic entries the service creates when an account is reconciled
 * against a differing bank balance.
 */
export const RECONCILIATION_ADJUSTMENT = {
    PAYEE: 'Reconciliation Balance Adjustment',
    MEMO: 'Entered automatically by YNAB',
} as const;

/**
 * Service-internal category groups and the pseudo-categories inside them.
 *
 * NOTE: only INFLOWS has defined import semantics (income consolidation).
 * The remaining ones resolve like any ordinary category.
 */
export const RESERVED_CATEGORY_NAMES = {
    INTERNAL_GROUP: 'Internal Master Category',
    CREDIT_CARD_GROUP: 'Credit Card Payments',
    INFLOWS: ['Inflow: Ready to Assign', 'Inflows', 'To be Budgeted'],
    UNCATEGORIZED: ['Uncategorized'],
    DEFERRED_INCOME: ['Deferred Income SubCategory'],
} as const;

/**
 * Ledger text layout.
 */
export const LEDGER_FORMAT = {
    INDENT: '  ',
    ACCOUNT_WIDTH: 50,
    AMOUNT_WIDTH: 10,
    REPORT_INDENT: 37,
    NONE_SENTINEL: '(none)',
} as const;

/**
 * Ledger flag characters per remote cleared state.
 */
export const FLAGS = {
    reconciled: '*',
    cleared: '!',
} as const;

/**
 * The service reports amounts in thousandths of the currency unit.
 */
export const MILLIUNITS_PER_UNIT = 1000;
