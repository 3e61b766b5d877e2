/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    RemoteAccount,
    RemoteLeg,
    RemoteTransaction,
    ReservedCategory,
    ClearedState,
    Posting,
    LedgerFlag,
    LedgerTransaction,
    IdentifierMapping,
    AccountPrefixes,
    AccountDeclaration,
    LedgerScanResult,
    ImportConfig,
    RunStats,
} from '@budget-ledger/shared';

export {
    RemoteAccountSchema,
    RemoteTransactionSchema,
    LedgerTransactionSchema,
    ImportConfigSchema,
    METADATA_KEY,
    DEFAULT_PREFIXES,
    LEDGER_FORMAT,
    FLAGS,
} from '@budget-ledger/shared';
