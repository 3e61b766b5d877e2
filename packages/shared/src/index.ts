// Schemas
export {
    isoDateString,
    decimalString,
    currencyCode,
    ledgerAccountPath,
    ReservedCategorySchema,
    RemoteAccountSchema,
    RemoteLegSchema,
    ClearedStateSchema,
    RemoteTransactionSchema,
    PostingSchema,
    LedgerFlagSchema,
    LedgerTransactionSchema,
    AccountPrefixesSchema,
    AccountDeclarationSchema,
    LedgerScanResultSchema,
    ImportConfigSchema,
    RunStatsSchema,
} from './schemas.js';

// Types
export type {
    ReservedCategory,
    RemoteAccount,
    RemoteLeg,
    ClearedState,
    RemoteTransaction,
    Posting,
    LedgerFlag,
    LedgerTransaction,
    IdentifierMapping,
    AccountPrefixes,
    AccountDeclaration,
    LedgerScanResult,
    ImportConfig,
    RunStats,
} from './schemas.js';

// Constants
export {
    METADATA_KEY,
    DEFAULT_PREFIXES,
    PREFIX_OPTIONS,
    STARTING_BALANCE_PAYEE,
    RECONCILIATION_ADJUSTMENT,
    RESERVED_CATEGORY_NAMES,
    LEDGER_FORMAT,
    FLAGS,
    MILLIUNITS_PER_UNIT,
} from './constants.js';
