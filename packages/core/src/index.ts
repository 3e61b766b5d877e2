// Types (re-exported from shared)
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
} from './types/index.js';

export {
    RemoteAccountSchema,
    RemoteTransactionSchema,
    LedgerTransactionSchema,
    ImportConfigSchema,
    METADATA_KEY,
    DEFAULT_PREFIXES,
    LEDGER_FORMAT,
    FLAGS,
} from './types/index.js';

// Errors
export {
    ErrorCodes,
    LedgerImportError,
    NormalizationError,
    UnknownReferenceError,
    MissingTargetError,
    UnclearedInputError,
    AmbiguousMappingError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Accounts
export {
    normalizeName,
    normalizeSegment,
    classifyReservedCategory,
    createResolutionContext,
    derivePath,
    prefixFor,
    resolveAccount,
    resolveId,
    buildIdentifierMapping,
    prefixesFromOptions,
} from './accounts/index.js';
export type { Resolution, ResolutionContext } from './accounts/index.js';

// Ledger
export {
    translateTransaction,
    resolveTarget,
    flagFor,
    processTransaction,
    translateAll,
    transferCounterparts,
    isSkippedStartingBalance,
    SKIP_REASONS,
    validateTransaction,
    renderTransaction,
    renderPosting,
    renderJournal,
    quote,
    formatAmount,
    negateAmount,
} from './ledger/index.js';
export type {
    TranslationContext,
    TranslationOutcome,
    TranslationFailure,
    ImportResult,
} from './ledger/index.js';

// Beancount
export { scanLedger, declaredAccounts } from './beancount/index.js';

// Reports
export { buildIdReport, renderIdReport } from './report/index.js';
export type { IdReportEntry } from './report/index.js';
