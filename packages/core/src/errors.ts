/**
 * Error types raised by the resolver and translator.
 *
 * Per-transaction errors are caught by the policy layer and turned into
 * outcomes; only AmbiguousMappingError is fatal to a run.
 */

export const ErrorCodes = {
    NORMALIZATION_FAILURE: 'NORMALIZATION_FAILURE',
    UNKNOWN_REFERENCE: 'UNKNOWN_REFERENCE',
    MISSING_TARGET: 'MISSING_TARGET',
    UNCLEARED_INPUT: 'UNCLEARED_INPUT',
    AMBIGUOUS_MAPPING: 'AMBIGUOUS_MAPPING',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class LedgerImportError extends Error {
    readonly code: ErrorCode;

    constructor(message: string, code: ErrorCode) {
        super(message);
        this.name = 'LedgerImportError';
        this.code = code;
    }
}

/**
 * A display name normalized to an empty account component.
 */
export class NormalizationError extends LedgerImportError {
    readonly sourceName: string;

    constructor(sourceName: string) {
        super(`Name "${sourceName}" normalizes to an empty account component`, ErrorCodes.NORMALIZATION_FAILURE);
        this.name = 'NormalizationError';
        this.sourceName = sourceName;
    }
}

/**
 * An identifier that is neither overridden in the ledger nor in the catalog.
 */
export class UnknownReferenceError extends LedgerImportError {
    readonly remoteId: string;

    constructor(remoteId: string) {
        super(`Unknown account or category id: ${remoteId}`, ErrorCodes.UNKNOWN_REFERENCE);
        this.name = 'UnknownReferenceError';
        this.remoteId = remoteId;
    }
}

/**
 * A split leg with neither a category nor a transfer account.
 */
export class MissingTargetError extends LedgerImportError {
    readonly legId: string;

    constructor(legId: string) {
        super(`Split leg ${legId} has no category or transfer account`, ErrorCodes.MISSING_TARGET);
        this.name = 'MissingTargetError';
        this.legId = legId;
    }
}

export class UnclearedInputError extends LedgerImportError {
    constructor(transactionId: string) {
        super(`Transaction ${transactionId} is uncleared and cannot be imported`, ErrorCodes.UNCLEARED_INPUT);
        this.name = 'UnclearedInputError';
    }
}

/**
 * Two `open` directives claim the same remote identifier.
 */
export class AmbiguousMappingError extends LedgerImportError {
    readonly remoteId: string;
    readonly accounts: string[];

    constructor(remoteId: string, accounts: string[]) {
        super(
            `Remote id ${remoteId} is declared by more than one ledger account: ${accounts.join(', ')}`,
            ErrorCodes.AMBIGUOUS_MAPPING
        );
        this.name = 'AmbiguousMappingError';
        this.remoteId = remoteId;
        this.accounts = accounts;
    }
}
