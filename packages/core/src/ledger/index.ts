/**
 * Ledger module: remote transaction translation, import policy and rendering.
 */

export { translateTransaction, resolveTarget, flagFor } from './translate.js';
export { processTransaction, translateAll, transferCounterparts, isSkippedStartingBalance, SKIP_REASONS } from './policy.js';
export { validateTransaction } from './validate.js';
export { renderTransaction, renderPosting, renderJournal, quote } from './render.js';
export { formatAmount, negateAmount } from './amount.js';
export type {
    TranslationContext,
    TranslationOutcome,
    TranslationFailure,
    ImportResult,
} from './types.js';
