/**
 * Import policy around the translator.
 *
 * Per transaction:
 *   Fetched -> Skipped
 *           -> Translated -> Balanced | Unbalanced (warned, still emitted)
 *           -> Error (reported, run continues)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import { METADATA_KEY, STARTING_BALANCE_PAYEE } from '@budget-ledger/shared';
import type { LedgerTransaction, RemoteTransaction } from '@budget-ledger/shared';
import { LedgerImportError } from '../errors.js';
import { translateTransaction } from './translate.js';
import { validateTransaction } from './validate.js';
import type { ImportResult, TranslationContext, TranslationOutcome } from './types.js';

export const SKIP_REASONS = {
    STARTING_BALANCE: 'starting balance',
    TRANSFER_COUNTERPART: 'transfer counterpart already imported',
} as const;

export function isSkippedStartingBalance(transaction: RemoteTransaction, context: TranslationContext): boolean {
    return context.skipStartingBalances && transaction.payee_name === STARTING_BALANCE_PAYEE;
}

/**
 * Run one transaction through skip rules, translation and the balance check.
 * Skips are decided before translation, so a skipped transaction never
 * produces partial output.
 */
export function processTransaction(
    transaction: RemoteTransaction,
    context: TranslationContext
): TranslationOutcome {
    if (isSkippedStartingBalance(transaction, context)) {
        return { status: 'skipped', transactionId: transaction.id, reason: SKIP_REASONS.STARTING_BALANCE };
    }

    let translated: LedgerTransaction;
    try {
        translated = translateTransaction(transaction, context);
    } catch (err) {
        if (err instanceof LedgerImportError) {
            return { status: 'error', transactionId: transaction.id, error: err };
        }
        throw err;
    }

    const check = validateTransaction(translated);
    if (check.valid) {
        return { status: 'balanced', transaction: translated };
    }

    return {
        status: 'unbalanced',
        transaction: translated,
        warning:
            `Unbalanced transaction ${transaction.date} "${transaction.payee_name}" ` +
            `(${METADATA_KEY} ${transaction.id}): ${check.error}. Supply the missing leg manually.`,
    };
}

/**
 * Ids of transactions that are the duplicate side of a transfer booked elsewhere.
 *
 * Decided over the whole batch, so arrival order never matters:
 * - A split leg books its transfer: the plain transaction on the other side
 *   is dropped, whichever of the two points at the other
 * - Between two plain transactions, the smaller id is kept
 */
export function transferCounterparts(transactions: readonly RemoteTransaction[]): Set<string> {
    const byId = new Map<string, RemoteTransaction>(transactions.map(t => [t.id, t]));
    const legIds = new Set<string>();
    for (const transaction of transactions) {
        for (const leg of transaction.legs) {
            legIds.add(leg.id);
        }
    }

    const counterparts = new Set<string>();
    for (const transaction of transactions) {
        for (const leg of transaction.legs) {
            const mirror = leg.transfer_transaction_id ? byId.get(leg.transfer_transaction_id) : undefined;
            if (mirror && mirror.legs.length === 0) {
                counterparts.add(mirror.id);
            }
        }

        const other = transaction.transfer_transaction_id;
        if (!other || transaction.legs.length > 0) continue;
        if (legIds.has(other)) {
            counterparts.add(transaction.id);
        } else if (byId.has(other) && transaction.id > other) {
            counterparts.add(transaction.id);
        }
    }
    return counterparts;
}

/**
 * Translate a stream of remote transactions.
 *
 * - A transfer between two budget accounts shows up twice; one side is
 *   booked, the other skipped (this run only, see transferCounterparts)
 * - Output is sorted by date, then remote id, and does not depend on
 *   arrival order
 *
 * @param transactions - Finite stream, already filtered to cleared/reconciled
 * @param context - Run context, not mutated
 */
export function translateAll(
    transactions: Iterable<RemoteTransaction>,
    context: TranslationContext
): ImportResult {
    const result: ImportResult = {
        transactions: [],
        warnings: [],
        failures: [],
        skipped: [],
        stats: { fetched: 0, skipped: 0, balanced: 0, unbalanced: 0, failed: 0 },
    };
    const batch = [...transactions].sort((a, b) => a.date.localeCompare(b.date) || a.id.localeCompare(b.id));
    const counterparts = transferCounterparts(batch);

    for (const transaction of batch) {
        result.stats.fetched++;

        if (counterparts.has(transaction.id)) {
            result.stats.skipped++;
            result.skipped.push({ transactionId: transaction.id, reason: SKIP_REASONS.TRANSFER_COUNTERPART });
            continue;
        }

        const outcome = processTransaction(transaction, context);
        switch (outcome.status) {
            case 'skipped':
                result.stats.skipped++;
                result.skipped.push({ transactionId: outcome.transactionId, reason: outcome.reason });
                continue;
            case 'error':
                result.stats.failed++;
                result.failures.push({
                    transactionId: outcome.transactionId,
                    code: outcome.error.code,
                    message: outcome.error.message,
                });
                continue;
            case 'unbalanced':
                result.stats.unbalanced++;
                result.warnings.push(outcome.warning);
                break;
            case 'balanced':
                result.stats.balanced++;
                break;
        }

        result.transactions.push(outcome.transaction);
    }

    return result;
}
