/**
 * Remote transaction -> ledger transaction.
 *
 * Postings:
 * - First posting: owning account, full amount as reported
 * - Split: one posting per non-zero leg, sign flipped (the service says
 *   "decrease the budget by X", the ledger says "increase expenses by X")
 * - Not split: one balancing posting to the category or transfer account,
 *   or none at all when the service gives neither (tracking accounts)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures are thrown as
 * LedgerImportError subclasses and turned into outcomes by the policy layer.
 */

import { Decimal } from 'decimal.js';
import { FLAGS, METADATA_KEY, RECONCILIATION_ADJUSTMENT } from '@budget-ledger/shared';
import type { LedgerFlag, LedgerTransaction, Posting, RemoteTransaction } from '@budget-ledger/shared';
import { resolveId } from '../accounts/resolve.js';
import { MissingTargetError, UnclearedInputError } from '../errors.js';
import { formatAmount, isZeroAmount, negateAmount } from './amount.js';
import type { TranslationContext } from './types.js';

/**
 * Fields a transaction and a split leg share for picking the other side.
 */
interface TargetSource {
    payee_name?: string;
    memo?: string;
    category_id?: string;
    transfer_account_id?: string;
}

/**
 * Ledger flag for the remote cleared state.
 *
 * @throws UnclearedInputError - the fetcher only passes cleared or reconciled
 */
export function flagFor(transaction: RemoteTransaction): LedgerFlag {
    switch (transaction.cleared) {
        case 'reconciled':
            return FLAGS.reconciled;
        case 'cleared':
            return FLAGS.cleared;
        default:
            throw new UnclearedInputError(transaction.id);
    }
}

/**
 * Ledger account on the other side of a transaction or leg.
 *
 * Order (first match wins):
 * 1. Automatic reconciliation adjustment -> configured adjustment account
 * 2. Category
 * 3. Transfer account
 *
 * @returns undefined when the service recorded no counterpart
 */
export function resolveTarget(source: TargetSource, context: TranslationContext): string | undefined {
    if (
        context.balanceAdjustmentAccount &&
        source.payee_name === RECONCILIATION_ADJUSTMENT.PAYEE &&
        source.memo === RECONCILIATION_ADJUSTMENT.MEMO
    ) {
        return context.balanceAdjustmentAccount;
    }
    if (source.category_id) {
        return resolveId(source.category_id, context.resolution).path;
    }
    if (source.transfer_account_id) {
        return resolveId(source.transfer_account_id, context.resolution).path;
    }
    return undefined;
}

/**
 * Translate one remote transaction.
 *
 * @throws UnclearedInputError | UnknownReferenceError | NormalizationError | MissingTargetError
 */
export function translateTransaction(
    transaction: RemoteTransaction,
    context: TranslationContext
): LedgerTransaction {
    const flag = flagFor(transaction);
    const currency = transaction.currency;

    const postings: Posting[] = [{
        account: resolveId(transaction.account_id, context.resolution).path,
        amount: formatAmount(new Decimal(transaction.amount)),
        currency,
    }];

    if (transaction.legs.length > 0) {
        for (const leg of transaction.legs) {
            if (isZeroAmount(leg.amount)) continue;

            const target = resolveTarget(leg, context);
            if (target === undefined) {
                throw new MissingTargetError(leg.id);
            }
            postings.push({
                account: target,
                amount: negateAmount(leg.amount),
                currency,
                ...(leg.memo ? { comment: leg.memo } : {}),
            });
        }
    } else {
        const target = resolveTarget(transaction, context);
        if (target !== undefined) {
            postings.push({
                account: target,
                amount: negateAmount(transaction.amount),
                currency,
            });
        }
    }

    return {
        date: transaction.date,
        flag,
        payee: transaction.payee_name,
        ...(transaction.memo ? { memo: transaction.memo } : {}),
        metadata: { [METADATA_KEY]: transaction.id },
        postings,
    };
}
