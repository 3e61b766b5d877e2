import { Decimal } from 'decimal.js';
import type { LedgerTransaction } from '@budget-ledger/shared';
import { formatAmount } from './amount.js';

/**
 * Check that a transaction's postings sum to zero in every currency.
 *
 * A single non-zero posting is never balanced: there is nothing to offset it.
 * A lone zero posting (e.g. an all-zero split) needs no other side.
 * Uses Decimal for precise comparison.
 *
 * @returns Validation result with the non-zero residual per currency
 */
export function validateTransaction(transaction: LedgerTransaction): {
    valid: boolean;
    residuals: Record<string, string>;
    error?: string;
} {
    const totals = new Map<string, Decimal>();

    for (const posting of transaction.postings) {
        const current = totals.get(posting.currency) ?? new Decimal(0);
        totals.set(posting.currency, current.plus(new Decimal(posting.amount)));
    }

    const residuals: Record<string, string> = {};
    for (const [currency, total] of totals) {
        if (!total.isZero()) {
            residuals[currency] = formatAmount(total);
        }
    }

    const singleLeg = transaction.postings.length < 2 && Object.keys(residuals).length > 0;
    const valid = !singleLeg && Object.keys(residuals).length === 0;

    let error: string | undefined;
    if (singleLeg) {
        error = 'only one posting could be generated';
    } else if (!valid) {
        const parts = Object.entries(residuals).map(([currency, amount]) => `${amount} ${currency}`);
        error = `postings do not balance, residual ${parts.join(', ')}`;
    }

    return { valid, residuals, error };
}
