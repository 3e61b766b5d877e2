import { RESERVED_CATEGORY_NAMES } from '@budget-ledger/shared';
import type { ReservedCategory } from '@budget-ledger/shared';

/**
 * Recognize the service's own pseudo-categories.
 *
 * Only 'inflows' changes how an account is named (income consolidation).
 * 'uncategorized', 'deferred_income' and 'credit_card_payment' are tagged
 * for reporting and otherwise treated as ordinary categories.
 */
export function classifyReservedCategory(
    name: string,
    groupName: string | undefined
): ReservedCategory | undefined {
    if (groupName === RESERVED_CATEGORY_NAMES.CREDIT_CARD_GROUP) {
        return 'credit_card_payment';
    }
    if (groupName !== RESERVED_CATEGORY_NAMES.INTERNAL_GROUP) {
        return undefined;
    }
    if (includesName(RESERVED_CATEGORY_NAMES.INFLOWS, name)) return 'inflows';
    if (includesName(RESERVED_CATEGORY_NAMES.UNCATEGORIZED, name)) return 'uncategorized';
    if (includesName(RESERVED_CATEGORY_NAMES.DEFERRED_INCOME, name)) return 'deferred_income';
    return undefined;
}

function includesName(names: readonly string[], name: string): boolean {
    return names.includes(name);
}
