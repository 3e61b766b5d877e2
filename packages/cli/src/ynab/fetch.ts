/**
 * Fetch and normalize one budget from a BudgetSource.
 *
 * Budget lookup first (its id is needed), then accounts, categories and
 * transactions concurrently. Deleted entities are dropped; amounts are
 * converted from milliunits to decimal strings.
 */

import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { classifyReservedCategory, formatAmount } from '@budget-ledger/core';
import { MILLIUNITS_PER_UNIT } from '@budget-ledger/shared';
import type { RemoteAccount, RemoteLeg, RemoteTransaction } from '@budget-ledger/shared';
import {
    WireAccountSchema,
    WireBudgetSchema,
    WireCategoryGroupSchema,
    WireTransactionSchema,
    type WireAccount,
    type WireBudget,
    type WireCategoryGroup,
    type WireSubTransaction,
    type WireTransaction,
} from './schemas.js';
import type { BudgetSource } from './source.js';

export class BudgetSelectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BudgetSelectionError';
    }
}

export interface FetchOptions {
    budget?: string;
    since?: string;
    includeCleared: boolean;
}

export interface FetchedBudget {
    budget: { id: string; name: string; currency: string };
    catalog: RemoteAccount[];
    transactions: RemoteTransaction[];
    /** Transactions dropped for their cleared state. */
    excluded: number;
}

/**
 * Pick the budget to import from.
 *
 * - Named: must exist
 * - Unnamed: only allowed when there is exactly one budget
 *
 * @throws BudgetSelectionError
 */
export function selectBudget(budgets: readonly WireBudget[], name?: string): WireBudget {
    if (name !== undefined) {
        const match = budgets.find(b => b.name === name);
        if (!match) {
            throw new BudgetSelectionError(`Could not find any budget named "${name}".`);
        }
        return match;
    }
    if (budgets.length === 0) {
        throw new BudgetSelectionError('No budgets found for this token.');
    }
    if (budgets.length > 1) {
        throw new BudgetSelectionError(
            `No budget specified; choose one with --budget: ${budgets.map(b => b.name).join(', ')}`
        );
    }
    return budgets[0];
}

export function fromMilliunits(milliunits: number): string {
    return formatAmount(new Decimal(milliunits).dividedBy(MILLIUNITS_PER_UNIT));
}

function toCatalogAccounts(accounts: readonly WireAccount[]): RemoteAccount[] {
    // Closed accounts stay: older transactions still reference them.
    return accounts
        .filter(a => !a.deleted)
        .map((a): RemoteAccount => ({ id: a.id, name: a.name, kind: 'account', on_budget: a.on_budget }));
}

function toCatalogCategories(groups: readonly WireCategoryGroup[]): RemoteAccount[] {
    const categories: RemoteAccount[] = [];
    for (const group of groups) {
        if (group.deleted) continue;
        for (const category of group.categories) {
            if (category.deleted) continue;
            const reserved = classifyReservedCategory(category.name, group.name);
            categories.push({
                id: category.id,
                name: category.name,
                kind: 'category',
                group_name: group.name,
                on_budget: true,
                ...(reserved ? { reserved } : {}),
            });
        }
    }
    return categories;
}

function toLeg(sub: WireSubTransaction): RemoteLeg {
    return {
        id: sub.id,
        amount: fromMilliunits(sub.amount),
        ...(sub.memo ? { memo: sub.memo } : {}),
        ...(sub.payee_name ? { payee_name: sub.payee_name } : {}),
        ...(sub.category_id ? { category_id: sub.category_id } : {}),
        ...(sub.transfer_account_id ? { transfer_account_id: sub.transfer_account_id } : {}),
        ...(sub.transfer_transaction_id ? { transfer_transaction_id: sub.transfer_transaction_id } : {}),
    };
}

export function toRemoteTransaction(txn: WireTransaction, currency: string): RemoteTransaction {
    return {
        id: txn.id,
        date: txn.date,
        payee_name: txn.payee_name ?? '',
        ...(txn.memo ? { memo: txn.memo } : {}),
        cleared: txn.cleared,
        amount: fromMilliunits(txn.amount),
        currency,
        account_id: txn.account_id,
        ...(txn.category_id ? { category_id: txn.category_id } : {}),
        ...(txn.transfer_account_id ? { transfer_account_id: txn.transfer_account_id } : {}),
        ...(txn.transfer_transaction_id ? { transfer_transaction_id: txn.transfer_transaction_id } : {}),
        legs: txn.subtransactions.filter(s => !s.deleted).map(toLeg),
    };
}

function isImportable(txn: WireTransaction, includeCleared: boolean): boolean {
    return txn.cleared === 'reconciled' || (includeCleared && txn.cleared === 'cleared');
}

/**
 * Fetch the catalog and transaction stream of one budget.
 *
 * @throws BudgetSelectionError | ZodError | whatever the source rejects with
 */
export async function fetchBudget(source: BudgetSource, options: FetchOptions): Promise<FetchedBudget> {
    const budgets = z.array(WireBudgetSchema).parse(await source.listBudgets());
    const budget = selectBudget(budgets, options.budget);

    const currency = budget.currency_format?.iso_code;
    if (!currency) {
        throw new BudgetSelectionError(`Budget "${budget.name}" reports no ISO currency code.`);
    }

    const [rawAccounts, rawGroups, rawTransactions] = await Promise.all([
        source.listAccounts(budget.id),
        source.listCategoryGroups(budget.id),
        source.listTransactions(budget.id, options.since),
    ]);

    const accounts = z.array(WireAccountSchema).parse(rawAccounts);
    const groups = z.array(WireCategoryGroupSchema).parse(rawGroups);
    const live = z.array(WireTransactionSchema).parse(rawTransactions).filter(t => !t.deleted);
    const importable = live.filter(t => isImportable(t, options.includeCleared));

    return {
        budget: { id: budget.id, name: budget.name, currency },
        catalog: [...toCatalogAccounts(accounts), ...toCatalogCategories(groups)],
        transactions: importable.map(t => toRemoteTransaction(t, currency)),
        excluded: live.length - importable.length,
    };
}
