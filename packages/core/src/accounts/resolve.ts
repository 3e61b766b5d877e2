import { DEFAULT_PREFIXES } from '@budget-ledger/shared';
import type { AccountPrefixes, IdentifierMapping, RemoteAccount } from '@budget-ledger/shared';
import { UnknownReferenceError } from '../errors.js';
import { normalizeName } from './normalize.js';
import type { Resolution, ResolutionContext } from './types.js';

/**
 * Build the read-only context every resolution and translation runs against.
 * Construct once per run, before the first transaction.
 */
export function createResolutionContext(
    catalog: readonly RemoteAccount[],
    mapping: IdentifierMapping,
    prefixes: AccountPrefixes = DEFAULT_PREFIXES
): ResolutionContext {
    return {
        catalog: new Map<string, RemoteAccount>(catalog.map(a => [a.id, a])),
        mapping,
        prefixes,
    };
}

/**
 * Prefix for the default naming rule.
 * Accounts (on-budget and tracking alike) are assets, categories are
 * expenses, except the inflows pseudo-category which is income.
 */
export function prefixFor(account: RemoteAccount, prefixes: AccountPrefixes): string {
    if (account.kind === 'account') {
        return prefixes.assets;
    }
    return account.reserved === 'inflows' ? prefixes.income : prefixes.expenses;
}

/**
 * Default ledger account for a catalog entry, ignoring any override.
 *
 * @throws NormalizationError
 */
export function derivePath(account: RemoteAccount, prefixes: AccountPrefixes): string {
    return `${prefixFor(account, prefixes)}:${normalizeName(account.name, account.group_name)}`;
}

/**
 * Resolve a catalog entry to its ledger account.
 *
 * Resolution order (first match wins):
 * 1. Explicit: the ledger declares an account with this entry's id
 * 2. Derived: default naming rule
 *
 * @throws NormalizationError when the derived name is empty
 */
export function resolveAccount(account: RemoteAccount, context: ResolutionContext): Resolution {
    const explicit = context.mapping.get(account.id);
    if (explicit !== undefined) {
        return { kind: 'explicit', path: explicit };
    }
    return { kind: 'derived', path: derivePath(account, context.prefixes) };
}

/**
 * Resolve a bare identifier, as found on transactions and legs.
 * Overrides apply even to ids missing from the catalog (closed or
 * deleted accounts still referenced by old transactions).
 *
 * @throws UnknownReferenceError | NormalizationError
 */
export function resolveId(id: string, context: ResolutionContext): Resolution {
    const explicit = context.mapping.get(id);
    if (explicit !== undefined) {
        return { kind: 'explicit', path: explicit };
    }
    const account = context.catalog.get(id);
    if (!account) {
        throw new UnknownReferenceError(id);
    }
    return { kind: 'derived', path: derivePath(account, context.prefixes) };
}
