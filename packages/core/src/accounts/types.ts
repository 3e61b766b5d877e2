import type { AccountPrefixes, IdentifierMapping, RemoteAccount } from '@budget-ledger/shared';

/**
 * Where a ledger account came from.
 * 'explicit' paths are user overrides and bypass all naming rules.
 */
export type Resolution =
    | { kind: 'explicit'; path: string }
    | { kind: 'derived'; path: string };

/**
 * Run-scoped, read-only lookup state.
 */
export interface ResolutionContext {
    catalog: ReadonlyMap<string, RemoteAccount>;
    mapping: IdentifierMapping;
    prefixes: AccountPrefixes;
}
