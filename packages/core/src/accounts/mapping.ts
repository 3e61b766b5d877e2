import { DEFAULT_PREFIXES, METADATA_KEY, PREFIX_OPTIONS } from '@budget-ledger/shared';
import type { AccountDeclaration, AccountPrefixes, IdentifierMapping } from '@budget-ledger/shared';
import { AmbiguousMappingError } from '../errors.js';

/**
 * Build the remote id -> ledger account table from `open` directives
 * carrying `ynab-id` metadata.
 *
 * @throws AmbiguousMappingError if two accounts claim the same id
 */
export function buildIdentifierMapping(declarations: readonly AccountDeclaration[]): IdentifierMapping {
    const claims = new Map<string, string[]>();

    for (const declaration of declarations) {
        const id = declaration.metadata[METADATA_KEY];
        if (id === undefined) continue;

        const accounts = claims.get(id) ?? [];
        if (!accounts.includes(declaration.account)) {
            accounts.push(declaration.account);
        }
        claims.set(id, accounts);
    }

    const mapping = new Map<string, string>();
    for (const [id, accounts] of claims) {
        if (accounts.length > 1) {
            throw new AmbiguousMappingError(id, accounts);
        }
        mapping.set(id, accounts[0]);
    }
    return mapping;
}

/**
 * Pick up renamed root accounts (`option "name_assets" "Activos"`).
 */
export function prefixesFromOptions(options: Readonly<Record<string, string>>): AccountPrefixes {
    const prefixes: AccountPrefixes = { ...DEFAULT_PREFIXES };
    for (const [option, key] of Object.entries(PREFIX_OPTIONS)) {
        const value = options[option];
        if (value) {
            prefixes[key] = value;
        }
    }
    return prefixes;
}
