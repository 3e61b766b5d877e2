import { LEDGER_FORMAT } from '@budget-ledger/shared';
import type { RemoteAccount } from '@budget-ledger/shared';
import { derivePath } from '../accounts/resolve.js';
import type { ResolutionContext } from '../accounts/types.js';
import { NormalizationError } from '../errors.js';

export interface IdReportEntry {
    id: string;
    label: string;
    kind: RemoteAccount['kind'];
    /** Ledger account bound to this id, or null when none is declared yet. */
    ledgerAccount: string | null;
}

function labelFor(account: RemoteAccount): string {
    return account.group_name ? `${account.group_name}:${account.name}` : account.name;
}

function byLabel(a: IdReportEntry, b: IdReportEntry): number {
    return a.label.localeCompare(b.label) || a.id.localeCompare(b.id);
}

/**
 * List every catalog entry with the ledger account it is bound to.
 *
 * Bound means: an `open` carries its id (override), or the ledger already
 * opens the account the default naming rule would produce.
 * Accounts come first, then categories, each sorted by label.
 */
export function buildIdReport(
    catalog: readonly RemoteAccount[],
    context: ResolutionContext,
    declared: ReadonlySet<string>
): { entries: IdReportEntry[]; warnings: string[] } {
    const warnings: string[] = [];

    const entries = catalog.map((account): IdReportEntry => {
        const entry: IdReportEntry = {
            id: account.id,
            label: labelFor(account),
            kind: account.kind,
            ledgerAccount: context.mapping.get(account.id) ?? null,
        };
        if (entry.ledgerAccount !== null) {
            return entry;
        }

        try {
            const derived = derivePath(account, context.prefixes);
            if (declared.has(derived)) {
                entry.ledgerAccount = derived;
            }
        } catch (err) {
            if (!(err instanceof NormalizationError)) throw err;
            warnings.push(`${account.id}: ${err.message}`);
        }
        return entry;
    });

    const accounts = entries.filter(e => e.kind === 'account').sort(byLabel);
    const categories = entries.filter(e => e.kind === 'category').sort(byLabel);

    return { entries: [...accounts, ...categories], warnings };
}

/**
 * Two lines per entry: `<id> <label>`, then the ledger account (or `(none)`)
 * indented under the label.
 */
export function renderIdReport(entries: readonly IdReportEntry[]): string {
    const indent = ' '.repeat(LEDGER_FORMAT.REPORT_INDENT);
    return entries
        .map(e => `${e.id} ${e.label}\n${indent}${e.ledgerAccount ?? LEDGER_FORMAT.NONE_SENTINEL}\n`)
        .join('');
}
