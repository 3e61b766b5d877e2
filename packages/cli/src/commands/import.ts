import { IMPORT_STEPS } from '../pipeline/runner.js';
import { arrow, log, success, warn } from '../utils/console.js';
import { defaultDeps, exitCodeFor, runCommand, type CommandDeps } from './common.js';
import type { CommandOptions } from '../types.js';

/**
 * Import cleared YNAB transactions and print them as Beancount entries.
 *
 * @returns process exit code
 */
export async function importLedger(
    ledgerPath: string | undefined,
    options: CommandOptions,
    deps: CommandDeps = defaultDeps
): Promise<number> {
    const state = await runCommand(ledgerPath, options, IMPORT_STEPS, deps);
    if (state === null) {
        return 1;
    }

    if (state.result) {
        const { stats } = state.result;
        log('\n--- Import Summary ---');
        arrow(`Fetched: ${stats.fetched}`);
        arrow(`Balanced: ${stats.balanced}`);
        arrow(`Unbalanced (needs a manual leg): ${stats.unbalanced}`);
        arrow(`Skipped: ${stats.skipped}`);
        arrow(`Failed: ${stats.failed}`);

        if (stats.failed > 0 || stats.unbalanced > 0) {
            warn(`Import summary: ${stats.failed} failed, ${stats.unbalanced} unbalanced of ${stats.fetched} fetched transactions.`);
        }
    }

    const code = exitCodeFor(state);
    if (code === 0) {
        success(`Wrote ${state.result?.transactions.length ?? 0} transactions.`);
    } else {
        log('\n✖ Import failed with fatal errors.');
    }
    return code;
}
