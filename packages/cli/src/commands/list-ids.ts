import { LIST_IDS_STEPS } from '../pipeline/runner.js';
import { defaultDeps, exitCodeFor, runCommand, type CommandDeps } from './common.js';
import type { CommandOptions } from '../types.js';

/**
 * Print every YNAB account and category id with its ledger account.
 *
 * @returns process exit code
 */
export async function listIds(
    ledgerPath: string | undefined,
    options: CommandOptions,
    deps: CommandDeps = defaultDeps
): Promise<number> {
    return exitCodeFor(await runCommand(ledgerPath, options, LIST_IDS_STEPS, deps));
}
