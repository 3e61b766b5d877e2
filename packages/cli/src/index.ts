#!/usr/bin/env node
/**
 * Budget Ledger CLI
 *
 * Architecture:
 * - CLI handles all I/O: ledger file, YNAB API, stdout/stderr
 * - Core receives text and plain records, returns data and warnings
 * - Ledger entries go to stdout, diagnostics to stderr
 */

import { Command } from 'commander';
import { importLedger } from './commands/import.js';
import { listIds } from './commands/list-ids.js';
import { describeError } from './utils/errors.js';
import { error } from './utils/console.js';
import type { CommandOptions } from './types.js';

function withSharedOptions(command: Command): Command {
    return command
        .argument('[ledger]', 'Beancount file declaring ynab-id overrides')
        .option('--ynab-token <token>', 'YNAB personal access token (default: $YNAB_TOKEN)')
        .option('--budget <name>', 'Budget to import from; needed when the token sees several')
        .option('--since <yyyy-mm-dd>', 'Only transactions on or after this date')
        .option('--include-cleared', 'Also import cleared (not yet reconciled) transactions, flagged "!"')
        .option('--skip-starting-balances', 'Ignore "Starting Balance" transactions')
        .option('--balance-adjustment-account <account>', 'Account for automatic reconciliation adjustments')
        .option('--config <file>', 'Config file (default: nearest budget-ledger.yaml)')
        .option('--verbose', 'Progress and summary on stderr')
        .option('--debug', 'Per-transaction detail on stderr');
}

const program = new Command();

program
    .name('budget-ledger')
    .description('Translate YNAB transactions into Beancount entries')
    .version('1.0.0');

withSharedOptions(
    program
        .command('import', { isDefault: true })
        .description('Print reconciled YNAB transactions as Beancount entries')
        .option('--list-ynab-ids', 'List YNAB ids and their ledger accounts instead of importing')
).action(async (ledger: string | undefined, options: CommandOptions) => {
    process.exitCode = options.listYnabIds
        ? await listIds(ledger, options)
        : await importLedger(ledger, options);
});

withSharedOptions(
    program
        .command('list-ids')
        .description('List YNAB account and category ids with their ledger accounts')
).action(async (ledger: string | undefined, options: CommandOptions) => {
    process.exitCode = await listIds(ledger, options);
});

program.parseAsync(process.argv).catch((err: unknown) => {
    error(`Unexpected error: ${describeError(err)}`);
    process.exit(1);
});
