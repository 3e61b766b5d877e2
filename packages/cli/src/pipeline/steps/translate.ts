import { createResolutionContext, translateAll } from '@budget-ledger/core';
import type { TranslationContext } from '@budget-ledger/core';
import type { PipelineStep } from '../types.js';
import { debug } from '../../utils/console.js';

/**
 * Step 3: Translation
 * Runs every fetched transaction through the import policy.
 * Per-transaction failures are non-fatal: the rest of the run still goes out.
 */
export const translateTransactions: PipelineStep = async (state) => {
    if (!state.fetched) {
        state.errors.push({ step: 'translate', message: 'No YNAB data to translate.', fatal: true });
        return state;
    }

    const { config } = state.settings;
    const context: TranslationContext = {
        resolution: createResolutionContext(state.fetched.catalog, state.mapping, state.prefixes),
        skipStartingBalances: config.skip_starting_balances,
        ...(config.balance_adjustment_account !== undefined
            ? { balanceAdjustmentAccount: config.balance_adjustment_account }
            : {}),
    };

    const result = translateAll(state.fetched.transactions, context);
    state.result = result;

    state.warnings.push(...result.warnings);
    for (const skip of result.skipped) {
        debug(`Skipped ${skip.transactionId}: ${skip.reason}`);
    }
    for (const failure of result.failures) {
        state.errors.push({
            step: 'translate',
            message: `Transaction ${failure.transactionId} not imported [${failure.code}]: ${failure.message}`,
            fatal: false,
        });
    }

    return state;
};
