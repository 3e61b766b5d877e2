import { fetchBudget } from '../../ynab/fetch.js';
import type { PipelineStep } from '../types.js';
import { describeError } from '../../utils/errors.js';
import { debug, info } from '../../utils/console.js';

/**
 * Step 2: YNAB Fetch
 * Loads budget metadata, then the catalog and transactions of that budget.
 * Any failure here is fatal: nothing can be translated without the catalog.
 */
export const fetchBudgetData: PipelineStep = async (state) => {
    const { config } = state.settings;

    try {
        const fetched = await fetchBudget(state.source, {
            ...(config.budget !== undefined ? { budget: config.budget } : {}),
            ...(config.since !== undefined ? { since: config.since } : {}),
            includeCleared: config.include_cleared,
        });
        state.fetched = fetched;

        info(`Budget "${fetched.budget.name}" (${fetched.budget.currency})`);
        info(`${fetched.catalog.length} accounts and categories, ${fetched.transactions.length} importable transactions`);
        debug(`${fetched.excluded} transactions excluded by cleared state`);
    } catch (err) {
        state.errors.push({
            step: 'fetch',
            message: `Failed to fetch YNAB data: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
