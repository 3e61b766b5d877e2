import { buildIdReport, createResolutionContext, declaredAccounts, renderIdReport } from '@budget-ledger/core';
import type { PipelineStep } from '../types.js';

/**
 * ID Report
 * Lists every YNAB account and category with the ledger account bound to it,
 * so overrides can be copied into `open` directives.
 */
export const reportIds: PipelineStep = async (state) => {
    if (!state.fetched) {
        state.errors.push({ step: 'report', message: 'No YNAB data to report on.', fatal: true });
        return state;
    }

    const context = createResolutionContext(state.fetched.catalog, state.mapping, state.prefixes);
    const declared = declaredAccounts(state.scan?.declarations ?? []);
    const report = buildIdReport(state.fetched.catalog, context, declared);

    state.warnings.push(...report.warnings);
    state.output = renderIdReport(report.entries);
    return state;
};
