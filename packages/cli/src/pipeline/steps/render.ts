import { renderJournal } from '@budget-ledger/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Rendering
 * Formats translated transactions as Beancount text.
 */
export const renderLedger: PipelineStep = async (state) => {
    state.output = renderJournal(state.result?.transactions ?? []);
    return state;
};
