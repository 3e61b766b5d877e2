import type { NamedStep, PipelineState } from './types.js';
import { loadLedger } from './steps/load-ledger.js';
import { fetchBudgetData } from './steps/fetch.js';
import { translateTransactions } from './steps/translate.js';
import { renderLedger } from './steps/render.js';
import { reportIds } from './steps/report.js';
import { arrow, error } from '../utils/console.js';
import type { BudgetSource } from '../ynab/source.js';
import type { RunSettings } from '../types.js';

export const IMPORT_STEPS: NamedStep[] = [
    { name: 'Ledger Scan', fn: loadLedger },
    { name: 'YNAB Fetch', fn: fetchBudgetData },
    { name: 'Translation', fn: translateTransactions },
    { name: 'Rendering', fn: renderLedger },
];

export const LIST_IDS_STEPS: NamedStep[] = [
    { name: 'Ledger Scan', fn: loadLedger },
    { name: 'YNAB Fetch', fn: fetchBudgetData },
    { name: 'ID Report', fn: reportIds },
];

export function createInitialState(
    settings: RunSettings,
    source: BudgetSource,
    ledgerPath?: string
): PipelineState {
    return {
        ...(ledgerPath !== undefined ? { ledgerPath } : {}),
        settings,
        source,
        mapping: new Map(),
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(initial: PipelineState, steps: readonly NamedStep[]): Promise<PipelineState> {
    let state = initial;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
