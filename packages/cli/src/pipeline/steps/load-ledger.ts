import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { AmbiguousMappingError, buildIdentifierMapping, prefixesFromOptions, scanLedger } from '@budget-ledger/core';
import { DEFAULT_PREFIXES } from '@budget-ledger/shared';
import type { PipelineStep } from '../types.js';
import { describeError } from '../../utils/errors.js';
import { debug } from '../../utils/console.js';

/**
 * Step 1: Ledger Scan
 * Reads the ledger and builds the id -> account overrides and root prefixes.
 * Without a ledger every account falls back to its derived name.
 */
export const loadLedger: PipelineStep = async (state) => {
    if (state.ledgerPath === undefined) {
        state.prefixes = { ...DEFAULT_PREFIXES };
        state.warnings.push('No ledger file given: overrides are unavailable and every account uses its derived name.');
        return state;
    }

    let text: string;
    try {
        text = await readFile(state.ledgerPath, 'utf-8');
    } catch (err) {
        state.errors.push({
            step: 'ledger',
            message: `Failed to read ledger ${state.ledgerPath}: ${describeError(err)}`,
            fatal: true,
            error: err,
        });
        return state;
    }

    const scan = scanLedger(text, basename(state.ledgerPath));
    state.scan = scan;
    state.warnings.push(...scan.warnings);

    try {
        state.mapping = buildIdentifierMapping(scan.declarations);
    } catch (err) {
        if (!(err instanceof AmbiguousMappingError)) throw err;
        state.errors.push({ step: 'ledger', message: err.message, fatal: true, error: err });
        return state;
    }

    state.prefixes = prefixesFromOptions(scan.options);
    debug(`${scan.declarations.length} open directives, ${state.mapping.size} ynab-id overrides`);

    return state;
};
