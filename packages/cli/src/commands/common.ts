import { resolveSettings } from '../config/load.js';
import { createInitialState, runPipeline } from '../pipeline/runner.js';
import type { NamedStep, PipelineState } from '../pipeline/types.js';
import { createYnabSource, type BudgetSourceFactory } from '../ynab/source.js';
import { describeError } from '../utils/errors.js';
import { error, info, setLogLevel, warn } from '../utils/console.js';
import type { CommandOptions, RunSettings } from '../types.js';

/**
 * Outside-world hooks a command uses. Tests replace both.
 */
export interface CommandDeps {
    createSource: BudgetSourceFactory;
    write: (text: string) => void;
}

export const defaultDeps: CommandDeps = {
    createSource: createYnabSource,
    write: (text) => {
        process.stdout.write(text);
    },
};

export function applyVerbosity(options: CommandOptions): void {
    if (options.debug) {
        setLogLevel('debug');
    } else if (options.verbose) {
        setLogLevel('info');
    } else {
        setLogLevel('warn');
    }
}

/**
 * Resolve settings, run the steps, print diagnostics and write the output.
 *
 * @returns the final state, or null when settings could not be resolved
 */
export async function runCommand(
    ledgerPath: string | undefined,
    options: CommandOptions,
    steps: readonly NamedStep[],
    deps: CommandDeps
): Promise<PipelineState | null> {
    applyVerbosity(options);

    let settings: RunSettings;
    try {
        settings = resolveSettings(options);
    } catch (err) {
        error(`Error: ${describeError(err)}`);
        return null;
    }
    if (settings.configPath) {
        info(`Config: ${settings.configPath}`);
    }

    const state = await runPipeline(
        createInitialState(settings, deps.createSource(settings.token), ledgerPath),
        steps
    );

    for (const w of state.warnings) {
        warn(w);
    }
    for (const e of state.errors) {
        error(`ERROR [${e.step}]: ${e.message}`);
    }

    if (state.output !== undefined && !state.errors.some(e => e.fatal)) {
        deps.write(state.output);
    }
    return state;
}

/**
 * Process exit code for a finished command.
 */
export function exitCodeFor(state: PipelineState | null): number {
    if (state === null) return 1;
    return state.errors.some(e => e.fatal) ? 1 : 0;
}
