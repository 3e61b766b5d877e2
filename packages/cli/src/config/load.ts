import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { ImportConfigSchema, type ImportConfig } from '@budget-ledger/shared';
import { detectConfigFile } from './detect.js';
import type { CommandOptions, RunSettings } from '../types.js';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function describeZodError(err: ZodError): string {
    return err.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Loads an import configuration file (YAML). Keys match ImportConfig.
 * An empty file yields the defaults.
 */
export function loadConfigFile(path: string): ImportConfig {
    if (!existsSync(path)) {
        throw new ConfigError(`Config file not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    const result = ImportConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        throw new ConfigError(`Invalid config ${path}: ${describeZodError(result.error)}`);
    }
    return result.data;
}

/**
 * Merge config file and command-line flags. Flags win; boolean flags only
 * switch a setting on.
 *
 * @throws ConfigError on a missing token or invalid values
 */
export function resolveSettings(
    options: CommandOptions,
    env: NodeJS.ProcessEnv = process.env
): RunSettings {
    const configPath = options.config ?? detectConfigFile();
    const fileConfig: Partial<ImportConfig> = configPath ? loadConfigFile(configPath) : {};

    const merged = {
        ...fileConfig,
        ...(options.budget !== undefined ? { budget: options.budget } : {}),
        ...(options.since !== undefined ? { since: options.since } : {}),
        ...(options.skipStartingBalances ? { skip_starting_balances: true } : {}),
        ...(options.includeCleared ? { include_cleared: true } : {}),
        ...(options.balanceAdjustmentAccount !== undefined
            ? { balance_adjustment_account: options.balanceAdjustmentAccount }
            : {}),
    };

    const result = ImportConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(`Invalid options: ${describeZodError(result.error)}`);
    }

    const token = options.ynabToken ?? env.YNAB_TOKEN;
    if (!token) {
        throw new ConfigError('No YNAB token: pass --ynab-token or set YNAB_TOKEN.');
    }

    return { token, config: result.data, configPath };
}
