import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILENAME = 'budget-ledger.yaml';

/**
 * Searches for 'budget-ledger.yaml', starting at startPath and bubbling up to the root.
 */
export function detectConfigFile(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CONFIG_FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
