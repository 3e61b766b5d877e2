/**
 * Minimal scan of Beancount text for what the importer needs:
 * `open` directives with their metadata, and `option` lines.
 *
 * This is not a Beancount parser. Transactions, balances and the rest are
 * skipped line by line; `include` is reported, not followed.
 *
 * ARCHITECTURAL NOTE: Receives text, returns data. The CLI reads the file.
 */

import type { AccountDeclaration, LedgerScanResult } from '@budget-ledger/shared';

const OPTION_LINE = /^option\s+"((?:[^"\\]|\\.)*)"\s+"((?:[^"\\]|\\.)*)"/;
const INCLUDE_LINE = /^include\s+"((?:[^"\\]|\\.)*)"/;
const OPEN_LINE = /^(\d{4}-\d{2}-\d{2})\s+open\s+([^\s;]+)/;
const DIRECTIVE_LINE = /^\d{4}-\d{2}-\d{2}\s/;
const INDENTED_COMMENT_LINE = /^\s+;/;
const METADATA_LINE = /^\s+([a-z][a-zA-Z0-9_-]*):\s*(.*)$/;
const QUOTED_VALUE = /^"((?:[^"\\]|\\.)*)"/;

function unescape(value: string): string {
    return value.replace(/\\(.)/g, '$1');
}

/**
 * Metadata value: quoted string (unescaped) or bare token up to a comment.
 */
function parseMetadataValue(raw: string): string | null {
    const quoted = raw.match(QUOTED_VALUE);
    if (quoted) {
        return unescape(quoted[1]);
    }
    const bare = raw.split(';')[0].trim();
    return bare.length > 0 ? bare : null;
}

/**
 * Scan ledger text for account declarations and options.
 *
 * @param text - Full ledger file contents
 * @param sourceName - File name used in warnings
 */
export function scanLedger(text: string, sourceName = '<ledger>'): LedgerScanResult {
    const declarations: AccountDeclaration[] = [];
    const options: Record<string, string> = {};
    const warnings: string[] = [];

    let current: AccountDeclaration | null = null;
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        const lineNumber = i + 1;

        // Comments inside a directive do not end its metadata block.
        if (current && INDENTED_COMMENT_LINE.test(line)) continue;

        const meta = current ? line.match(METADATA_LINE) : null;
        if (current && meta) {
            const value = parseMetadataValue(meta[2]);
            if (value === null) {
                warnings.push(`${sourceName}:${lineNumber}: empty metadata value for "${meta[1]}" on ${current.account}`);
            } else {
                current.metadata[meta[1]] = value;
            }
            continue;
        }

        // Anything else ends the metadata block of the previous directive.
        current = null;

        const open = line.match(OPEN_LINE);
        if (open) {
            current = { account: open[2], date: open[1], line: lineNumber, metadata: {} };
            declarations.push(current);
            continue;
        }

        if (DIRECTIVE_LINE.test(line)) continue;

        const option = line.match(OPTION_LINE);
        if (option) {
            options[unescape(option[1])] = unescape(option[2]);
            continue;
        }

        const include = line.match(INCLUDE_LINE);
        if (include) {
            warnings.push(`${sourceName}:${lineNumber}: include "${unescape(include[1])}" is not followed; declare overrides in this file`);
        }
    }

    return { declarations, options, warnings };
}

/**
 * Every account the ledger opens.
 */
export function declaredAccounts(declarations: readonly AccountDeclaration[]): Set<string> {
    return new Set(declarations.map(d => d.account));
}
